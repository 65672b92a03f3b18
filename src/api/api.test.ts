/**
 * Sealed Ballot REST API Tests
 *
 * Integration tests for the REST API endpoints
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { ApiRole } from '../config.js';
import { generateElectionKeyPair, openChoice, sealChoice } from '../crypto/index.js';
import { SealedBallot } from '../sealed-ballot.js';
import { createServer } from './server.js';

const ADMIN_KEY = 'test-admin-key';
const GATEWAY_KEY = 'test-gateway-key';
const AUDITOR_KEY = 'test-auditor-key';

const apiKeys = new Map<string, ApiRole>([
  [ADMIN_KEY, 'admin'],
  [GATEWAY_KEY, 'gateway'],
  [AUDITOR_KEY, 'auditor'],
]);

describe('Sealed Ballot REST API', () => {
  let core: SealedBallot;
  let server: FastifyInstance;
  const keys = generateElectionKeyPair();

  beforeEach(async () => {
    core = SealedBallot.open();
    server = await createServer({ core, apiKeys, enableRateLimit: false });
  });

  afterEach(async () => {
    await server.close();
    core.close();
  });

  async function setUpElection(externalRefs: string[] = ['a@example.test']): Promise<string[]> {
    const created = await server.inject({
      method: 'POST',
      url: '/v1/elections',
      headers: { 'x-api-key': ADMIN_KEY },
      payload: {
        title: 'Board 2026',
        description: 'Chair of the board',
        options: ['Ada', 'Grace'],
        publicKey: keys.publicKey,
        electionId: 'board-2026',
      },
    });
    expect(created.statusCode).toBe(201);

    const imported = await server.inject({
      method: 'POST',
      url: '/v1/elections/board-2026/voters',
      headers: { 'x-api-key': ADMIN_KEY },
      payload: { voters: externalRefs.map((externalRef) => ({ externalRef })) },
    });
    expect(imported.statusCode).toBe(201);

    const opened = await server.inject({
      method: 'POST',
      url: '/v1/elections/board-2026/open',
      headers: { 'x-api-key': ADMIN_KEY },
    });
    expect(opened.statusCode).toBe(200);

    const body = JSON.parse(imported.body);
    return body.tokens.map((token: { identityToken: string }) => token.identityToken);
  }

  describe('Health Check', () => {
    it('should return healthy status without an API key', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.version).toBe('0.1.0');
    });
  });

  describe('Root Endpoint', () => {
    it('should return API information', async () => {
      const response = await server.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.name).toBe('Sealed Ballot API');
      expect(body.endpoints.voting.castBallot).toBe('POST /v1/ballots');
    });
  });

  describe('Authentication', () => {
    it('should require an API key', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/elections' });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error.code).toBe('UNAUTHORIZED');
    });

    it('should reject an unknown API key', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/v1/elections',
        headers: { 'x-api-key': 'wrong-key' },
      });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error.message).toBe('Invalid API key');
    });

    it('should keep each role to its own endpoints', async () => {
      const asGateway = await server.inject({
        method: 'GET',
        url: '/v1/elections',
        headers: { 'x-api-key': GATEWAY_KEY },
      });
      expect(asGateway.statusCode).toBe(403);
      expect(JSON.parse(asGateway.body).error.code).toBe('FORBIDDEN');

      const asAdmin = await server.inject({
        method: 'POST',
        url: '/v1/ballots',
        headers: { 'x-api-key': ADMIN_KEY },
        payload: { ballotToken: 'x', encryptedChoice: 'y' },
      });
      expect(asAdmin.statusCode).toBe(403);
    });
  });

  describe('Voting Flow', () => {
    it('should carry a voter from identity token to a tallied ballot', async () => {
      const [identityToken] = await setUpElection();

      const fetched = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/ballot',
        headers: { 'x-api-key': GATEWAY_KEY },
      });
      expect(fetched.statusCode).toBe(200);
      const ballot = JSON.parse(fetched.body);

      const issued = await server.inject({
        method: 'POST',
        url: '/v1/identity/validate',
        headers: { 'x-api-key': GATEWAY_KEY },
        payload: { identityToken },
      });
      expect(issued.statusCode).toBe(200);
      const { ballotToken, electionId } = JSON.parse(issued.body);
      expect(electionId).toBe('board-2026');

      const cast = await server.inject({
        method: 'POST',
        url: '/v1/ballots',
        headers: { 'x-api-key': GATEWAY_KEY },
        payload: { ballotToken, encryptedChoice: sealChoice(ballot.options[1].optionId, ballot.publicKey, 'board-2026') },
      });
      expect(cast.statusCode).toBe(201);
      const { receipt, ballotHash } = JSON.parse(cast.body);

      const checked = await server.inject({
        method: 'GET',
        url: `/v1/receipts/${receipt}`,
        headers: { 'x-api-key': GATEWAY_KEY },
      });
      expect(checked.statusCode).toBe(200);
      expect(JSON.parse(checked.body).ballotHash).toBe(ballotHash);

      const early = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/tally',
        headers: { 'x-api-key': ADMIN_KEY },
      });
      expect(early.statusCode).toBe(403);
      expect(JSON.parse(early.body).error.code).toBe('ELECTION_NOT_CLOSED');

      await server.inject({
        method: 'POST',
        url: '/v1/elections/board-2026/close',
        headers: { 'x-api-key': ADMIN_KEY },
      });

      const tally = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/tally?limit=10',
        headers: { 'x-api-key': ADMIN_KEY },
      });
      expect(tally.statusCode).toBe(200);
      const page = JSON.parse(tally.body);
      expect(page.ballots).toHaveLength(1);
      expect(page.nextCursor).toBeNull();
      expect(openChoice(page.ballots[0].encryptedChoice, keys.privateKey, 'board-2026')).toBe('option-2');

      const verify = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/audit/verify',
        headers: { 'x-api-key': AUDITOR_KEY },
      });
      expect(verify.statusCode).toBe(200);
      const verification = JSON.parse(verify.body);
      expect(verification.ok).toBe(true);
      expect(verification.length).toBe(7);
    });

    it('should refuse a second ballot token for the same voter', async () => {
      const [identityToken] = await setUpElection();
      const request = {
        method: 'POST' as const,
        url: '/v1/identity/validate',
        headers: { 'x-api-key': GATEWAY_KEY },
        payload: { identityToken },
      };

      expect((await server.inject(request)).statusCode).toBe(200);
      const second = await server.inject(request);
      expect(second.statusCode).toBe(409);
      expect(JSON.parse(second.body).error.code).toBe('ALREADY_VOTED');
    });

    it('should reject an unknown identity token', async () => {
      await setUpElection();
      const response = await server.inject({
        method: 'POST',
        url: '/v1/identity/validate',
        headers: { 'x-api-key': GATEWAY_KEY },
        payload: { identityToken: 'e'.repeat(64) },
      });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error).toEqual({
        message: 'Invalid identity token',
        code: 'INVALID_TOKEN',
        statusCode: 401,
      });
    });

    it('should reject a malformed request body', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/ballots',
        headers: { 'x-api-key': GATEWAY_KEY },
        payload: { ballotToken: 42 },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('Ballot', () => {
    it('should give the gateway the ballot of an open election', async () => {
      await setUpElection();
      const response = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/ballot',
        headers: { 'x-api-key': GATEWAY_KEY },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        electionId: 'board-2026',
        title: 'Board 2026',
        description: 'Chair of the board',
        options: [
          { optionId: 'option-1', text: 'Ada', order: 1 },
          { optionId: 'option-2', text: 'Grace', order: 2 },
        ],
        publicKey: keys.publicKey,
      });
    });

    it('should refuse the ballot of a closed election', async () => {
      await setUpElection();
      await server.inject({
        method: 'POST',
        url: '/v1/elections/board-2026/close',
        headers: { 'x-api-key': ADMIN_KEY },
      });

      const response = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/ballot',
        headers: { 'x-api-key': GATEWAY_KEY },
      });
      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body).error.code).toBe('ELECTION_NOT_OPEN');
    });

    it('should keep the ballot from other roles', async () => {
      await setUpElection();
      const response = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/ballot',
        headers: { 'x-api-key': AUDITOR_KEY },
      });
      expect(response.statusCode).toBe(403);
    });
  });

  describe('Election Administration', () => {
    it('should require at least two options', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/elections',
        headers: { 'x-api-key': ADMIN_KEY },
        payload: { title: 'Solo', options: ['Only'], publicKey: keys.publicKey },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
    });

    it('should report counts for an election', async () => {
      await setUpElection(['a@example.test', 'b@example.test']);
      const response = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026',
        headers: { 'x-api-key': ADMIN_KEY },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('open');
      expect(body.voters).toEqual({ invited: 2, authenticated: 0, voted: 0 });
      expect(body.ballotsCast).toBe(0);
    });

    it('should return 404 for an unknown election', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/v1/elections/missing',
        headers: { 'x-api-key': ADMIN_KEY },
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error.code).toBe('ELECTION_NOT_FOUND');
    });

    it('should refuse to reopen a closed election', async () => {
      await setUpElection();
      const close = { method: 'POST' as const, url: '/v1/elections/board-2026/close', headers: { 'x-api-key': ADMIN_KEY } };
      expect((await server.inject(close)).statusCode).toBe(200);

      const reopen = await server.inject({ ...close, url: '/v1/elections/board-2026/open' });
      expect(reopen.statusCode).toBe(409);
      expect(JSON.parse(reopen.body).error.code).toBe('INVALID_TRANSITION');
    });

    it('should reissue an identity token', async () => {
      const [original] = await setUpElection();
      const response = await server.inject({
        method: 'POST',
        url: '/v1/elections/board-2026/voters/reissue',
        headers: { 'x-api-key': ADMIN_KEY },
        payload: { externalRef: 'a@example.test' },
      });

      expect(response.statusCode).toBe(200);
      const { identityToken } = JSON.parse(response.body);
      expect(identityToken).not.toBe(original);

      const stale = await server.inject({
        method: 'POST',
        url: '/v1/identity/validate',
        headers: { 'x-api-key': GATEWAY_KEY },
        payload: { identityToken: original },
      });
      expect(stale.statusCode).toBe(401);
    });
  });

  describe('Audit', () => {
    it('should report where a tampered chain breaks', async () => {
      await setUpElection();
      core.storage.db.exec('DROP TRIGGER audit.audit_events_no_update');
      core.storage.db
        .prepare("UPDATE audit.audit_events SET actor_ref = 'someone-else' WHERE election_id = ? AND sequence_no = 2")
        .run('board-2026');

      const response = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/audit/verify',
        headers: { 'x-api-key': AUDITOR_KEY },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        ok: false,
        electionId: 'board-2026',
        brokenAt: 2,
        reason: 'entry_hash_mismatch',
      });
    });

    it('should detect truncation against a published head', async () => {
      await setUpElection();
      const exported = await server.inject({
        method: 'GET',
        url: '/v1/elections/board-2026/audit',
        headers: { 'x-api-key': AUDITOR_KEY },
      });
      expect(exported.statusCode).toBe(200);
      const { head, verification, events } = JSON.parse(exported.body);
      expect(verification).toEqual({ intact: true, length: 3 });
      expect(events).toHaveLength(3);

      const anchored = await server.inject({
        method: 'GET',
        url: `/v1/elections/board-2026/audit/verify?anchorSequence=${head.sequenceNo}&anchorHash=${head.entryHash}`,
        headers: { 'x-api-key': ADMIN_KEY },
      });
      expect(JSON.parse(anchored.body).ok).toBe(true);

      const ahead = await server.inject({
        method: 'GET',
        url: `/v1/elections/board-2026/audit/verify?anchorSequence=4&anchorHash=${head.entryHash}`,
        headers: { 'x-api-key': AUDITOR_KEY },
      });
      expect(JSON.parse(ahead.body)).toEqual({
        ok: false,
        electionId: 'board-2026',
        brokenAt: 4,
        reason: 'truncated',
      });
    });
  });
});

describe('Sealed Ballot REST API without authentication', () => {
  it('should serve every route when authentication is off', async () => {
    const core = SealedBallot.open();
    const server = await createServer({ core, enableAuth: false, enableRateLimit: false });

    const response = await server.inject({ method: 'GET', url: '/v1/elections' });
    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ elections: [] });

    await server.close();
    core.close();
  });
});
