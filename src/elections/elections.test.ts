/**
 * Tests for the election lifecycle
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AuditLedger } from '../audit-ledger/index.js';
import { generateElectionKeyPair } from '../crypto/index.js';
import { CoreErrorCode, unwrap } from '../errors.js';
import { Storage } from '../storage/index.js';
import { ElectionRegistry, ElectionStatus, isValidElectionTransition } from './index.js';

describe('ElectionRegistry', () => {
  let storage: Storage;
  let audit: AuditLedger;
  let registry: ElectionRegistry;
  const clock = () => new Date('2026-05-04T12:00:00.000Z');
  const { publicKey } = generateElectionKeyPair();
  const options = ['Yes', 'No'];

  beforeEach(() => {
    storage = Storage.open();
    audit = new AuditLedger({ storage, clock });
    registry = new ElectionRegistry({ storage, audit, clock });
  });

  afterEach(() => {
    storage.close();
  });

  describe('createElection', () => {
    it('should create a draft election and record it', () => {
      const election = unwrap(
        registry.createElection({
          title: ' Board 2026 ',
          description: ' Two seats ',
          options: ['Ada', ' ', 'Grace '],
          publicKey,
          electionId: 'board-2026',
        })
      );

      expect(election).toEqual({
        electionId: 'board-2026',
        title: 'Board 2026',
        description: 'Two seats',
        options: [
          { optionId: 'option-1', text: 'Ada', order: 1 },
          { optionId: 'option-2', text: 'Grace', order: 2 },
        ],
        publicKey,
        status: ElectionStatus.DRAFT,
        createdAt: '2026-05-04T12:00:00.000Z',
        openedAt: null,
        closedAt: null,
      });
      expect(unwrap(registry.getElection('board-2026'))).toEqual(election);

      const [event] = unwrap(audit.getEvents('board-2026'));
      expect(event?.eventType).toBe('election.created');
      expect(event?.actorRef).toBe('election-registry');
      expect(event?.payload).toEqual({
        title: 'Board 2026',
        description: 'Two seats',
        publicKey,
        options: [
          { optionId: 'option-1', text: 'Ada', order: 1 },
          { optionId: 'option-2', text: 'Grace', order: 2 },
        ],
      });
    });

    it('should default the description to empty', () => {
      const election = unwrap(registry.createElection({ title: 'Club vote', options, publicKey }));
      expect(election.description).toBe('');
    });

    it('should generate an id when none is given', () => {
      const election = unwrap(registry.createElection({ title: 'Club vote', options, publicKey }));
      expect(election.electionId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should reject an empty title', () => {
      expect(registry.createElection({ title: '   ', options, publicKey })).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.INVALID_INPUT },
      });
    });

    it('should require at least two options', () => {
      expect(registry.createElection({ title: 'Vote', options: ['Only', '  '], publicKey })).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.INVALID_INPUT, message: 'An election needs 2-50 options' },
      });
    });

    it('should reject an overlong option', () => {
      expect(registry.createElection({ title: 'Vote', options: ['Yes', 'n'.repeat(256)], publicKey })).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.INVALID_INPUT, message: 'Options must be at most 255 characters' },
      });
    });

    it('should reject a malformed public key', () => {
      expect(registry.createElection({ title: 'Vote', options, publicKey: 'abc' })).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.INVALID_INPUT },
      });
    });

    it('should reject a duplicate id without recording anything', () => {
      unwrap(registry.createElection({ title: 'Vote', options, publicKey, electionId: 'e1' }));
      const result = registry.createElection({ title: 'Vote again', options, publicKey, electionId: 'e1' });

      expect(result).toMatchObject({ ok: false, error: { code: CoreErrorCode.INVALID_INPUT } });
      expect(unwrap(audit.getEvents('e1'))).toHaveLength(1);
      expect(unwrap(registry.getElection('e1')).title).toBe('Vote');
    });
  });

  describe('lifecycle', () => {
    beforeEach(() => {
      unwrap(registry.createElection({ title: 'Vote', options, publicKey, electionId: 'e1' }));
    });

    it('should open then close', () => {
      const opened = unwrap(registry.openElection('e1'));
      expect(opened.status).toBe(ElectionStatus.OPEN);
      expect(opened.openedAt).toBe('2026-05-04T12:00:00.000Z');
      expect(unwrap(registry.isClosed('e1'))).toBe(false);

      const closed = unwrap(registry.closeElection('e1'));
      expect(closed.status).toBe(ElectionStatus.CLOSED);
      expect(unwrap(registry.isClosed('e1'))).toBe(true);

      const types = unwrap(audit.getEvents('e1')).map((event) => event.eventType);
      expect(types).toEqual(['election.created', 'election.opened', 'election.closed']);
      expect(audit.verifyChain('e1').ok).toBe(true);
    });

    it('should refuse to close a draft election', () => {
      expect(registry.closeElection('e1')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.INVALID_TRANSITION, details: { from: 'draft', to: 'closed' } },
      });
    });

    it('should refuse to reopen a closed election', () => {
      unwrap(registry.openElection('e1'));
      unwrap(registry.closeElection('e1'));

      expect(registry.openElection('e1')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.INVALID_TRANSITION },
      });
    });

    it('should refuse a status regression at the storage layer', () => {
      unwrap(registry.openElection('e1'));
      unwrap(registry.closeElection('e1'));
      expect(() =>
        storage.db.prepare("UPDATE main.elections SET status = 'open' WHERE election_id = 'e1'").run()
      ).toThrow('election status cannot move backwards');
    });

    it('should freeze ballot options once the election opens', () => {
      unwrap(registry.openElection('e1'));
      expect(() =>
        storage.db
          .prepare("UPDATE main.election_options SET text = 'Maybe' WHERE election_id = 'e1' AND option_id = 'option-1'")
          .run()
      ).toThrow('ballot options are fixed once the election opens');
      expect(() =>
        storage.db
          .prepare("INSERT INTO main.election_options (election_id, option_id, text, display_order) VALUES ('e1', 'option-3', 'Maybe', 3)")
          .run()
      ).toThrow('ballot options are fixed once the election opens');
    });

    it('should report unknown elections', () => {
      expect(registry.isClosed('missing')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.ELECTION_NOT_FOUND },
      });
    });

    it('should list elections', () => {
      unwrap(registry.createElection({ title: 'Second', options, publicKey, electionId: 'e2' }));
      expect(unwrap(registry.listElections()).map((e) => e.electionId)).toEqual(['e1', 'e2']);
    });
  });

  describe('getBallot', () => {
    beforeEach(() => {
      unwrap(
        registry.createElection({ title: 'Vote', description: 'Pick one', options, publicKey, electionId: 'e1' })
      );
    });

    it('should return the ballot of an open election', () => {
      unwrap(registry.openElection('e1'));

      expect(unwrap(registry.getBallot('e1'))).toEqual({
        electionId: 'e1',
        title: 'Vote',
        description: 'Pick one',
        options: [
          { optionId: 'option-1', text: 'Yes', order: 1 },
          { optionId: 'option-2', text: 'No', order: 2 },
        ],
        publicKey,
      });
    });

    it('should refuse a draft or closed election', () => {
      expect(registry.getBallot('e1')).toMatchObject({ ok: false, error: { code: CoreErrorCode.ELECTION_NOT_OPEN } });

      unwrap(registry.openElection('e1'));
      unwrap(registry.closeElection('e1'));
      expect(registry.getBallot('e1')).toMatchObject({ ok: false, error: { code: CoreErrorCode.ELECTION_NOT_OPEN } });
    });

    it('should report an unknown election', () => {
      expect(registry.getBallot('missing')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.ELECTION_NOT_FOUND },
      });
    });
  });

  describe('isValidElectionTransition', () => {
    it('should only allow forward moves', () => {
      expect(isValidElectionTransition(ElectionStatus.DRAFT, ElectionStatus.OPEN)).toBe(true);
      expect(isValidElectionTransition(ElectionStatus.OPEN, ElectionStatus.CLOSED)).toBe(true);
      expect(isValidElectionTransition(ElectionStatus.DRAFT, ElectionStatus.CLOSED)).toBe(false);
      expect(isValidElectionTransition(ElectionStatus.CLOSED, ElectionStatus.OPEN)).toBe(false);
    });
  });
});
