/**
 * Voter State Machine
 *
 * Owns the identity namespace: voter import, identity token issue and
 * reissue, and the exactly-once flip to VOTED. Raw identity tokens leave
 * this module once, at issue; only their digests are stored.
 */

import type { AuditLedger } from '../audit-ledger/index.js';
import { generateToken, hashSecret, tokenDigest } from '../crypto/index.js';
import type { ElectionRegistry } from '../elections/index.js';
import { CoreErrorCode, fail, ok, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Storage } from '../storage/index.js';
import { addHours, systemClock, type Clock } from '../utils/clock.js';
import { VoterRepository } from './repository.js';
import {
  VoterState,
  type ImportResult,
  type IssuedIdentityToken,
  type StateCounts,
  type TokenIssueOptions,
  type VoterImport,
  type VoterRecord,
  type VoterStatus,
} from './types.js';

export * from './types.js';
export { isValidTransition, assertTransition, isExpired, matchesSecondFactor } from './state-machine.js';

/** Seven days, the lifetime of an emailed voting link */
export const DEFAULT_IDENTITY_TOKEN_TTL_HOURS = 168;

const MAX_IMPORT_BATCH = 10_000;
const EXTERNAL_REF_MAX_LENGTH = 320;
const SALT_BYTES = 16;

export interface VoterRegistryConfig {
  storage: Storage;
  audit: AuditLedger;
  elections: ElectionRegistry;
  logger?: Logger;
  clock?: Clock;
  identityTokenTtlHours?: number;
}

export class VoterRegistry {
  private readonly storage: Storage;
  private readonly audit: AuditLedger;
  private readonly elections: ElectionRegistry;
  private readonly repository: VoterRepository;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly ttlHours: number;

  constructor(config: VoterRegistryConfig) {
    this.storage = config.storage;
    this.audit = config.audit;
    this.elections = config.elections;
    this.repository = new VoterRepository(config.storage.db);
    this.logger = (config.logger ?? silentLogger()).child({ component: 'voter-registry' });
    this.clock = config.clock ?? systemClock;
    this.ttlHours = config.identityTokenTtlHours ?? DEFAULT_IDENTITY_TOKEN_TTL_HOURS;
  }

  /**
   * Register voters and issue each an identity token
   *
   * References already registered for the election, or repeated within the
   * batch, are skipped and counted.
   */
  importVoters(
    electionId: string,
    voters: readonly VoterImport[],
    options: TokenIssueOptions = {}
  ): Result<ImportResult> {
    if (voters.length === 0 || voters.length > MAX_IMPORT_BATCH) {
      return fail(CoreErrorCode.INVALID_INPUT, `Import between 1 and ${MAX_IMPORT_BATCH} voters at a time`);
    }
    const ttl = this.resolveTtl(options);
    if (!ttl.ok) {
      return ttl;
    }

    const invalid = voters.findIndex(
      (voter) => voter.externalRef.trim().length === 0 || voter.externalRef.length > EXTERNAL_REF_MAX_LENGTH
    );
    if (invalid !== -1) {
      return fail(CoreErrorCode.INVALID_INPUT, `Voter at index ${invalid} has an invalid reference`);
    }

    return this.storage.run('voters.import', () => {
      const election = this.elections.requireNotClosedWithin(electionId);
      if (!election.ok) {
        return election;
      }

      const issuedAt = this.clock();
      const expiresAt = addHours(issuedAt, ttl.value).toISOString();
      const seen = new Set<string>();
      const skippedRefs: string[] = [];
      const tokens: IssuedIdentityToken[] = [];

      for (const voter of voters) {
        const externalRef = voter.externalRef.trim();
        if (seen.has(externalRef) || this.repository.findByExternalRef(electionId, externalRef)) {
          skippedRefs.push(externalRef);
          continue;
        }
        seen.add(externalRef);

        const identityToken = generateToken();
        const record = this.newRecord(electionId, externalRef, voter.secondFactor, identityToken, issuedAt, expiresAt);
        this.repository.insert(record);
        tokens.push({ voterId: record.voterId, externalRef, identityToken, expiresAt });
      }

      this.audit.appendWithin({
        electionId,
        eventType: 'voters.imported',
        actorRef: 'voter-registry',
        payload: { added: tokens.length, skipped: skippedRefs.length },
      });

      this.logger.info({ electionId, added: tokens.length, skipped: skippedRefs.length }, 'Voters imported');
      return ok({ added: tokens.length, skipped: skippedRefs.length, skippedRefs, tokens });
    });
  }

  /**
   * Replace a voter's identity token, invalidating the previous one
   */
  reissueIdentityToken(
    electionId: string,
    externalRef: string,
    options: TokenIssueOptions = {}
  ): Result<IssuedIdentityToken> {
    const ttl = this.resolveTtl(options);
    if (!ttl.ok) {
      return ttl;
    }

    return this.storage.run('voters.reissue', () => {
      const election = this.elections.requireNotClosedWithin(electionId);
      if (!election.ok) {
        return election;
      }

      const voter = this.repository.findByExternalRef(electionId, externalRef.trim());
      if (!voter) {
        return fail(CoreErrorCode.INVALID_INPUT, 'No such voter in this election');
      }
      if (voter.hasVoted) {
        return fail(CoreErrorCode.ALREADY_VOTED, 'Voter has already voted');
      }

      const identityToken = generateToken();
      const issuedAt = this.clock();
      const expiresAt = addHours(issuedAt, ttl.value).toISOString();
      if (!this.repository.replaceToken(voter.voterId, tokenDigest(identityToken), issuedAt.toISOString(), expiresAt)) {
        return fail(CoreErrorCode.ALREADY_VOTED, 'Voter has already voted');
      }

      this.audit.appendWithin({
        electionId,
        eventType: 'identity_token.reissued',
        actorRef: 'voter-registry',
      });

      this.logger.info({ electionId }, 'Identity token reissued');
      return ok({ voterId: voter.voterId, externalRef: voter.externalRef, identityToken, expiresAt });
    });
  }

  getVoterStatus(voterId: string): Result<VoterStatus> {
    return this.storage.read('voters.status', () => {
      const voter = this.repository.get(voterId);
      if (!voter) {
        return fail(CoreErrorCode.INVALID_INPUT, 'No such voter');
      }
      return ok({
        voterId: voter.voterId,
        electionId: voter.electionId,
        state: voter.state,
        hasVoted: voter.hasVoted,
        expiresAt: voter.expiresAt,
      });
    });
  }

  countByState(electionId: string): Result<StateCounts> {
    return this.storage.read('voters.countByState', () => ok(this.repository.countByState(electionId)));
  }

  /**
   * Look up the voter an identity token belongs to
   *
   * For use inside a transaction; the token is only hashed, never stored.
   */
  findByIdentityTokenWithin(identityToken: string): VoterRecord | null {
    return this.repository.findByTokenHash(tokenDigest(identityToken));
  }

  /**
   * INVITED → AUTHENTICATED; a voter already authenticated is left as is
   */
  markAuthenticatedWithin(voter: VoterRecord): boolean {
    if (voter.state === VoterState.AUTHENTICATED) {
      return true;
    }
    return this.repository.transition(voter.voterId, VoterState.INVITED, VoterState.AUTHENTICATED);
  }

  /**
   * AUTHENTICATED → VOTED as a compare-and-set
   *
   * @returns false when another writer recorded the vote first
   */
  markVotedWithin(voterId: string): boolean {
    return this.repository.transition(voterId, VoterState.AUTHENTICATED, VoterState.VOTED);
  }

  private newRecord(
    electionId: string,
    externalRef: string,
    secondFactor: string | undefined,
    identityToken: string,
    issuedAt: Date,
    expiresAt: string
  ): VoterRecord {
    const salt = secondFactor === undefined ? null : generateToken(SALT_BYTES);
    return {
      voterId: crypto.randomUUID(),
      electionId,
      externalRef,
      identityTokenHash: tokenDigest(identityToken),
      secondFactorHash: secondFactor === undefined || salt === null ? null : hashSecret(secondFactor, salt),
      secondFactorSalt: salt,
      state: VoterState.INVITED,
      hasVoted: false,
      issuedAt: issuedAt.toISOString(),
      expiresAt,
    };
  }

  private resolveTtl(options: TokenIssueOptions): Result<number> {
    const ttlHours = options.ttlHours ?? this.ttlHours;
    if (!Number.isFinite(ttlHours) || ttlHours <= 0) {
      return fail(CoreErrorCode.INVALID_INPUT, 'Token lifetime must be positive');
    }
    return ok(ttlHours);
  }
}
