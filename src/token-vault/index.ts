/**
 * Token Vault
 *
 * Bridges the identity and ballot namespaces. An identity token is checked
 * against the voter registry, the voter is flipped to VOTED, and a fresh
 * ballot token is minted from nothing but CSPRNG output. The voter id and
 * the ballot token only meet inside that one transaction; nothing stored
 * afterwards relates them.
 */

import type { AuditLedger } from '../audit-ledger/index.js';
import { generateToken, isWellFormedToken, secureCompare, tokenDigest } from '../crypto/index.js';
import type { ElectionRegistry } from '../elections/index.js';
import { CoreErrorCode, fail, ok, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Storage } from '../storage/index.js';
import { addMinutes, systemClock, type Clock } from '../utils/clock.js';
import { isExpired, matchesSecondFactor, VoterState, type VoterRecord, type VoterRegistry } from '../voters/index.js';
import { BallotTokenRepository } from './repository.js';
import type { IssuedBallotToken, RedeemedBallotToken, ValidateOptions } from './types.js';

export * from './types.js';

export const DEFAULT_BALLOT_TOKEN_TTL_MINUTES = 60;

export interface TokenVaultConfig {
  storage: Storage;
  audit: AuditLedger;
  elections: ElectionRegistry;
  voters: VoterRegistry;
  logger?: Logger;
  clock?: Clock;
  ballotTokenTtlMinutes?: number;
}

export class TokenVault {
  private readonly storage: Storage;
  private readonly audit: AuditLedger;
  private readonly elections: ElectionRegistry;
  private readonly voters: VoterRegistry;
  private readonly repository: BallotTokenRepository;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly ttlMinutes: number;

  constructor(config: TokenVaultConfig) {
    this.storage = config.storage;
    this.audit = config.audit;
    this.elections = config.elections;
    this.voters = config.voters;
    this.repository = new BallotTokenRepository(config.storage.db);
    this.logger = (config.logger ?? silentLogger()).child({ component: 'token-vault' });
    this.clock = config.clock ?? systemClock;
    this.ttlMinutes = config.ballotTokenTtlMinutes ?? DEFAULT_BALLOT_TOKEN_TTL_MINUTES;
  }

  /**
   * Validate an identity token and mark the voter authenticated
   *
   * A voter who has already voted gets ALREADY_USED. Validation never
   * extends the token's expiry.
   *
   * @returns The voter id
   */
  validateIdentity(identityToken: string, options: ValidateOptions = {}): Result<string> {
    if (!isWellFormedToken(identityToken)) {
      return fail(CoreErrorCode.INVALID_TOKEN, 'Invalid identity token');
    }

    return this.storage.run('tokens.validateIdentity', () => {
      const voter = this.checkIdentityWithin(identityToken, options, CoreErrorCode.ALREADY_USED);
      if (!voter.ok) {
        return voter;
      }

      if (voter.value.state === VoterState.INVITED) {
        if (!this.voters.markAuthenticatedWithin(voter.value)) {
          return fail(CoreErrorCode.ALREADY_USED, 'Identity token already used');
        }
        this.audit.appendWithin({
          electionId: voter.value.electionId,
          eventType: 'voter.authenticated',
          actorRef: 'token-vault',
        });
      }

      return ok(voter.value.voterId);
    });
  }

  /**
   * Mint a ballot token for an open election
   */
  issueBallotToken(electionId: string): Result<IssuedBallotToken> {
    return this.storage.run('tokens.issue', () => {
      const election = this.elections.requireOpenWithin(electionId);
      if (!election.ok) {
        return election;
      }
      return ok(this.issueWithin(electionId));
    });
  }

  /**
   * Redeem a ballot token on its own
   *
   * Casting redeems inside the ballot transaction instead; see `redeemWithin`.
   */
  redeemBallotToken(ballotToken: string): Result<RedeemedBallotToken> {
    return this.storage.run('tokens.redeem', () => {
      const redeemed = this.redeemWithin(ballotToken, (electionId) =>
        this.elections.requireOpenWithin(electionId)
      );
      if (redeemed.ok) {
        this.logger.info({ electionId: redeemed.value.electionId }, 'Ballot token redeemed');
      }
      return redeemed;
    });
  }

  /**
   * Authenticate a voter and issue their ballot token in one unit of work
   *
   * Validation, the flip to VOTED, the token insert and both audit events
   * commit together or not at all. Exactly one of any number of concurrent
   * calls with the same identity token succeeds.
   */
  authenticateAndIssue(identityToken: string, options: ValidateOptions = {}): Result<IssuedBallotToken> {
    if (!isWellFormedToken(identityToken)) {
      return fail(CoreErrorCode.INVALID_TOKEN, 'Invalid identity token');
    }

    return this.storage.run('tokens.authenticateAndIssue', () => {
      const voter = this.checkIdentityWithin(identityToken, options, CoreErrorCode.ALREADY_VOTED);
      if (!voter.ok) {
        return voter;
      }
      const { voterId, electionId } = voter.value;

      if (!this.voters.markAuthenticatedWithin(voter.value) || !this.voters.markVotedWithin(voterId)) {
        return fail(CoreErrorCode.ALREADY_VOTED, 'Voter has already voted');
      }

      this.audit.appendWithin({ electionId, eventType: 'voter.authenticated', actorRef: 'token-vault' });
      return ok(this.issueWithin(electionId));
    });
  }

  /**
   * Redeem a ballot token inside the caller's transaction
   *
   * `guard` runs after the token checks and before the token is marked used;
   * a failing guard leaves the token untouched.
   */
  redeemWithin(
    ballotToken: string,
    guard?: (electionId: string) => Result<unknown>
  ): Result<RedeemedBallotToken> {
    if (!isWellFormedToken(ballotToken)) {
      return fail(CoreErrorCode.INVALID_TOKEN, 'Invalid ballot token');
    }

    const tokenHash = tokenDigest(ballotToken);
    const record = this.repository.find(tokenHash);
    if (!record || !secureCompare(record.tokenHash, tokenHash)) {
      return fail(CoreErrorCode.INVALID_TOKEN, 'Invalid ballot token');
    }
    if (record.used) {
      return fail(CoreErrorCode.ALREADY_USED, 'Ballot token already used');
    }

    const now = this.clock();
    if (now.getTime() > Date.parse(record.expiresAt)) {
      return fail(CoreErrorCode.EXPIRED, 'Ballot token expired');
    }

    if (guard) {
      const allowed = guard(record.electionId);
      if (!allowed.ok) {
        return allowed;
      }
    }

    const usedAt = now.toISOString();
    if (!this.repository.redeem(tokenHash, usedAt)) {
      return fail(CoreErrorCode.ALREADY_USED, 'Ballot token already used');
    }
    return ok({ electionId: record.electionId, usedAt });
  }

  private issueWithin(electionId: string): IssuedBallotToken {
    const ballotToken = generateToken();
    const issuedAt = this.clock();
    const expiresAt = addMinutes(issuedAt, this.ttlMinutes).toISOString();

    this.repository.insert({
      tokenHash: tokenDigest(ballotToken),
      electionId,
      issuedAt: issuedAt.toISOString(),
      expiresAt,
    });
    this.audit.appendWithin({ electionId, eventType: 'ballot_token.issued', actorRef: 'token-vault' });

    this.logger.info({ electionId }, 'Ballot token issued');
    return { ballotToken, electionId, expiresAt };
  }

  private checkIdentityWithin(
    identityToken: string,
    options: ValidateOptions,
    votedCode: CoreErrorCode.ALREADY_USED | CoreErrorCode.ALREADY_VOTED
  ): Result<VoterRecord> {
    const voter = this.voters.findByIdentityTokenWithin(identityToken);
    if (!voter || !secureCompare(voter.identityTokenHash, tokenDigest(identityToken))) {
      return fail(CoreErrorCode.INVALID_TOKEN, 'Invalid identity token');
    }
    if (voter.hasVoted) {
      return fail(
        votedCode,
        votedCode === CoreErrorCode.ALREADY_VOTED ? 'Voter has already voted' : 'Identity token already used'
      );
    }
    if (isExpired(voter, this.clock())) {
      return fail(CoreErrorCode.EXPIRED, 'Identity token expired');
    }

    const election = this.elections.requireOpenWithin(voter.electionId);
    if (!election.ok) {
      return election;
    }

    if (!matchesSecondFactor(voter, options.secondFactor)) {
      this.logger.warn({ electionId: voter.electionId }, 'Second factor mismatch');
      return fail(CoreErrorCode.SECOND_FACTOR_MISMATCH, 'Second factor does not match');
    }

    return ok(voter);
  }
}
