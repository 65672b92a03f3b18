/**
 * SealedBallot
 *
 * Wires the voting core over one storage handle and exposes the operations
 * the REST layer and embedding applications use.
 *
 * @example
 * ```typescript
 * const core = SealedBallot.open({ dataDir: './data' });
 * const { publicKey, privateKey } = generateElectionKeyPair();
 * const election = unwrap(core.elections.createElection({ title: 'Board 2026', options: ['Yes', 'No'], publicKey }));
 * const { tokens } = unwrap(core.voters.importVoters(election.electionId, [{ externalRef: 'a@example.test' }]));
 * unwrap(core.elections.openElection(election.electionId));
 *
 * const { ballotToken } = unwrap(core.authenticateAndIssue(tokens[0].identityToken));
 * const ballot = unwrap(core.getBallot(election.electionId));
 * const receipt = unwrap(core.castBallot(ballotToken, sealChoice(ballot.options[0].optionId, ballot.publicKey, ballot.electionId)));
 * ```
 */

import { AuditLedger, type ChainVerificationResult, type IntegrityAlertSink, type VerifyOptions } from './audit-ledger/index.js';
import { BallotBox, type CastReceipt, type ReceiptVerification, type TallyCursor } from './ballot-box/index.js';
import { ElectionRegistry, type ElectionBallot } from './elections/index.js';
import type { Result } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { Storage } from './storage/index.js';
import { TokenVault, type IssuedBallotToken, type ValidateOptions } from './token-vault/index.js';
import { systemClock, type Clock } from './utils/clock.js';
import { VoterRegistry } from './voters/index.js';

export interface SealedBallotConfig {
  /** Directory holding the namespace files; omit for in-memory storage */
  dataDir?: string;
  logger?: Logger;
  clock?: Clock;
  identityTokenTtlHours?: number;
  ballotTokenTtlMinutes?: number;
  tallyPageSize?: number;
  onIntegrityAlert?: IntegrityAlertSink;
}

export class SealedBallot {
  readonly storage: Storage;
  readonly audit: AuditLedger;
  readonly elections: ElectionRegistry;
  readonly voters: VoterRegistry;
  readonly vault: TokenVault;
  readonly ballots: BallotBox;

  private constructor(storage: Storage, config: SealedBallotConfig) {
    const logger = config.logger ?? silentLogger();
    const clock = config.clock ?? systemClock;

    this.storage = storage;
    this.audit = new AuditLedger({ storage, logger, clock, onIntegrityAlert: config.onIntegrityAlert });
    this.elections = new ElectionRegistry({ storage, audit: this.audit, logger, clock });
    this.voters = new VoterRegistry({
      storage,
      audit: this.audit,
      elections: this.elections,
      logger,
      clock,
      identityTokenTtlHours: config.identityTokenTtlHours,
    });
    this.vault = new TokenVault({
      storage,
      audit: this.audit,
      elections: this.elections,
      voters: this.voters,
      logger,
      clock,
      ballotTokenTtlMinutes: config.ballotTokenTtlMinutes,
    });
    this.ballots = new BallotBox({
      storage,
      audit: this.audit,
      elections: this.elections,
      vault: this.vault,
      logger,
      tallyPageSize: config.tallyPageSize,
    });
  }

  static open(config: SealedBallotConfig = {}): SealedBallot {
    const storage = Storage.open({ dataDir: config.dataDir, logger: config.logger });
    return new SealedBallot(storage, config);
  }

  /**
   * Check an identity token and mark the voter authenticated
   */
  validateIdentity(identityToken: string, options?: ValidateOptions): Result<string> {
    return this.vault.validateIdentity(identityToken, options);
  }

  /**
   * Exchange an identity token for an unlinked ballot token
   */
  authenticateAndIssue(identityToken: string, options?: ValidateOptions): Result<IssuedBallotToken> {
    return this.vault.authenticateAndIssue(identityToken, options);
  }

  /**
   * Title, options and encryption key of an open election
   */
  getBallot(electionId: string): Result<ElectionBallot> {
    return this.elections.getBallot(electionId);
  }

  castBallot(ballotToken: string, encryptedChoice: string): Result<CastReceipt> {
    return this.ballots.cast(ballotToken, encryptedChoice);
  }

  verifyReceipt(receipt: string): Result<ReceiptVerification> {
    return this.ballots.verifyReceipt(receipt);
  }

  verifyAudit(electionId: string, options?: VerifyOptions): ChainVerificationResult {
    return this.audit.verifyChain(electionId, options);
  }

  /**
   * Ballots of a closed election
   */
  readForTally(electionId: string): Result<TallyCursor> {
    return this.ballots.readForTally(electionId, (id) => this.elections.isClosed(id));
  }

  isHealthy(): boolean {
    return this.storage.isOpen();
  }

  close(): void {
    this.storage.close();
  }
}
