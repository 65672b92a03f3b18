/**
 * Ballot Store
 *
 * Holds sealed ballots keyed only by the digest of the ballot token that
 * cast them. Redemption, the ballot insert and the `ballot.cast` audit event
 * commit as one unit, so a failed cast leaves the token redeemable and a
 * retry stores exactly one ballot.
 */

import type { AuditLedger } from '../audit-ledger/index.js';
import { generateToken, hash, isSealedChoice, isWellFormedToken, tokenDigest } from '../crypto/index.js';
import type { ElectionRegistry } from '../elections/index.js';
import { CoreErrorCode, fail, ok, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Storage } from '../storage/index.js';
import type { TokenVault } from '../token-vault/index.js';
import { BallotRepository } from './repository.js';
import type {
  CastReceipt,
  EncryptedBallot,
  ReceiptVerification,
  TallyGate,
  TallyPage,
  TallyPageQuery,
} from './types.js';

export * from './types.js';

export const DEFAULT_TALLY_PAGE_SIZE = 500;
export const MAX_TALLY_PAGE_SIZE = 5000;

/** Upper bound on a sealed envelope, in characters */
const MAX_ENCRYPTED_CHOICE_LENGTH = 16_384;

export interface BallotBoxConfig {
  storage: Storage;
  audit: AuditLedger;
  elections: ElectionRegistry;
  vault: TokenVault;
  logger?: Logger;
  tallyPageSize?: number;
}

/**
 * Lazy, restartable walk over an election's ballots
 *
 * Each iteration starts from the first ballot and fetches pages by keyset,
 * so no statement stays open between pages. A storage fault while iterating
 * is thrown.
 */
export class TallyCursor implements Iterable<EncryptedBallot> {
  constructor(
    private readonly repository: BallotRepository,
    readonly electionId: string,
    private readonly pageSize: number
  ) {}

  *[Symbol.iterator](): Iterator<EncryptedBallot> {
    let after = 0;
    for (;;) {
      const page = this.repository.page(this.electionId, after, this.pageSize);
      yield* page;

      const last = page[page.length - 1];
      if (!last || page.length < this.pageSize) {
        return;
      }
      after = last.ballotId;
    }
  }
}

export class BallotBox {
  private readonly storage: Storage;
  private readonly audit: AuditLedger;
  private readonly elections: ElectionRegistry;
  private readonly vault: TokenVault;
  private readonly repository: BallotRepository;
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(config: BallotBoxConfig) {
    this.storage = config.storage;
    this.audit = config.audit;
    this.elections = config.elections;
    this.vault = config.vault;
    this.repository = new BallotRepository(config.storage.db);
    this.logger = (config.logger ?? silentLogger()).child({ component: 'ballot-box' });
    this.pageSize = config.tallyPageSize ?? DEFAULT_TALLY_PAGE_SIZE;
  }

  /**
   * Cast a sealed ballot with a ballot token
   *
   * The server checks only the envelope shape; it cannot read the choice.
   */
  cast(ballotToken: string, encryptedChoice: string): Result<CastReceipt> {
    if (encryptedChoice.length > MAX_ENCRYPTED_CHOICE_LENGTH || !isSealedChoice(encryptedChoice)) {
      return fail(CoreErrorCode.INVALID_INPUT, 'Encrypted choice is not a sealed ballot envelope');
    }

    return this.storage.run('ballots.cast', () => {
      const redeemed = this.vault.redeemWithin(ballotToken, (electionId) =>
        this.elections.requireOpenWithin(electionId)
      );
      if (!redeemed.ok) {
        return redeemed;
      }

      const { electionId, usedAt: castAt } = redeemed.value;
      const ballotHash = hash(encryptedChoice);
      const receipt = generateToken();

      this.repository.insert({
        ballotTokenHash: tokenDigest(ballotToken),
        electionId,
        encryptedChoice,
        ballotHash,
        receiptHash: tokenDigest(receipt),
        castAt,
      });
      this.audit.appendWithin({
        electionId,
        eventType: 'ballot.cast',
        actorRef: 'ballot-box',
        payload: { ballotHash },
      });

      this.logger.info({ electionId }, 'Ballot cast');
      return ok({ electionId, receipt, ballotHash, castAt });
    });
  }

  /**
   * Release an election's ballots for tallying
   *
   * @param gate - Reports whether the election is closed; defaults to the election registry
   */
  readForTally(electionId: string, gate?: TallyGate): Result<TallyCursor> {
    const closed = this.checkGate(electionId, gate);
    if (!closed.ok) {
      return closed;
    }
    return ok(new TallyCursor(this.repository, electionId, this.pageSize));
  }

  /**
   * One page of the tally, for callers that page over a network
   */
  readTallyPage(electionId: string, query: TallyPageQuery = {}, gate?: TallyGate): Result<TallyPage> {
    const after = query.after ?? 0;
    const limit = query.limit ?? this.pageSize;
    if (!Number.isInteger(after) || after < 0) {
      return fail(CoreErrorCode.INVALID_INPUT, 'after must be a non-negative integer');
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_TALLY_PAGE_SIZE) {
      return fail(CoreErrorCode.INVALID_INPUT, `limit must be between 1 and ${MAX_TALLY_PAGE_SIZE}`);
    }

    const closed = this.checkGate(electionId, gate);
    if (!closed.ok) {
      return closed;
    }

    return this.storage.read('ballots.tallyPage', () => {
      const ballots = this.repository.page(electionId, after, limit);
      const last = ballots[ballots.length - 1];
      return ok({
        electionId,
        ballots,
        nextCursor: last && ballots.length === limit ? last.ballotId : null,
      });
    });
  }

  /**
   * Look up the ballot a receipt was issued for
   */
  verifyReceipt(receipt: string): Result<ReceiptVerification> {
    if (!isWellFormedToken(receipt)) {
      return fail(CoreErrorCode.INVALID_TOKEN, 'Unknown receipt');
    }
    return this.storage.read('ballots.verifyReceipt', () => {
      const found = this.repository.findByReceiptHash(tokenDigest(receipt));
      return found ? ok(found) : fail(CoreErrorCode.INVALID_TOKEN, 'Unknown receipt');
    });
  }

  countBallots(electionId: string): Result<number> {
    return this.storage.read('ballots.count', () => ok(this.repository.count(electionId)));
  }

  private checkGate(electionId: string, gate: TallyGate | undefined): Result<null> {
    const closed = (gate ?? ((id: string) => this.elections.isClosed(id)))(electionId);
    if (!closed.ok) {
      return closed;
    }
    if (!closed.value) {
      return fail(CoreErrorCode.ELECTION_NOT_CLOSED, `Election ${electionId} is not closed`);
    }
    return ok(null);
  }
}
