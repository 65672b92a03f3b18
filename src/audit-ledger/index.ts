/**
 * Audit Ledger
 *
 * Append-only, hash-chained event log, one chain per election. Appends join
 * the caller's transaction, so an event is committed exactly when the state
 * change it records is committed.
 */

import { CoreErrorCode, fail, ok, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Storage } from '../storage/index.js';
import { canonicalize } from '../utils/canonical-json.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { chainBroken, sealEntry, verifyEntries } from './chain.js';
import { AuditRepository } from './repository.js';
import type {
  AuditEvent,
  AuditEventDraft,
  AuditExport,
  ChainAnchor,
  ChainVerification,
  ChainVerificationResult,
  EventQuery,
  ExportVerification,
  IntegrityAlertSink,
  VerifyOptions,
} from './types.js';

export * from './types.js';
export { computeEntryHash, computePayloadHash, verifyEntries, GENESIS_HASH } from './chain.js';

const MAX_PAGE = 1000;

export interface AuditLedgerConfig {
  storage: Storage;
  logger?: Logger;
  clock?: Clock;
  /** Called when verification finds a broken chain */
  onIntegrityAlert?: IntegrityAlertSink;
}

export class AuditLedger {
  private readonly storage: Storage;
  private readonly repository: AuditRepository;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly onIntegrityAlert: IntegrityAlertSink | undefined;

  constructor(config: AuditLedgerConfig) {
    this.storage = config.storage;
    this.repository = new AuditRepository(config.storage.db);
    this.logger = (config.logger ?? silentLogger()).child({ component: 'audit-ledger' });
    this.clock = config.clock ?? systemClock;
    this.onIntegrityAlert = config.onIntegrityAlert;
  }

  /**
   * Append an event in its own unit of work
   */
  append(draft: AuditEventDraft): Result<AuditEvent> {
    return this.storage.run('audit.append', () => ok(this.appendWithin(draft)));
  }

  /**
   * Append an event as part of the caller's transaction
   *
   * Throws on storage faults so the enclosing unit of work rolls back.
   */
  appendWithin(draft: AuditEventDraft): AuditEvent {
    return this.storage.transaction(() => {
      const event = sealEntry(this.repository.head(draft.electionId), {
        electionId: draft.electionId,
        eventType: draft.eventType,
        actorRef: draft.actorRef,
        payload: canonicalize(draft.payload ?? {}),
        recordedAt: this.clock().toISOString(),
      });
      this.repository.insert(event);

      this.logger.debug(
        { electionId: event.electionId, sequenceNo: event.sequenceNo, eventType: event.eventType },
        'Audit event appended'
      );
      return event;
    });
  }

  /**
   * Recompute an election's chain from genesis
   *
   * With an anchor, also fails when the chain no longer reaches it.
   */
  verifyChain(electionId: string, options: VerifyOptions = {}): ChainVerificationResult {
    const result = this.storage.snapshot('audit.verifyChain', () =>
      this.checkChainWithin(electionId, options.anchor)
    );

    if (!result.ok && result.error.code === CoreErrorCode.CHAIN_BROKEN) {
      const failure = { ...result.error, electionId };
      this.logger.fatal(
        { electionId, atSequence: failure.atSequence, reason: failure.reason },
        'Audit chain integrity failure'
      );
      this.onIntegrityAlert?.(failure);
    }

    return result;
  }

  getEvents(electionId: string, query: EventQuery = {}): Result<AuditEvent[]> {
    const fromSequence = query.fromSequence ?? 1;
    const limit = query.limit ?? MAX_PAGE;

    if (!Number.isInteger(fromSequence) || fromSequence < 1) {
      return fail(CoreErrorCode.INVALID_INPUT, 'fromSequence must be a positive integer');
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE) {
      return fail(CoreErrorCode.INVALID_INPUT, `limit must be between 1 and ${MAX_PAGE}`);
    }

    return this.storage.read('audit.getEvents', () =>
      ok(this.repository.list(electionId, fromSequence, limit))
    );
  }

  /**
   * Current head of an election's chain, for publishing as an anchor
   */
  head(electionId: string): Result<ChainAnchor | null> {
    return this.storage.read('audit.head', () => ok(this.repository.head(electionId)));
  }

  /**
   * Export the whole ledger of an election in one consistent read
   *
   * The export carries its own verification result but does not raise an
   * integrity alert; `verifyChain` does.
   */
  export(electionId: string): Result<AuditExport> {
    return this.storage.snapshot('audit.export', () => {
      const events: AuditEvent[] = [];
      let fromSequence = 1;
      for (;;) {
        const page = this.repository.list(electionId, fromSequence, MAX_PAGE);
        events.push(...page);
        const last = page[page.length - 1];
        if (!last || page.length < MAX_PAGE) {
          break;
        }
        fromSequence = last.sequenceNo + 1;
      }

      const last = events[events.length - 1];
      const verified = this.checkChainWithin(electionId);
      const verification: ExportVerification = verified.ok
        ? { intact: true, length: verified.value.length }
        : { intact: false, atSequence: verified.error.atSequence, reason: verified.error.reason };

      const exported: AuditExport = {
        electionId,
        exportedAt: this.clock().toISOString(),
        head: last ? { sequenceNo: last.sequenceNo, entryHash: last.entryHash } : null,
        verification,
        events,
      };
      return ok(exported);
    });
  }

  /**
   * Verify the stored chain inside the caller's read
   *
   * An intact chain whose head is still linked to by some other row has lost
   * its tail, typically to a row moved into another election.
   */
  private checkChainWithin(electionId: string, anchor?: ChainAnchor): ChainVerification {
    const events: AuditEvent[] = [];
    for (const row of this.repository.scan(electionId)) {
      if (!row.ok) {
        const prefix = verifyEntries(electionId, events);
        return prefix.ok ? chainBroken(row.position, 'malformed_entry') : prefix;
      }
      events.push(row.event);
    }

    const verified = verifyEntries(electionId, events, anchor);
    if (verified.ok && verified.value.length > 0 && this.repository.hasSuccessor(verified.value.headHash)) {
      return chainBroken(verified.value.length + 1, 'truncated');
    }
    return verified;
  }

  countEvents(electionId: string, eventType: AuditEventDraft['eventType']): Result<number> {
    return this.storage.read('audit.countEvents', () =>
      ok(this.repository.countByType(electionId, eventType))
    );
  }
}
