/**
 * Hash chain arithmetic
 *
 * entryHash = SHA-256(prevHash | canonical(content) | sequenceNo), where
 * content is the election id, event type, actor, payload hash and recorded
 * timestamp. The first entry of every election links to the genesis hash.
 * Nothing here touches storage, so exported ledgers verify offline.
 */

import { hash } from '../crypto/index.js';
import { CoreErrorCode } from '../errors.js';
import { GENESIS_HASH } from '../storage/migrations.js';
import { canonicalize } from '../utils/canonical-json.js';
import type {
  AuditEvent,
  ChainAnchor,
  ChainBreakReason,
  ChainBrokenFailure,
  ChainVerification,
} from './types.js';

export { GENESIS_HASH };

export type EntryContent = Pick<
  AuditEvent,
  'electionId' | 'sequenceNo' | 'eventType' | 'actorRef' | 'payloadHash' | 'prevHash' | 'recordedAt'
>;

export function computePayloadHash(payload: string): string {
  return hash(payload);
}

export function computeEntryHash(entry: EntryContent): string {
  const content = canonicalize({
    electionId: entry.electionId,
    eventType: entry.eventType,
    actorRef: entry.actorRef,
    payloadHash: entry.payloadHash,
    recordedAt: entry.recordedAt,
  });
  return hash(`${entry.prevHash}|${content}|${entry.sequenceNo}`);
}

/**
 * Seal a new entry on top of the current head
 */
export function sealEntry(
  head: ChainAnchor | null,
  entry: Omit<AuditEvent, 'sequenceNo' | 'payloadHash' | 'prevHash' | 'entryHash'>
): AuditEvent {
  const sequenceNo = head ? head.sequenceNo + 1 : 1;
  const prevHash = head ? head.entryHash : GENESIS_HASH;
  const payloadHash = computePayloadHash(entry.payload);
  const entryHash = computeEntryHash({ ...entry, sequenceNo, prevHash, payloadHash });

  return { ...entry, sequenceNo, payloadHash, prevHash, entryHash };
}

export function chainBroken(
  atSequence: number,
  reason: ChainBreakReason
): { ok: false; error: ChainBrokenFailure } {
  return {
    ok: false,
    error: {
      code: CoreErrorCode.CHAIN_BROKEN,
      message: `Audit chain broken at sequence ${atSequence} (${reason})`,
      atSequence,
      reason,
    },
  };
}

/**
 * Recompute a chain from genesis
 *
 * Events must be one election's entries in sequence order. The first entry
 * that fails recomputation is reported.
 */
export function verifyEntries(
  electionId: string,
  events: readonly AuditEvent[],
  anchor?: ChainAnchor
): ChainVerification {
  let prevHash = GENESIS_HASH;
  let expected = 1;

  for (const event of events) {
    if (event.sequenceNo !== expected) {
      return chainBroken(expected, 'sequence_gap');
    }
    if (event.prevHash !== prevHash) {
      return chainBroken(expected, 'prev_hash_mismatch');
    }
    if (computePayloadHash(event.payload) !== event.payloadHash) {
      return chainBroken(expected, 'payload_hash_mismatch');
    }
    if (event.electionId !== electionId || computeEntryHash({ ...event, prevHash }) !== event.entryHash) {
      return chainBroken(expected, 'entry_hash_mismatch');
    }
    prevHash = event.entryHash;
    expected++;
  }

  if (anchor) {
    if (events.length < anchor.sequenceNo) {
      return chainBroken(events.length + 1, 'truncated');
    }
    const anchored = events[anchor.sequenceNo - 1];
    if (!anchored || anchored.entryHash !== anchor.entryHash) {
      return chainBroken(anchor.sequenceNo, 'anchor_mismatch');
    }
  }

  return {
    ok: true,
    value: { electionId, length: events.length, headHash: prevHash },
  };
}
