/**
 * Audit ledger types
 */

import type { CoreErrorCode, CoreFailure, Result, StorageUnavailableFailure } from '../errors.js';
import type { JsonObject } from '../utils/canonical-json.js';

/**
 * Events recorded by the core
 *
 * Payloads never carry voter identifiers, token values or choices.
 */
export type AuditEventType =
  | 'election.created'
  | 'election.opened'
  | 'election.closed'
  | 'voters.imported'
  | 'identity_token.reissued'
  | 'voter.authenticated'
  | 'ballot_token.issued'
  | 'ballot.cast';

/** Services that append to the ledger */
export type ActorRef =
  | 'election-registry'
  | 'voter-registry'
  | 'token-vault'
  | 'ballot-box';

/**
 * One sealed ledger entry as stored
 *
 * `eventType` and `actorRef` stay plain strings here because verification
 * must handle whatever the table holds.
 */
export interface AuditEvent {
  electionId: string;
  sequenceNo: number;
  eventType: string;
  actorRef: string;
  /** Canonical JSON of the payload */
  payload: string;
  payloadHash: string;
  prevHash: string;
  entryHash: string;
  /** ISO-8601 timestamp, hashed as stored */
  recordedAt: string;
}

/**
 * Fields chosen by the caller of `append`
 */
export interface AuditEventDraft {
  electionId: string;
  eventType: AuditEventType;
  actorRef: ActorRef;
  payload?: JsonObject;
}

/**
 * A previously published head of the chain
 *
 * Verifying against an anchor also detects truncation of the tail.
 */
export interface ChainAnchor {
  sequenceNo: number;
  entryHash: string;
}

export type ChainBreakReason =
  | 'sequence_gap'
  | 'prev_hash_mismatch'
  | 'payload_hash_mismatch'
  | 'entry_hash_mismatch'
  | 'malformed_entry'
  | 'truncated'
  | 'anchor_mismatch';

export interface ChainBrokenFailure extends CoreFailure {
  code: CoreErrorCode.CHAIN_BROKEN;
  /** First sequence number that fails recomputation */
  atSequence: number;
  reason: ChainBreakReason;
}

export interface ChainIntact {
  electionId: string;
  /** Number of verified entries */
  length: number;
  /** Entry hash of the last entry, or the genesis hash for an empty chain */
  headHash: string;
}

export type ChainVerification = Result<ChainIntact, ChainBrokenFailure>;

export type ChainVerificationResult = Result<
  ChainIntact,
  ChainBrokenFailure | StorageUnavailableFailure
>;

export interface EventQuery {
  /** First sequence number to return (default: 1) */
  fromSequence?: number;
  limit?: number;
}

/**
 * Self-contained copy of an election's ledger for offline verification
 */
export interface AuditExport {
  electionId: string;
  exportedAt: string;
  head: ChainAnchor | null;
  verification: ExportVerification;
  events: AuditEvent[];
}

export type ExportVerification =
  | { intact: true; length: number }
  | { intact: false; atSequence: number; reason: ChainBreakReason };

export interface VerifyOptions {
  /**
   * Previously published head the chain must still reach
   *
   * Without one, a removed tail is only caught while some stored row still
   * links to the remaining head. A chain emptied entirely, or a tail deleted
   * outright, verifies as intact.
   */
  anchor?: ChainAnchor;
}

/**
 * Receives integrity alerts when verification fails
 */
export type IntegrityAlertSink = (failure: ChainBrokenFailure & { electionId: string }) => void;
