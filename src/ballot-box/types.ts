/**
 * Ballot Store types
 */

import type { Result } from '../errors.js';

/**
 * A stored ballot as released for tallying
 *
 * The ballot token digest stays in storage; nothing here leads back to it.
 */
export interface EncryptedBallot {
  /** Storage cursor, not a voter or token reference */
  ballotId: number;
  electionId: string;
  encryptedChoice: string;
  ballotHash: string;
  castAt: string;
}

export interface CastReceipt {
  electionId: string;
  /** Shown once; lets the voter check later that their ballot was stored */
  receipt: string;
  ballotHash: string;
  castAt: string;
}

export interface ReceiptVerification {
  electionId: string;
  ballotHash: string;
  castAt: string;
}

export interface TallyPageQuery {
  /** Return ballots after this cursor (default: from the start) */
  after?: number;
  limit?: number;
}

export interface TallyPage {
  electionId: string;
  ballots: EncryptedBallot[];
  /** Cursor for the next page, or null when this page ends the tally */
  nextCursor: number | null;
}

/**
 * Decides whether an election's ballots may be released
 */
export type TallyGate = (electionId: string) => Result<boolean>;
