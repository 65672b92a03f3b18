/**
 * SQL access to `ballots.encrypted_ballots`
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { EncryptedBallot, ReceiptVerification } from './types.js';

const BallotRowSchema = z.object({
  ballot_id: z.number().int(),
  election_id: z.string(),
  encrypted_choice: z.string(),
  ballot_hash: z.string(),
  cast_at: z.string(),
});

const ReceiptRowSchema = z.object({
  election_id: z.string(),
  ballot_hash: z.string(),
  cast_at: z.string(),
});

export interface NewBallot {
  ballotTokenHash: string;
  electionId: string;
  encryptedChoice: string;
  ballotHash: string;
  receiptHash: string;
  castAt: string;
}

export class BallotRepository {
  constructor(private readonly db: Database.Database) {}

  insert(ballot: NewBallot): void {
    this.db
      .prepare(
        `INSERT INTO ballots.encrypted_ballots
           (ballot_token_hash, election_id, encrypted_choice, ballot_hash, receipt_hash, cast_at)
         VALUES (@ballotTokenHash, @electionId, @encryptedChoice, @ballotHash, @receiptHash, @castAt)`
      )
      .run(ballot);
  }

  /**
   * One keyset page of an election's ballots in storage order
   */
  page(electionId: string, after: number, limit: number): EncryptedBallot[] {
    return this.db
      .prepare(
        `SELECT ballot_id, election_id, encrypted_choice, ballot_hash, cast_at
         FROM ballots.encrypted_ballots
         WHERE election_id = ? AND ballot_id > ?
         ORDER BY ballot_id LIMIT ?`
      )
      .all(electionId, after, limit)
      .map((row) => {
        const parsed = BallotRowSchema.parse(row);
        return {
          ballotId: parsed.ballot_id,
          electionId: parsed.election_id,
          encryptedChoice: parsed.encrypted_choice,
          ballotHash: parsed.ballot_hash,
          castAt: parsed.cast_at,
        };
      });
  }

  findByReceiptHash(receiptHash: string): ReceiptVerification | null {
    const row = this.db
      .prepare('SELECT election_id, ballot_hash, cast_at FROM ballots.encrypted_ballots WHERE receipt_hash = ?')
      .get(receiptHash);
    if (row === undefined) {
      return null;
    }
    const parsed = ReceiptRowSchema.parse(row);
    return { electionId: parsed.election_id, ballotHash: parsed.ballot_hash, castAt: parsed.cast_at };
  }

  count(electionId: string): number {
    const count = this.db
      .prepare('SELECT COUNT(*) FROM ballots.encrypted_ballots WHERE election_id = ?')
      .pluck()
      .get(electionId);
    return z.number().int().parse(count);
  }
}
