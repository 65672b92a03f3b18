/**
 * SQL access to `ballots.ballot_tokens`
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { BallotTokenRecord } from './types.js';

const BallotTokenRowSchema = z.object({
  token_hash: z.string(),
  election_id: z.string(),
  issued_at: z.string(),
  expires_at: z.string(),
  used: z.union([z.literal(0), z.literal(1)]),
  used_at: z.string().nullable(),
});

export class BallotTokenRepository {
  constructor(private readonly db: Database.Database) {}

  insert(record: Omit<BallotTokenRecord, 'used' | 'usedAt'>): void {
    this.db
      .prepare(
        `INSERT INTO ballots.ballot_tokens (token_hash, election_id, issued_at, expires_at)
         VALUES (@tokenHash, @electionId, @issuedAt, @expiresAt)`
      )
      .run(record);
  }

  find(tokenHash: string): BallotTokenRecord | null {
    const row = this.db.prepare('SELECT * FROM ballots.ballot_tokens WHERE token_hash = ?').get(tokenHash);
    if (row === undefined) {
      return null;
    }
    const parsed = BallotTokenRowSchema.parse(row);
    return {
      tokenHash: parsed.token_hash,
      electionId: parsed.election_id,
      issuedAt: parsed.issued_at,
      expiresAt: parsed.expires_at,
      used: parsed.used === 1,
      usedAt: parsed.used_at,
    };
  }

  /**
   * Compare-and-set `used`
   *
   * @returns false when the token was already redeemed
   */
  redeem(tokenHash: string, usedAt: string): boolean {
    const info = this.db
      .prepare('UPDATE ballots.ballot_tokens SET used = 1, used_at = ? WHERE token_hash = ? AND used = 0')
      .run(usedAt, tokenHash);
    return info.changes === 1;
  }
}
