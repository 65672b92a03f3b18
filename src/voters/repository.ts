/**
 * SQL access to `identity.voters`
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { assertTransition } from './state-machine.js';
import { VoterState, type StateCounts, type VoterRecord } from './types.js';

const VoterRowSchema = z.object({
  voter_id: z.string(),
  election_id: z.string(),
  external_ref: z.string(),
  identity_token_hash: z.string(),
  second_factor_hash: z.string().nullable(),
  second_factor_salt: z.string().nullable(),
  state: z.nativeEnum(VoterState),
  has_voted: z.union([z.literal(0), z.literal(1)]),
  issued_at: z.string(),
  expires_at: z.string(),
});

const StateCountRowSchema = z.object({
  state: z.nativeEnum(VoterState),
  count: z.number().int(),
});

function toRecord(row: z.infer<typeof VoterRowSchema>): VoterRecord {
  return {
    voterId: row.voter_id,
    electionId: row.election_id,
    externalRef: row.external_ref,
    identityTokenHash: row.identity_token_hash,
    secondFactorHash: row.second_factor_hash,
    secondFactorSalt: row.second_factor_salt,
    state: row.state,
    hasVoted: row.has_voted === 1,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
  };
}

export class VoterRepository {
  constructor(private readonly db: Database.Database) {}

  insert(voter: VoterRecord): void {
    this.db
      .prepare(
        `INSERT INTO identity.voters
           (voter_id, election_id, external_ref, identity_token_hash, second_factor_hash,
            second_factor_salt, state, has_voted, issued_at, expires_at)
         VALUES (@voterId, @electionId, @externalRef, @identityTokenHash, @secondFactorHash,
                 @secondFactorSalt, @state, @hasVoted, @issuedAt, @expiresAt)`
      )
      .run({ ...voter, hasVoted: voter.hasVoted ? 1 : 0 });
  }

  get(voterId: string): VoterRecord | null {
    return this.one('SELECT * FROM identity.voters WHERE voter_id = ?', voterId);
  }

  findByTokenHash(identityTokenHash: string): VoterRecord | null {
    return this.one('SELECT * FROM identity.voters WHERE identity_token_hash = ?', identityTokenHash);
  }

  findByExternalRef(electionId: string, externalRef: string): VoterRecord | null {
    return this.one(
      'SELECT * FROM identity.voters WHERE election_id = ? AND external_ref = ?',
      electionId,
      externalRef
    );
  }

  /**
   * Compare-and-set the voter state
   *
   * @returns false when another writer moved the voter first
   */
  transition(voterId: string, from: VoterState, to: VoterState): boolean {
    assertTransition(from, to);
    const info = this.db
      .prepare(
        `UPDATE identity.voters SET state = ?, has_voted = ?
         WHERE voter_id = ? AND state = ? AND has_voted = 0`
      )
      .run(to, to === VoterState.VOTED ? 1 : 0, voterId, from);
    return info.changes === 1;
  }

  /**
   * Replace the identity token of a voter who has not voted
   */
  replaceToken(voterId: string, identityTokenHash: string, issuedAt: string, expiresAt: string): boolean {
    const info = this.db
      .prepare(
        `UPDATE identity.voters SET identity_token_hash = ?, issued_at = ?, expires_at = ?
         WHERE voter_id = ? AND has_voted = 0`
      )
      .run(identityTokenHash, issuedAt, expiresAt, voterId);
    return info.changes === 1;
  }

  countByState(electionId: string): StateCounts {
    const counts: StateCounts = {
      [VoterState.INVITED]: 0,
      [VoterState.AUTHENTICATED]: 0,
      [VoterState.VOTED]: 0,
    };
    const rows = this.db
      .prepare('SELECT state, COUNT(*) AS count FROM identity.voters WHERE election_id = ? GROUP BY state')
      .all(electionId);
    for (const row of rows) {
      const parsed = StateCountRowSchema.parse(row);
      counts[parsed.state] = parsed.count;
    }
    return counts;
  }

  private one(sql: string, ...params: string[]): VoterRecord | null {
    const row = this.db.prepare(sql).get(...params);
    return row === undefined ? null : toRecord(VoterRowSchema.parse(row));
  }
}
