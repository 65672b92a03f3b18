/**
 * SQL access to `main.elections` and `main.election_options`
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ElectionStatus, type Election, type ElectionOption } from './types.js';

const ElectionRowSchema = z.object({
  election_id: z.string(),
  title: z.string(),
  description: z.string(),
  public_key: z.string(),
  status: z.nativeEnum(ElectionStatus),
  created_at: z.string(),
  opened_at: z.string().nullable(),
  closed_at: z.string().nullable(),
});

const OptionRowSchema = z.object({
  option_id: z.string(),
  text: z.string(),
  display_order: z.number().int(),
});

export class ElectionRepository {
  constructor(private readonly db: Database.Database) {}

  insert(election: Election): void {
    this.db
      .prepare(
        `INSERT INTO main.elections
           (election_id, title, description, public_key, status, created_at, opened_at, closed_at)
         VALUES (@electionId, @title, @description, @publicKey, @status, @createdAt, @openedAt, @closedAt)`
      )
      .run({
        electionId: election.electionId,
        title: election.title,
        description: election.description,
        publicKey: election.publicKey,
        status: election.status,
        createdAt: election.createdAt,
        openedAt: election.openedAt,
        closedAt: election.closedAt,
      });

    const insertOption = this.db.prepare(
      `INSERT INTO main.election_options (election_id, option_id, text, display_order)
       VALUES (?, ?, ?, ?)`
    );
    for (const option of election.options) {
      insertOption.run(election.electionId, option.optionId, option.text, option.order);
    }
  }

  get(electionId: string): Election | null {
    const row = this.db.prepare('SELECT * FROM main.elections WHERE election_id = ?').get(electionId);
    return row === undefined ? null : this.toElection(ElectionRowSchema.parse(row));
  }

  list(): Election[] {
    return this.db
      .prepare('SELECT * FROM main.elections ORDER BY created_at, election_id')
      .all()
      .map((row) => this.toElection(ElectionRowSchema.parse(row)));
  }

  /**
   * Move `from` to `to`; false when the status changed underneath
   */
  transition(electionId: string, from: ElectionStatus, to: ElectionStatus, at: string): boolean {
    const column = to === ElectionStatus.OPEN ? 'opened_at' : 'closed_at';
    const info = this.db
      .prepare(
        `UPDATE main.elections SET status = ?, ${column} = ?
         WHERE election_id = ? AND status = ?`
      )
      .run(to, at, electionId, from);
    return info.changes === 1;
  }

  private options(electionId: string): ElectionOption[] {
    return this.db
      .prepare(
        `SELECT option_id, text, display_order FROM main.election_options
         WHERE election_id = ? ORDER BY display_order`
      )
      .all(electionId)
      .map((row) => {
        const parsed = OptionRowSchema.parse(row);
        return { optionId: parsed.option_id, text: parsed.text, order: parsed.display_order };
      });
  }

  private toElection(row: z.infer<typeof ElectionRowSchema>): Election {
    return {
      electionId: row.election_id,
      title: row.title,
      description: row.description,
      options: this.options(row.election_id),
      publicKey: row.public_key,
      status: row.status,
      createdAt: row.created_at,
      openedAt: row.opened_at,
      closedAt: row.closed_at,
    };
  }
}
