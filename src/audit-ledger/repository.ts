/**
 * SQL access to `audit.audit_events`
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { AuditEvent, ChainAnchor } from './types.js';

const AuditRowSchema = z.object({
  election_id: z.string(),
  sequence_no: z.number().int().positive(),
  event_type: z.string(),
  actor_ref: z.string(),
  payload: z.string(),
  payload_hash: z.string(),
  prev_hash: z.string(),
  entry_hash: z.string(),
  recorded_at: z.string(),
});

const HeadRowSchema = z.object({
  sequence_no: z.number().int().positive(),
  entry_hash: z.string(),
});

type AuditRow = z.infer<typeof AuditRowSchema>;

const COLUMNS = `election_id, sequence_no, event_type, actor_ref, payload,
  payload_hash, prev_hash, entry_hash, recorded_at`;

function toEvent(row: AuditRow): AuditEvent {
  return {
    electionId: row.election_id,
    sequenceNo: row.sequence_no,
    eventType: row.event_type,
    actorRef: row.actor_ref,
    payload: row.payload,
    payloadHash: row.payload_hash,
    prevHash: row.prev_hash,
    entryHash: row.entry_hash,
    recordedAt: row.recorded_at,
  };
}

/**
 * A stored row, or the position of one that no longer parses
 */
export type ScannedRow = { ok: true; event: AuditEvent } | { ok: false; position: number };

export class AuditRepository {
  constructor(private readonly db: Database.Database) {}

  head(electionId: string): ChainAnchor | null {
    const row = this.db
      .prepare(
        `SELECT sequence_no, entry_hash FROM audit.audit_events
         WHERE election_id = ? ORDER BY sequence_no DESC LIMIT 1`
      )
      .get(electionId);
    if (row === undefined) {
      return null;
    }
    const parsed = HeadRowSchema.parse(row);
    return { sequenceNo: parsed.sequence_no, entryHash: parsed.entry_hash };
  }

  insert(event: AuditEvent): void {
    this.db
      .prepare(
        `INSERT INTO audit.audit_events (${COLUMNS})
         VALUES (@electionId, @sequenceNo, @eventType, @actorRef, @payload,
                 @payloadHash, @prevHash, @entryHash, @recordedAt)`
      )
      .run(event);
  }

  list(electionId: string, fromSequence: number, limit: number): AuditEvent[] {
    const rows = this.db
      .prepare(
        `SELECT ${COLUMNS} FROM audit.audit_events
         WHERE election_id = ? AND sequence_no >= ?
         ORDER BY sequence_no LIMIT ?`
      )
      .all(electionId, fromSequence, limit);
    return rows.map((row) => toEvent(AuditRowSchema.parse(row)));
  }

  /**
   * Every row of an election in storage order, without trusting its shape
   */
  scan(electionId: string): ScannedRow[] {
    const rows = this.db
      .prepare(`SELECT ${COLUMNS} FROM audit.audit_events WHERE election_id = ? ORDER BY sequence_no`)
      .all(electionId);

    return rows.map((row, index): ScannedRow => {
      const parsed = AuditRowSchema.safeParse(row);
      return parsed.success ? { ok: true, event: toEvent(parsed.data) } : { ok: false, position: index + 1 };
    });
  }

  /**
   * Whether any row, in any election, links to `entryHash`
   */
  hasSuccessor(entryHash: string): boolean {
    return (
      this.db.prepare('SELECT 1 FROM audit.audit_events WHERE prev_hash = ? LIMIT 1').get(entryHash) !==
      undefined
    );
  }

  countByType(electionId: string, eventType: string): number {
    const row = this.db
      .prepare(
        'SELECT COUNT(*) AS count FROM audit.audit_events WHERE election_id = ? AND event_type = ?'
      )
      .get(electionId, eventType);
    return z.object({ count: z.number() }).parse(row).count;
  }
}
