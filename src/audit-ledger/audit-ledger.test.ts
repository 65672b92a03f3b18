/**
 * Tests for the stored audit ledger
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CoreErrorCode, unwrap } from '../errors.js';
import { Storage } from '../storage/index.js';
import { AuditLedger, GENESIS_HASH, verifyEntries } from './index.js';

describe('AuditLedger', () => {
  let storage: Storage;
  let ledger: AuditLedger;
  let now: Date;

  beforeEach(() => {
    storage = Storage.open();
    now = new Date('2026-03-01T09:00:00.000Z');
    ledger = new AuditLedger({ storage, clock: () => now });
  });

  afterEach(() => {
    storage.close();
  });

  function appendCasts(count: number, electionId = 'election-1'): void {
    for (let i = 0; i < count; i++) {
      unwrap(
        ledger.append({
          electionId,
          eventType: 'ballot.cast',
          actorRef: 'ballot-box',
          payload: { ballotHash: `hash-${i}` },
        })
      );
    }
  }

  describe('append', () => {
    it('should start every election at sequence 1 from genesis', () => {
      const first = unwrap(ledger.append({ electionId: 'election-1', eventType: 'election.created', actorRef: 'election-registry' }));
      const other = unwrap(ledger.append({ electionId: 'election-2', eventType: 'election.created', actorRef: 'election-registry' }));

      expect(first.sequenceNo).toBe(1);
      expect(first.prevHash).toBe(GENESIS_HASH);
      expect(other.sequenceNo).toBe(1);
      expect(other.prevHash).toBe(GENESIS_HASH);
    });

    it('should store the payload canonically with the clock time', () => {
      const event = unwrap(
        ledger.append({
          electionId: 'election-1',
          eventType: 'voters.imported',
          actorRef: 'voter-registry',
          payload: { skipped: 0, added: 3 },
        })
      );

      expect(event.payload).toBe('{"added":3,"skipped":0}');
      expect(event.recordedAt).toBe('2026-03-01T09:00:00.000Z');
    });

    it('should roll back with the enclosing transaction', () => {
      expect(() =>
        storage.transaction(() => {
          ledger.appendWithin({ electionId: 'election-1', eventType: 'ballot.cast', actorRef: 'ballot-box' });
          throw new Error('caller failed');
        })
      ).toThrow('caller failed');

      expect(unwrap(ledger.getEvents('election-1'))).toEqual([]);
    });
  });

  describe('verifyChain', () => {
    it('should verify an intact chain', () => {
      appendCasts(4);
      expect(ledger.verifyChain('election-1')).toMatchObject({ ok: true, value: { length: 4 } });
    });

    it('should verify an election with no events', () => {
      expect(ledger.verifyChain('election-empty')).toEqual({
        ok: true,
        value: { electionId: 'election-empty', length: 0, headHash: GENESIS_HASH },
      });
    });

    it('should detect a payload rewritten behind the triggers', () => {
      const alerts = vi.fn();
      ledger = new AuditLedger({ storage, clock: () => now, onIntegrityAlert: alerts });
      appendCasts(5);

      storage.db.exec('DROP TRIGGER audit.audit_events_no_update');
      storage.db
        .prepare('UPDATE audit.audit_events SET payload = ? WHERE election_id = ? AND sequence_no = ?')
        .run('{"ballotHash":"forged"}', 'election-1', 3);

      expect(ledger.verifyChain('election-1')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.CHAIN_BROKEN, atSequence: 3, reason: 'payload_hash_mismatch' },
      });
      expect(alerts).toHaveBeenCalledTimes(1);
      expect(alerts.mock.calls[0]?.[0]).toMatchObject({ electionId: 'election-1', atSequence: 3 });
    });

    it('should detect an entry moved to another election', () => {
      appendCasts(4);
      storage.db.exec('DROP TRIGGER audit.audit_events_no_update');
      storage.db
        .prepare('UPDATE audit.audit_events SET election_id = ? WHERE election_id = ? AND sequence_no = ?')
        .run('election-9', 'election-1', 1);

      expect(ledger.verifyChain('election-1')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.CHAIN_BROKEN, atSequence: 1, reason: 'sequence_gap' },
      });
      expect(ledger.verifyChain('election-9')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.CHAIN_BROKEN, atSequence: 1, reason: 'entry_hash_mismatch' },
      });
    });

    it('should detect a last entry moved to another election without an anchor', () => {
      appendCasts(4);
      storage.db.exec('DROP TRIGGER audit.audit_events_no_update');
      storage.db
        .prepare('UPDATE audit.audit_events SET election_id = ? WHERE election_id = ? AND sequence_no = ?')
        .run('election-9', 'election-1', 4);

      expect(ledger.verifyChain('election-1')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.CHAIN_BROKEN, atSequence: 4, reason: 'truncated' },
      });
      expect(unwrap(ledger.export('election-1')).verification).toEqual({
        intact: false,
        atSequence: 4,
        reason: 'truncated',
      });
    });

    it('should not mistake another election for a successor', () => {
      appendCasts(2, 'election-1');
      appendCasts(2, 'election-2');

      expect(ledger.verifyChain('election-1')).toMatchObject({ ok: true, value: { length: 2 } });
      expect(ledger.verifyChain('election-3')).toMatchObject({ ok: true, value: { length: 0 } });
    });

    it('should report a row that no longer parses as malformed', () => {
      appendCasts(3);
      storage.db.exec('DROP TRIGGER audit.audit_events_no_update');
      storage.db
        .prepare("UPDATE audit.audit_events SET payload = X'7b7d' WHERE election_id = ? AND sequence_no = ?")
        .run('election-1', 2);

      expect(ledger.verifyChain('election-1')).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.CHAIN_BROKEN, atSequence: 2, reason: 'malformed_entry' },
      });
    });

    it('should detect truncation against a published head', () => {
      appendCasts(4);
      const head = unwrap(ledger.head('election-1'));
      if (!head) throw new Error('expected a head');

      storage.db.exec('DROP TRIGGER audit.audit_events_no_delete');
      storage.db
        .prepare('DELETE FROM audit.audit_events WHERE election_id = ? AND sequence_no = ?')
        .run('election-1', 4);

      expect(ledger.verifyChain('election-1').ok).toBe(true);
      expect(ledger.verifyChain('election-1', { anchor: head })).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.CHAIN_BROKEN, atSequence: 4, reason: 'truncated' },
      });
    });
  });

  describe('storage guards', () => {
    it('should refuse updates and deletes', () => {
      appendCasts(2);
      expect(() =>
        storage.db.prepare("UPDATE audit.audit_events SET actor_ref = 'x' WHERE sequence_no = 1").run()
      ).toThrow('audit_events is append-only');
      expect(() => storage.db.prepare('DELETE FROM audit.audit_events').run()).toThrow(
        'audit_events is append-only'
      );
    });

    it('should refuse an insert that skips a sequence number', () => {
      appendCasts(1);
      const [event] = unwrap(ledger.getEvents('election-1'));
      if (!event) throw new Error('expected an event');

      expect(() =>
        storage.db
          .prepare(
            `INSERT INTO audit.audit_events VALUES (?, 3, 'ballot.cast', 'ballot-box', '{}', ?, ?, ?, ?)`
          )
          .run('election-1', event.payloadHash, GENESIS_HASH, 'a'.repeat(64), event.recordedAt)
      ).toThrow('audit sequence must be gap-free');
    });

    it('should refuse an insert that does not link to its predecessor', () => {
      appendCasts(1);
      expect(() =>
        storage.db
          .prepare(
            `INSERT INTO audit.audit_events VALUES (?, 2, 'ballot.cast', 'ballot-box', '{}', ?, ?, ?, ?)`
          )
          .run('election-1', 'b'.repeat(64), 'c'.repeat(64), 'd'.repeat(64), now.toISOString())
      ).toThrow('audit entry must link to its predecessor');
    });
  });

  describe('reads', () => {
    it('should page events by sequence number', () => {
      appendCasts(5);
      const page = unwrap(ledger.getEvents('election-1', { fromSequence: 2, limit: 2 }));
      expect(page.map((event) => event.sequenceNo)).toEqual([2, 3]);
    });

    it('should reject an invalid page request', () => {
      expect(ledger.getEvents('election-1', { fromSequence: 0 })).toMatchObject({
        ok: false,
        error: { code: CoreErrorCode.INVALID_INPUT },
      });
    });

    it('should export a ledger that verifies offline', () => {
      appendCasts(3);
      const exported = unwrap(ledger.export('election-1'));

      expect(exported.events).toHaveLength(3);
      expect(exported.head).toEqual({ sequenceNo: 3, entryHash: exported.events[2]?.entryHash });
      expect(exported.exportedAt).toBe('2026-03-01T09:00:00.000Z');
      expect(exported.verification).toEqual({ intact: true, length: 3 });
      expect(verifyEntries('election-1', exported.events, exported.head ?? undefined).ok).toBe(true);
    });

    it('should export while another connection holds the write lock', () => {
      const dataDir = mkdtempSync(join(tmpdir(), 'audit-export-'));
      const writer = Storage.open({ dataDir });
      const reader = Storage.open({ dataDir, busyTimeoutMs: 50 });
      try {
        const writerLedger = new AuditLedger({ storage: writer, clock: () => now });
        unwrap(writerLedger.append({ electionId: 'election-1', eventType: 'election.created', actorRef: 'election-registry' }));

        writer.db.exec('BEGIN IMMEDIATE');
        const exported = new AuditLedger({ storage: reader, clock: () => now }).export('election-1');
        writer.db.exec('ROLLBACK');

        expect(exported).toMatchObject({ ok: true, value: { verification: { intact: true, length: 1 } } });
      } finally {
        reader.close();
        writer.close();
        rmSync(dataDir, { recursive: true, force: true });
      }
    });

    it('should count events by type', () => {
      appendCasts(3);
      unwrap(ledger.append({ electionId: 'election-1', eventType: 'election.closed', actorRef: 'election-registry' }));
      expect(unwrap(ledger.countEvents('election-1', 'ballot.cast'))).toBe(3);
    });
  });
});
