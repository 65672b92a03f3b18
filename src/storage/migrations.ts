/**
 * Schema migrations, one list per storage namespace
 *
 * Each namespace lives in its own SQLite file. Nothing in the `ballots`
 * namespace carries a voter identifier, and no foreign key crosses between
 * namespaces. Append-only and monotonic rules are enforced by triggers so
 * they hold for any client that opens the files, not only for this code.
 */

export type Namespace = 'main' | 'identity' | 'ballots' | 'audit';

/** Hash used as `prev_hash` of the first audit entry of every election */
export const GENESIS_HASH = '0'.repeat(64);

export const MIGRATIONS: Record<Namespace, string[]> = {
  main: [
    // Migration 000: elections
    `
    CREATE TABLE IF NOT EXISTS main.elections (
      election_id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      public_key TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'draft' CHECK (status IN ('draft', 'open', 'closed')),
      created_at TEXT NOT NULL,
      opened_at TEXT,
      closed_at TEXT
    );

    CREATE INDEX IF NOT EXISTS main.idx_elections_status ON elections(status);

    CREATE TRIGGER IF NOT EXISTS main.elections_status_forward_only
    BEFORE UPDATE OF status ON elections
    WHEN (OLD.status = 'closed' AND NEW.status != 'closed')
      OR (OLD.status = 'open' AND NEW.status = 'draft')
    BEGIN
      SELECT RAISE(ABORT, 'election status cannot move backwards');
    END;

    CREATE TRIGGER IF NOT EXISTS main.elections_no_delete_after_open
    BEFORE DELETE ON elections
    WHEN OLD.status != 'draft'
    BEGIN
      SELECT RAISE(ABORT, 'opened elections cannot be deleted');
    END;
    `,

    // Migration 001: description and ballot options
    `
    ALTER TABLE main.elections ADD COLUMN description TEXT NOT NULL DEFAULT '';

    CREATE TABLE IF NOT EXISTS main.election_options (
      election_id TEXT NOT NULL REFERENCES elections(election_id),
      option_id TEXT NOT NULL,
      text TEXT NOT NULL,
      display_order INTEGER NOT NULL,
      PRIMARY KEY (election_id, option_id),
      UNIQUE (election_id, display_order)
    );

    CREATE TRIGGER IF NOT EXISTS main.election_options_insert_in_draft
    BEFORE INSERT ON election_options
    WHEN (SELECT status FROM elections WHERE election_id = NEW.election_id) != 'draft'
    BEGIN
      SELECT RAISE(ABORT, 'ballot options are fixed once the election opens');
    END;

    CREATE TRIGGER IF NOT EXISTS main.election_options_update_in_draft
    BEFORE UPDATE ON election_options
    WHEN (SELECT status FROM elections WHERE election_id = OLD.election_id) != 'draft'
    BEGIN
      SELECT RAISE(ABORT, 'ballot options are fixed once the election opens');
    END;

    CREATE TRIGGER IF NOT EXISTS main.election_options_delete_in_draft
    BEFORE DELETE ON election_options
    WHEN (SELECT status FROM elections WHERE election_id = OLD.election_id) != 'draft'
    BEGIN
      SELECT RAISE(ABORT, 'ballot options are fixed once the election opens');
    END;
    `,
  ],

  identity: [
    // Migration 000: voter records
    `
    CREATE TABLE IF NOT EXISTS identity.voters (
      voter_id TEXT PRIMARY KEY,
      election_id TEXT NOT NULL,
      external_ref TEXT NOT NULL,
      identity_token_hash TEXT NOT NULL UNIQUE,
      second_factor_hash TEXT,
      second_factor_salt TEXT,
      state TEXT NOT NULL DEFAULT 'invited' CHECK (state IN ('invited', 'authenticated', 'voted')),
      has_voted INTEGER NOT NULL DEFAULT 0 CHECK (has_voted IN (0, 1)),
      issued_at TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      UNIQUE (election_id, external_ref),
      CHECK ((state = 'voted') = (has_voted = 1))
    );

    CREATE INDEX IF NOT EXISTS identity.idx_voters_election ON voters(election_id, state);

    CREATE TRIGGER IF NOT EXISTS identity.voters_has_voted_monotonic
    BEFORE UPDATE OF has_voted ON voters
    WHEN OLD.has_voted = 1 AND NEW.has_voted = 0
    BEGIN
      SELECT RAISE(ABORT, 'has_voted is monotonic');
    END;

    CREATE TRIGGER IF NOT EXISTS identity.voters_state_forward_only
    BEFORE UPDATE OF state ON voters
    WHEN (OLD.state = 'voted' AND NEW.state != 'voted')
      OR (OLD.state = 'authenticated' AND NEW.state = 'invited')
    BEGIN
      SELECT RAISE(ABORT, 'voter state cannot move backwards');
    END;

    CREATE TRIGGER IF NOT EXISTS identity.voters_token_frozen_after_vote
    BEFORE UPDATE OF identity_token_hash, expires_at ON voters
    WHEN OLD.has_voted = 1
    BEGIN
      SELECT RAISE(ABORT, 'identity token of a voter who has voted cannot change');
    END;

    CREATE TRIGGER IF NOT EXISTS identity.voters_no_delete_after_vote
    BEFORE DELETE ON voters
    WHEN OLD.has_voted = 1
    BEGIN
      SELECT RAISE(ABORT, 'voters who have voted cannot be deleted');
    END;
    `,
  ],

  ballots: [
    // Migration 000: ballot tokens and encrypted ballots
    `
    CREATE TABLE IF NOT EXISTS ballots.ballot_tokens (
      token_hash TEXT PRIMARY KEY,
      election_id TEXT NOT NULL,
      issued_at TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      used INTEGER NOT NULL DEFAULT 0 CHECK (used IN (0, 1)),
      used_at TEXT
    ) WITHOUT ROWID;

    CREATE TRIGGER IF NOT EXISTS ballots.ballot_tokens_used_monotonic
    BEFORE UPDATE OF used ON ballot_tokens
    WHEN OLD.used = 1 AND NEW.used = 0
    BEGIN
      SELECT RAISE(ABORT, 'ballot token redemption is final');
    END;

    CREATE TRIGGER IF NOT EXISTS ballots.ballot_tokens_fixed_fields
    BEFORE UPDATE OF token_hash, election_id, issued_at, expires_at ON ballot_tokens
    BEGIN
      SELECT RAISE(ABORT, 'ballot token fields are immutable');
    END;

    CREATE TRIGGER IF NOT EXISTS ballots.ballot_tokens_no_delete
    BEFORE DELETE ON ballot_tokens
    BEGIN
      SELECT RAISE(ABORT, 'ballot tokens cannot be deleted');
    END;

    CREATE TABLE IF NOT EXISTS ballots.encrypted_ballots (
      ballot_id INTEGER PRIMARY KEY,
      ballot_token_hash TEXT NOT NULL UNIQUE REFERENCES ballot_tokens(token_hash),
      election_id TEXT NOT NULL,
      encrypted_choice TEXT NOT NULL,
      ballot_hash TEXT NOT NULL,
      receipt_hash TEXT NOT NULL UNIQUE,
      cast_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS ballots.idx_encrypted_ballots_election
      ON encrypted_ballots(election_id, ballot_id);

    CREATE TRIGGER IF NOT EXISTS ballots.encrypted_ballots_no_update
    BEFORE UPDATE ON encrypted_ballots
    BEGIN
      SELECT RAISE(ABORT, 'encrypted ballots are immutable');
    END;

    CREATE TRIGGER IF NOT EXISTS ballots.encrypted_ballots_no_delete
    BEFORE DELETE ON encrypted_ballots
    BEGIN
      SELECT RAISE(ABORT, 'encrypted ballots are immutable');
    END;
    `,
  ],

  audit: [
    // Migration 000: hash-chained audit events
    `
    CREATE TABLE IF NOT EXISTS audit.audit_events (
      election_id TEXT NOT NULL,
      sequence_no INTEGER NOT NULL CHECK (sequence_no >= 1),
      event_type TEXT NOT NULL,
      actor_ref TEXT NOT NULL,
      payload TEXT NOT NULL,
      payload_hash TEXT NOT NULL,
      prev_hash TEXT NOT NULL,
      entry_hash TEXT NOT NULL,
      recorded_at TEXT NOT NULL,
      PRIMARY KEY (election_id, sequence_no)
    );

    CREATE TRIGGER IF NOT EXISTS audit.audit_events_no_update
    BEFORE UPDATE ON audit_events
    BEGIN
      SELECT RAISE(ABORT, 'audit_events is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS audit.audit_events_no_delete
    BEFORE DELETE ON audit_events
    BEGIN
      SELECT RAISE(ABORT, 'audit_events is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS audit.audit_events_gap_free
    BEFORE INSERT ON audit_events
    WHEN NEW.sequence_no != COALESCE(
      (SELECT MAX(sequence_no) FROM audit_events WHERE election_id = NEW.election_id), 0
    ) + 1
    BEGIN
      SELECT RAISE(ABORT, 'audit sequence must be gap-free');
    END;

    CREATE TRIGGER IF NOT EXISTS audit.audit_events_linked
    BEFORE INSERT ON audit_events
    WHEN NEW.prev_hash != COALESCE(
      (SELECT entry_hash FROM audit_events
        WHERE election_id = NEW.election_id AND sequence_no = NEW.sequence_no - 1),
      '${GENESIS_HASH}'
    )
    BEGIN
      SELECT RAISE(ABORT, 'audit entry must link to its predecessor');
    END;
    `,

    // Migration 001: successor lookup by link
    `
    CREATE INDEX IF NOT EXISTS audit.idx_audit_events_prev_hash ON audit_events(prev_hash);
    `,
  ],
};
