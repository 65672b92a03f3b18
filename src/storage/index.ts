/**
 * Storage for the voting core
 *
 * One better-sqlite3 connection with each namespace attached from its own
 * file (or its own in-memory database). Transactions are taken IMMEDIATE so
 * that writers are serialized by SQLite's reserved lock, including across
 * processes sharing the files. A transaction started while another is open
 * becomes a savepoint of the outer one.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { join } from 'path';
import {
  storageUnavailable,
  type CoreFailure,
  type Result,
  type StorageUnavailableFailure,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { MIGRATIONS, type Namespace } from './migrations.js';

export { GENESIS_HASH, MIGRATIONS, type Namespace } from './migrations.js';

/**
 * Storage configuration
 */
export interface StorageConfig {
  /** Directory holding the namespace files; omit for in-memory storage */
  dataDir?: string;

  /** How long a writer waits for the lock before failing (default: 5000ms) */
  busyTimeoutMs?: number;

  logger?: Logger;
}

const NAMESPACE_FILES: Record<Exclude<Namespace, 'main'>, string> = {
  identity: 'identity.db',
  ballots: 'ballots.db',
  audit: 'audit.db',
};

const CORE_FILE = 'core.db';

/**
 * Open connection plus transaction boundary
 */
export class Storage {
  readonly db: Database.Database;
  private readonly logger: Logger;

  private constructor(db: Database.Database, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Open (or create) the namespace files and apply pending migrations
   */
  static open(config: StorageConfig = {}): Storage {
    const logger = (config.logger ?? silentLogger()).child({ component: 'storage' });
    const { dataDir } = config;

    if (dataDir) {
      mkdirSync(dataDir, { recursive: true });
    }

    const db = new Database(dataDir ? join(dataDir, CORE_FILE) : ':memory:');
    db.pragma(`busy_timeout = ${config.busyTimeoutMs ?? 5000}`);
    db.pragma('foreign_keys = ON');

    for (const [namespace, file] of Object.entries(NAMESPACE_FILES)) {
      db.prepare(`ATTACH DATABASE ? AS ${namespace}`).run(dataDir ? join(dataDir, file) : ':memory:');
    }

    const storage = new Storage(db, logger);
    storage.migrate();

    logger.info({ persistent: Boolean(dataDir) }, 'Storage opened');
    return storage;
  }

  /**
   * Run `work` inside an IMMEDIATE transaction
   *
   * Any exception rolls the whole unit back and propagates.
   */
  transaction<T>(work: () => T): T {
    return this.db.transaction(work).immediate();
  }

  /**
   * Run a unit of work and map storage faults to `STORAGE_UNAVAILABLE`
   *
   * When called inside an already open transaction the fault is rethrown, so
   * the outermost unit of work decides and rolls back everything it did.
   */
  run<T, E extends CoreFailure>(
    operation: string,
    work: () => Result<T, E>
  ): Result<T, E | StorageUnavailableFailure> {
    if (this.db.inTransaction) {
      return this.transaction(work);
    }

    try {
      return this.transaction(work);
    } catch (error) {
      if (isStorageFault(error)) {
        this.logger.error(
          { operation, sqliteCode: error.code, reason: error.message },
          'Storage fault, unit of work rolled back'
        );
        return storageUnavailable(operation, error.code);
      }
      throw error;
    }
  }

  /**
   * Run a read and map storage faults to `STORAGE_UNAVAILABLE`
   */
  read<T, E extends CoreFailure>(
    operation: string,
    work: () => Result<T, E>
  ): Result<T, E | StorageUnavailableFailure> {
    try {
      return work();
    } catch (error) {
      if (isStorageFault(error)) {
        this.logger.error(
          { operation, sqliteCode: error.code, reason: error.message },
          'Storage fault during read'
        );
        return storageUnavailable(operation, error.code);
      }
      throw error;
    }
  }

  /**
   * Run several reads in one DEFERRED transaction
   *
   * The reads see a single committed state and hold only a shared lock, so
   * they neither wait for nor block a writer that has merely reserved.
   */
  snapshot<T, E extends CoreFailure>(
    operation: string,
    work: () => Result<T, E>
  ): Result<T, E | StorageUnavailableFailure> {
    return this.read(operation, () => this.db.transaction(work).deferred());
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.info('Storage closed');
    }
  }

  private migrate(): void {
    for (const [namespace, migrations] of Object.entries(MIGRATIONS)) {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS ${namespace}._migrations (
          id INTEGER PRIMARY KEY,
          applied_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
      `);

      const applied = this.db.prepare(`SELECT 1 FROM ${namespace}._migrations WHERE id = ?`);
      const record = this.db.prepare(`INSERT INTO ${namespace}._migrations (id) VALUES (?)`);
      migrations.forEach((sql, id) => {
        if (applied.get(id) !== undefined) {
          return;
        }
        // Another process may have applied it since the check above
        this.transaction(() => {
          if (applied.get(id) !== undefined) {
            return;
          }
          this.logger.info({ namespace, migration: id }, 'Running migration');
          this.db.exec(sql);
          record.run(id);
        });
      });
    }
  }
}

export type SqliteFault = InstanceType<typeof Database.SqliteError>;

/**
 * True for errors raised by SQLite itself
 */
export function isStorageFault(error: unknown): error is SqliteFault {
  return error instanceof Database.SqliteError;
}
