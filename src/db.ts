import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import { STORE_BUSY_TIMEOUT_MS, STORE_MAX_ATTEMPTS } from './config.js';
import {
  ConflictError,
  StorageUnavailableError,
} from './errors.js';
import { logger } from './logger.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface AgentStoreOptions {
  busyTimeoutMs?: number;
  /** Total attempts for a transaction that keeps failing with SQLITE_BUSY */
  maxAttempts?: number;
  clock?: Clock;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS working_memory (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    context_key   TEXT NOT NULL,
    content       TEXT NOT NULL,
    priority      INTEGER NOT NULL DEFAULT 5 CHECK(priority BETWEEN 1 AND 10),
    created_at    TEXT NOT NULL,
    expires_at    TEXT NOT NULL,
    CHECK(expires_at > created_at)
  );

  CREATE TABLE IF NOT EXISTS episodic_memory (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    event_type    TEXT NOT NULL,
    content       TEXT NOT NULL,
    significance  REAL NOT NULL DEFAULT 0.5 CHECK(significance BETWEEN 0 AND 1),
    created_at    TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS semantic_memory (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    concept       TEXT UNIQUE NOT NULL,
    definition    TEXT NOT NULL,
    confidence    REAL NOT NULL DEFAULT 0.5 CHECK(confidence BETWEEN 0 AND 1),
    created_at    TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS procedural_memory (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    skill_name      TEXT UNIQUE NOT NULL,
    steps           TEXT NOT NULL,
    success_rate    REAL NOT NULL DEFAULT 0.5 CHECK(success_rate BETWEEN 0 AND 1),
    execution_count INTEGER NOT NULL DEFAULT 0 CHECK(execution_count >= 0),
    created_at      TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS goals (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    name          TEXT NOT NULL,
    description   TEXT NOT NULL DEFAULT '',
    status        TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active','completed')),
    created_at    TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tasks (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    goal_id       INTEGER NOT NULL REFERENCES goals(id),
    title         TEXT NOT NULL,
    status        TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending','in_progress','completed','blocked')),
    priority      INTEGER NOT NULL DEFAULT 5,
    created_at    TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_working_expires ON working_memory(expires_at);
  CREATE INDEX IF NOT EXISTS idx_working_key ON working_memory(context_key);
  CREATE INDEX IF NOT EXISTS idx_episodic_type ON episodic_memory(event_type);
  CREATE INDEX IF NOT EXISTS idx_goals_status ON goals(status);
  CREATE INDEX IF NOT EXISTS idx_tasks_goal ON tasks(goal_id);
  CREATE INDEX IF NOT EXISTS idx_tasks_selection ON tasks(status, priority DESC, id);

  CREATE TRIGGER IF NOT EXISTS tasks_goal_id_immutable
  BEFORE UPDATE OF goal_id ON tasks
  WHEN NEW.goal_id <> OLD.goal_id
  BEGIN
    SELECT RAISE(ABORT, 'task goal_id is immutable');
  END;
`;

const IO_FAILURE_CODES = [
  'SQLITE_CANTOPEN',
  'SQLITE_FULL',
  'SQLITE_IOERR',
  'SQLITE_READONLY',
  'SQLITE_PERM',
  'SQLITE_NOTADB',
  'SQLITE_CORRUPT',
];

function sqliteCode(err: unknown): string | null {
  return err instanceof Database.SqliteError ? err.code : null;
}

function isBusy(code: string): boolean {
  return code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Handle on the single SQLite file holding every memory tier and the
 * goal/task tables. Components receive it at construction; there is no
 * module-level connection.
 */
export class AgentStore {
  readonly db: Database.Database;
  private readonly maxAttempts: number;
  private readonly clock: Clock;

  constructor(
    readonly dbPath: string,
    options: AgentStoreOptions = {},
  ) {
    const attempts = options.maxAttempts ?? STORE_MAX_ATTEMPTS;
    this.maxAttempts = Number.isFinite(attempts) ? Math.max(1, Math.floor(attempts)) : 1;
    this.clock = options.clock ?? systemClock;

    let db: Database.Database | null = null;
    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? STORE_BUSY_TIMEOUT_MS}`);
      db.exec(SCHEMA);
    } catch (err) {
      db?.close();
      throw new StorageUnavailableError(
        `Cannot open agent store at ${dbPath}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this.db = db;
  }

  /** Creates missing tables and indexes. Never drops or rewrites data. */
  ensureSchema(): void {
    this.guard(() => this.db.exec(SCHEMA));
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Run `fn` in an IMMEDIATE transaction: the write lock is held from the
   * first statement, so a read-then-write inside `fn` cannot interleave
   * with another writer. Any throw rolls everything back. Called inside
   * another transaction it becomes a savepoint of the outer one.
   */
  write<T>(fn: (db: Database.Database) => T): T {
    if (this.db.inTransaction) {
      return this.db.transaction(fn)(this.db);
    }
    return this.withRetry('write', () => this.db.transaction(fn).immediate(this.db));
  }

  /** Run `fn` in a DEFERRED transaction so all its reads share one snapshot. */
  read<T>(fn: (db: Database.Database) => T): T {
    if (this.db.inTransaction) {
      return fn(this.db);
    }
    return this.withRetry('read', () => this.db.transaction(fn).deferred(this.db));
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  checkpointWal(): void {
    if (this.dbPath !== ':memory:') {
      this.guard(() => this.db.pragma('wal_checkpoint(TRUNCATE)'));
    }
  }

  close(): void {
    if (!this.db.open) return;
    this.checkpointWal();
    this.db.close();
  }

  private withRetry<T>(label: 'read' | 'write', run: () => T): T {
    for (let attempt = 1; ; attempt++) {
      try {
        return this.guard(run);
      } catch (err) {
        const code = sqliteCode(err);
        if (!code || !isBusy(code)) throw err;
        if (attempt >= this.maxAttempts) {
          throw new ConflictError(
            `Agent store stayed locked after ${attempt} attempt(s) (${code})`,
            attempt,
            { cause: err },
          );
        }
        // busy_timeout already backed off inside SQLite before this surfaced
        logger.warn({ attempt, code, label }, 'Agent store busy, retrying transaction');
      }
    }
  }

  /** Translates I/O-level SQLite failures; everything else passes through. */
  private guard<T>(run: () => T): T {
    try {
      return run();
    } catch (err) {
      const code = sqliteCode(err);
      if (code && IO_FAILURE_CODES.some((prefix) => code.startsWith(prefix))) {
        throw new StorageUnavailableError(
          `Agent store I/O failure (${code}): ${errorMessage(err)}`,
          { cause: err },
        );
      }
      throw err;
    }
  }
}

export function openAgentStore(
  dbPath: string,
  options?: AgentStoreOptions,
): AgentStore {
  const store = new AgentStore(dbPath, options);
  logger.debug({ dbPath }, 'Agent store opened');
  return store;
}

/** Current time as the ISO text stored in every timestamp column. */
export function isoNow(store: AgentStore): string {
  return store.now().toISOString();
}
