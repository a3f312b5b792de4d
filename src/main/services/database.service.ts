/**
 * Database Service
 *
 * Opens and maintains the two SQLite databases: the primary card store and
 * the offline store (cache, pending queue, reconcile log). Each caller owns
 * the handle it opens; DALs receive it through their constructor.
 *
 * @module main/services/database
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Database instance type exported for DAL usage
 */
export type DatabaseInstance = Database.Database;

export type SynchronousMode = 'OFF' | 'NORMAL' | 'FULL';

export interface DatabaseOptions {
  /** File path, or ':memory:' for an in-process database */
  dbPath: string;
  /** Label used in logs ("primary", "offline") */
  name?: string;
  /**
   * SQLite synchronous pragma. The offline store uses FULL so that an
   * enqueued operation survives power loss once enqueue returns.
   */
  synchronous?: SynchronousMode;
  /** Enable verbose SQL logging (debug only) */
  verbose?: boolean;
  /** Memory limit for SQLite in KB (default: 16MB) */
  memoryLimit?: number;
}

export interface DatabaseHealth {
  isOpen: boolean;
  tableCount: number;
  sizeBytes: number;
  path: string;
}

// ============================================================================
// Constants
// ============================================================================

const MEMORY_PATH = ':memory:';
const DEFAULT_MEMORY_LIMIT_KB = 16 * 1024;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('database');

// ============================================================================
// Database Initialization
// ============================================================================

/**
 * Open a database and apply connection pragmas
 *
 * @throws Error if the file cannot be opened or is unreadable
 */
export function openDatabase(options: DatabaseOptions): DatabaseInstance {
  const name = options.name ?? path.basename(options.dbPath);
  const inMemory = options.dbPath === MEMORY_PATH;

  if (!inMemory) {
    const dbDir = path.dirname(options.dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
      log.debug('Database directory created', { name, path: dbDir });
    }
  }

  let db: DatabaseInstance;
  try {
    db = new Database(options.dbPath, {
      verbose: options.verbose
        ? (message?: unknown) =>
            log.debug('SQL executed', { name, sql: String(message).substring(0, 200) })
        : undefined,
    });
  } catch (error) {
    log.error('Failed to open database file', {
      name,
      path: options.dbPath,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw new Error(
      `Failed to open database ${name}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    );
  }

  try {
    db.exec('SELECT count(*) FROM sqlite_master');
  } catch (error) {
    db.close();
    log.error('Database access verification failed', {
      name,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw new Error(`Database ${name} access verification failed. The file may be corrupted.`, {
      cause: error,
    });
  }

  applyConnectionPragmas(db, options, inMemory);

  log.info('Database opened', {
    name,
    path: options.dbPath,
    synchronous: options.synchronous ?? 'NORMAL',
  });

  return db;
}

function applyConnectionPragmas(
  db: DatabaseInstance,
  options: DatabaseOptions,
  inMemory: boolean
): void {
  // WAL is not available for in-memory databases
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }

  db.pragma(`synchronous = ${options.synchronous ?? 'NORMAL'}`);

  const memoryLimit = options.memoryLimit ?? DEFAULT_MEMORY_LIMIT_KB;
  db.pragma(`cache_size = -${memoryLimit}`);

  db.pragma('foreign_keys = ON');
  db.pragma('temp_store = MEMORY');
  // Wait for a concurrent writer (another process on the same file) instead of failing
  db.pragma('busy_timeout = 5000');
}

// ============================================================================
// Database Health & Maintenance
// ============================================================================

export function getDatabaseHealth(db: DatabaseInstance): DatabaseHealth {
  const tableCountResult = db
    .prepare<[], { count: number }>(
      "SELECT COUNT(*) as count FROM sqlite_master WHERE type = 'table'"
    )
    .get();

  let sizeBytes = 0;
  if (!db.memory && fs.existsSync(db.name)) {
    sizeBytes = fs.statSync(db.name).size;
  }

  return {
    isOpen: db.open,
    tableCount: tableCountResult?.count ?? 0,
    sizeBytes,
    path: db.name,
  };
}

/**
 * Run integrity check on database
 *
 * @returns true if database passes integrity check
 */
export function checkDatabaseIntegrity(db: DatabaseInstance): boolean {
  const result = db.pragma('integrity_check', { simple: true });
  const isOk = result === 'ok';

  if (isOk) {
    log.debug('Database integrity check passed', { path: db.name });
  } else {
    log.error('Database integrity check failed', { path: db.name, result });
  }

  return isOk;
}

// ============================================================================
// Database Lifecycle
// ============================================================================

/**
 * Checkpoint the WAL and close the connection. Safe to call twice.
 */
export function closeDatabase(db: DatabaseInstance): void {
  if (!db.open) return;

  try {
    if (!db.memory) {
      db.pragma('wal_checkpoint(TRUNCATE)');
    }
  } finally {
    db.close();
    log.info('Database closed', { path: db.name });
  }
}
