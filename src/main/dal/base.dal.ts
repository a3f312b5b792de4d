/**
 * Base Data Access Layer
 *
 * Abstract base class for the card DALs. All queries use prepared
 * statements with parameter binding; table and key names come from the
 * subclass, never from callers.
 *
 * @module main/dal/base
 */

import { randomUUID } from 'crypto';
import type { DatabaseInstance } from '../services/database.service';
import { StorageUnavailableError } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('dal');

// ============================================================================
// Base DAL Class
// ============================================================================

/**
 * @template T - Row type of the table
 */
export abstract class BaseDAL<T extends object> {
  /** Table name (must match schema exactly) */
  protected abstract readonly tableName: string;

  /** Primary key column name */
  protected abstract readonly primaryKey: string;

  constructor(protected readonly db: DatabaseInstance) {}

  protected generateId(): string {
    return randomUUID();
  }

  protected now(): string {
    return new Date().toISOString();
  }

  // ==========================================================================
  // Read Operations
  // ==========================================================================

  /**
   * Find row by primary key
   */
  findById(id: string): T | undefined {
    return this.guard('findById', () =>
      this.db
        .prepare<[string], T>(`SELECT * FROM ${this.tableName} WHERE ${this.primaryKey} = ?`)
        .get(id)
    );
  }

  count(): number {
    return this.guard('count', () => {
      const row = this.db
        .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${this.tableName}`)
        .get();
      return row?.count ?? 0;
    });
  }

  // ==========================================================================
  // Delete Operations
  // ==========================================================================

  /**
   * Delete row by primary key
   *
   * @returns true if a row was deleted
   */
  delete(id: string): boolean {
    return this.guard('delete', () => {
      const result = this.db
        .prepare(`DELETE FROM ${this.tableName} WHERE ${this.primaryKey} = ?`)
        .run(id);

      log.debug('delete executed', {
        table: this.tableName,
        id,
        deleted: result.changes > 0,
      });

      return result.changes > 0;
    });
  }

  // ==========================================================================
  // Transaction & Error Helpers
  // ==========================================================================

  /**
   * Execute function within a database transaction.
   * Commits on success, rolls back on error.
   */
  protected withTransaction<R>(fn: () => R): R {
    return this.db.transaction(fn)();
  }

  /**
   * Run a storage call, turning SQLite failures (closed handle, locked
   * or corrupt file, I/O errors) into StorageUnavailableError.
   * Domain errors thrown inside `fn` pass through unchanged.
   */
  protected guard<R>(operation: string, fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      if (isSqliteFailure(error)) {
        log.error('Storage operation failed', {
          table: this.tableName,
          operation,
          error: error.message,
        });
        throw new StorageUnavailableError(this.tableName, operation, { cause: error });
      }
      throw error;
    }
  }
}

/**
 * better-sqlite3 raises SqliteError (with a SQLITE_* code) for engine
 * failures and TypeError once the connection is closed.
 */
function isSqliteFailure(error: unknown): error is Error {
  if (!(error instanceof Error)) return false;
  if (error.name === 'SqliteError') return true;
  return error instanceof TypeError && /database connection is not open/i.test(error.message);
}
