/**
 * Database Bootstrap Service
 *
 * Opens and migrates the two card databases:
 * - primary: authoritative card records and applied operations
 * - offline: card cache, pending operation queue, reconcile log
 *
 * If either database fails to open or migrate, both are closed again and
 * the error is rethrown.
 *
 * @module main/services/database-bootstrap
 */

import { randomUUID } from 'crypto';
import {
  openDatabase,
  closeDatabase,
  getDatabaseHealth,
  checkDatabaseIntegrity,
  type DatabaseHealth,
  type DatabaseInstance,
} from './database.service';
import {
  migrateDatabase,
  getCurrentSchemaVersion,
  type MigrationSummary,
} from './migration.service';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface BootstrapOptions {
  primaryDbPath: string;
  offlineDbPath: string;
  /** Verbose SQL logging */
  verbose?: boolean;
}

export interface CardDatabases {
  primary: DatabaseInstance;
  offline: DatabaseInstance;
}

export interface BootstrapResult {
  databases: CardDatabases;
  /** Correlation ID for matching bootstrap log lines */
  correlationId: string;
  migrations: {
    primary: MigrationSummary;
    offline: MigrationSummary;
  };
  durationMs: number;
}

export interface DatabaseHealthReport extends DatabaseHealth {
  schemaVersion: number;
  integrityOk: boolean;
}

export interface HealthCheckResult {
  healthy: boolean;
  primary: DatabaseHealthReport | null;
  offline: DatabaseHealthReport | null;
  errors: string[];
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('database-bootstrap');

// ============================================================================
// Bootstrap
// ============================================================================

/**
 * Open and migrate both card databases
 *
 * @throws Error from the first database that cannot be opened or migrated
 */
export function bootstrapDatabases(options: BootstrapOptions): BootstrapResult {
  const startTime = Date.now();
  const correlationId = randomUUID();
  const opened: DatabaseInstance[] = [];

  log.info('Bootstrapping card databases', {
    correlationId,
    primaryDbPath: options.primaryDbPath,
    offlineDbPath: options.offlineDbPath,
  });

  try {
    const primary = openDatabase({
      dbPath: options.primaryDbPath,
      name: 'primary',
      synchronous: 'NORMAL',
      verbose: options.verbose,
    });
    opened.push(primary);

    // Queue writes must be durable when enqueue returns
    const offline = openDatabase({
      dbPath: options.offlineDbPath,
      name: 'offline',
      synchronous: 'FULL',
      verbose: options.verbose,
    });
    opened.push(offline);

    const migrations = {
      primary: migrateDatabase(primary, 'primary'),
      offline: migrateDatabase(offline, 'offline'),
    };

    const durationMs = Date.now() - startTime;
    log.info('Card databases ready', {
      correlationId,
      primaryVersion: getCurrentSchemaVersion(primary),
      offlineVersion: getCurrentSchemaVersion(offline),
      durationMs,
    });

    return { databases: { primary, offline }, correlationId, migrations, durationMs };
  } catch (error) {
    log.error('Database bootstrap failed', {
      correlationId,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    for (const db of opened) {
      closeQuietly(db);
    }
    throw error;
  }
}

/**
 * Health snapshot of both databases; never throws
 */
export function performHealthCheck(databases: CardDatabases): HealthCheckResult {
  const errors: string[] = [];

  const report = (label: string, db: DatabaseInstance): DatabaseHealthReport | null => {
    try {
      return {
        ...getDatabaseHealth(db),
        schemaVersion: getCurrentSchemaVersion(db),
        integrityOk: checkDatabaseIntegrity(db),
      };
    } catch (error) {
      errors.push(`${label}: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return null;
    }
  };

  const primary = report('primary', databases.primary);
  const offline = report('offline', databases.offline);

  return {
    healthy:
      errors.length === 0 &&
      primary !== null &&
      offline !== null &&
      primary.integrityOk &&
      offline.integrityOk,
    primary,
    offline,
    errors,
  };
}

/**
 * Checkpoint and close both databases
 */
export function shutdownDatabases(databases: CardDatabases): void {
  closeQuietly(databases.primary);
  closeQuietly(databases.offline);
}

function closeQuietly(db: DatabaseInstance): void {
  try {
    closeDatabase(db);
  } catch (error) {
    log.error('Error closing database', {
      path: db.name,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
