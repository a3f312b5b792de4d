/**
 * Migration Service
 *
 * Schema versioning for the primary and offline databases.
 * Each migration runs in its own transaction and is recorded in
 * schema_migrations with a checksum of its SQL.
 *
 * @module main/services/migration
 */

import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { DatabaseInstance } from './database.service';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface Migration {
  /** Unique version number (must be sequential) */
  version: number;
  /** Human-readable migration name */
  name: string;
  sql: string;
}

export interface AppliedMigration {
  version: number;
  name: string;
  applied_at: string;
  checksum: string | null;
}

export interface MigrationResult {
  success: boolean;
  version: number;
  name: string;
  error?: string;
  durationMs: number;
}

export interface MigrationSummary {
  applied: MigrationResult[];
  skipped: number[];
  failed: MigrationResult | null;
  totalDurationMs: number;
}

/** Which schema set to load */
export type SchemaName = 'primary' | 'offline';

// ============================================================================
// Constants
// ============================================================================

const MIGRATION_TABLE = 'schema_migrations';

// Match files like v001_card_records.sql
const MIGRATION_FILE_PATTERN = /^v(\d{3})_(.+)\.sql$/;

const MIGRATIONS_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../migrations');

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('migration');

// ============================================================================
// Migration Table Management
// ============================================================================

export function initializeMigrationTable(db: DatabaseInstance): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now')),
      checksum TEXT
    )
  `);
}

export function getAppliedMigrations(db: DatabaseInstance): AppliedMigration[] {
  return db
    .prepare<[], AppliedMigration>(
      `SELECT version, name, applied_at, checksum FROM ${MIGRATION_TABLE} ORDER BY version ASC`
    )
    .all();
}

/**
 * @returns Latest applied migration version, or 0 if none applied
 */
export function getCurrentSchemaVersion(db: DatabaseInstance): number {
  const result = db
    .prepare<[], { version: number | null }>(`SELECT MAX(version) as version FROM ${MIGRATION_TABLE}`)
    .get();
  return result?.version ?? 0;
}

// ============================================================================
// Migration Execution
// ============================================================================

function calculateChecksum(sql: string): string {
  return createHash('sha256').update(sql).digest('hex').substring(0, 16);
}

/**
 * Apply a single migration within a transaction; rolls back on any error
 */
export function applyMigration(db: DatabaseInstance, migration: Migration): MigrationResult {
  const startTime = Date.now();

  try {
    db.transaction(() => {
      db.exec(migration.sql);
      db.prepare(`INSERT INTO ${MIGRATION_TABLE} (version, name, checksum) VALUES (?, ?, ?)`).run(
        migration.version,
        migration.name,
        calculateChecksum(migration.sql)
      );
    })();

    const durationMs = Date.now() - startTime;
    log.info('Migration applied', {
      path: db.name,
      version: migration.version,
      name: migration.name,
      durationMs,
    });

    return { success: true, version: migration.version, name: migration.name, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';

    log.error('Migration failed', {
      path: db.name,
      version: migration.version,
      name: migration.name,
      error: errorMessage,
    });

    return {
      success: false,
      version: migration.version,
      name: migration.name,
      error: errorMessage,
      durationMs,
    };
  }
}

// ============================================================================
// Migration Loading
// ============================================================================

export function getMigrationsDirectory(schema: SchemaName): string {
  return path.join(MIGRATIONS_ROOT, schema);
}

/**
 * Load migrations from SQL files named v###_name.sql, sorted by version
 */
export function loadMigrationsFromDirectory(migrationsDir: string): Migration[] {
  if (!fs.existsSync(migrationsDir)) {
    log.warn('Migrations directory does not exist', { path: migrationsDir });
    return [];
  }

  const migrations: Migration[] = [];

  for (const file of fs.readdirSync(migrationsDir)) {
    const match = MIGRATION_FILE_PATTERN.exec(file);
    if (!match) continue;

    migrations.push({
      version: parseInt(match[1], 10),
      name: match[2].replace(/_/g, ' '),
      sql: fs.readFileSync(path.join(migrationsDir, file), 'utf-8'),
    });
  }

  migrations.sort((a, b) => a.version - b.version);

  migrations.forEach((migration, index) => {
    if (migration.version !== index + 1) {
      log.warn('Non-sequential migration version detected', {
        expected: index + 1,
        actual: migration.version,
      });
    }
  });

  return migrations;
}

// ============================================================================
// Migration Runner
// ============================================================================

/**
 * Apply every migration not yet recorded, stopping at the first failure
 */
export function runMigrations(db: DatabaseInstance, migrations: Migration[]): MigrationSummary {
  const startTime = Date.now();

  initializeMigrationTable(db);
  const appliedSet = new Set(getAppliedMigrations(db).map((m) => m.version));

  const summary: MigrationSummary = {
    applied: [],
    skipped: [],
    failed: null,
    totalDurationMs: 0,
  };

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (appliedSet.has(migration.version)) {
      summary.skipped.push(migration.version);
      continue;
    }

    const result = applyMigration(db, migration);
    if (!result.success) {
      summary.failed = result;
      break;
    }
    summary.applied.push(result);
  }

  summary.totalDurationMs = Date.now() - startTime;

  log.info('Migration run completed', {
    path: db.name,
    applied: summary.applied.length,
    skipped: summary.skipped.length,
    failed: summary.failed !== null,
  });

  return summary;
}

/**
 * Bring a database to the latest version of its schema
 *
 * @throws Error naming the failed migration
 */
export function migrateDatabase(db: DatabaseInstance, schema: SchemaName): MigrationSummary {
  const summary = runMigrations(db, loadMigrationsFromDirectory(getMigrationsDirectory(schema)));

  if (summary.failed) {
    throw new Error(
      `Migration v${String(summary.failed.version).padStart(3, '0')} (${summary.failed.name}) ` +
        `failed for ${schema} database: ${summary.failed.error ?? 'Unknown error'}`
    );
  }

  return summary;
}
