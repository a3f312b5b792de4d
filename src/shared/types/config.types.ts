/**
 * Configuration Types
 *
 * Settings of the card services with Zod validation schemas.
 * Durations are milliseconds.
 *
 * @module shared/types/config.types
 */

import { z } from 'zod';

// ============================================================================
// Validation Schemas
// ============================================================================

/**
 * Database path; ':memory:' is accepted for tests and demos
 */
export const DbPathSchema = z
  .string()
  .min(1, 'Database path is required')
  .max(500, 'Path too long')
  .refine((path) => !/[<>"|?*]/.test(path), 'Path contains invalid characters');

const DurationSchema = z.coerce
  .number()
  .int('Duration must be whole milliseconds')
  .positive('Duration must be positive');

const CountSchema = z.coerce.number().int('Must be an integer').min(1, 'Must be at least 1');

/**
 * One-byte XOR key; strings such as "0xA5" or "165" are accepted
 */
export const CardXorKeySchema = z.preprocess(
  (value) => (typeof value === 'string' ? Number(value.trim()) : value),
  z
    .number({ invalid_type_error: 'XOR key must be a number' })
    .int('XOR key must be an integer')
    .min(0, 'XOR key must be a byte')
    .max(0xff, 'XOR key must be a byte')
);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const CardServiceConfigSchema = z
  .object({
    // Storage
    primaryDbPath: DbPathSchema,
    offlineDbPath: DbPathSchema,

    // Offline cache
    cacheTtlMs: DurationSchema,

    // Hardware
    hardwareTimeoutMs: DurationSchema.max(120_000, 'Hardware timeout cannot exceed 2 minutes'),
    cardXorKey: CardXorKeySchema,
    breakerFailureThreshold: CountSchema.max(100),
    breakerResetTimeoutMs: DurationSchema,

    // Reconciler
    reconcileIntervalMs: DurationSchema.min(1000, 'Reconcile interval must be at least 1 second'),
    reconcileBatchSize: CountSchema.max(500, 'Batch size cannot exceed 500'),
    reconcileMaxAttempts: CountSchema.max(100),
    syncedRetentionMs: DurationSchema,

    logLevel: LogLevelSchema,
  })
  .strict();

// ============================================================================
// Type Exports
// ============================================================================

export type CardServiceConfig = z.infer<typeof CardServiceConfigSchema>;
export type LogLevelSetting = z.infer<typeof LogLevelSchema>;

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_CONFIG: CardServiceConfig = {
  primaryDbPath: 'data/cards.db',
  offlineDbPath: 'data/offline_cards.db',
  cacheTtlMs: 24 * 60 * 60 * 1000,
  hardwareTimeoutMs: 10_000,
  cardXorKey: 0xa5,
  breakerFailureThreshold: 3,
  breakerResetTimeoutMs: 15_000,
  reconcileIntervalMs: 60_000,
  reconcileBatchSize: 50,
  reconcileMaxAttempts: 5,
  syncedRetentionMs: 7 * 24 * 60 * 60 * 1000,
  logLevel: 'info',
};

/**
 * Environment variable for each setting
 */
export const CONFIG_ENV_VARS: Record<keyof CardServiceConfig, string> = {
  primaryDbPath: 'LUNCHCARD_PRIMARY_DB',
  offlineDbPath: 'LUNCHCARD_OFFLINE_DB',
  cacheTtlMs: 'LUNCHCARD_CACHE_TTL_MS',
  hardwareTimeoutMs: 'LUNCHCARD_HARDWARE_TIMEOUT_MS',
  cardXorKey: 'LUNCHCARD_CARD_XOR_KEY',
  breakerFailureThreshold: 'LUNCHCARD_BREAKER_FAILURE_THRESHOLD',
  breakerResetTimeoutMs: 'LUNCHCARD_BREAKER_RESET_TIMEOUT_MS',
  reconcileIntervalMs: 'LUNCHCARD_RECONCILE_INTERVAL_MS',
  reconcileBatchSize: 'LUNCHCARD_RECONCILE_BATCH_SIZE',
  reconcileMaxAttempts: 'LUNCHCARD_RECONCILE_MAX_ATTEMPTS',
  syncedRetentionMs: 'LUNCHCARD_SYNCED_RETENTION_MS',
  logLevel: 'LOG_LEVEL',
};

/** Points at an optional JSON file of settings */
export const CONFIG_FILE_ENV_VAR = 'LUNCHCARD_CONFIG_FILE';

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Safe validation that returns result object
 */
export function safeValidateConfig(data: unknown) {
  return CardServiceConfigSchema.safeParse(data);
}
