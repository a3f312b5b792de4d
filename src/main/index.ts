/**
 * lunchcard-sync
 *
 * Offline-resilient access to student lunch cards: the authoritative card
 * store, the offline cache, the pending operation queue, the reconciler
 * and the read/write facade, wired together by createCardServices().
 *
 * @module main
 */

import { loadConfig, type ConfigSources } from './services/config.service';
import {
  bootstrapDatabases,
  performHealthCheck,
  shutdownDatabases,
  type CardDatabases,
  type HealthCheckResult,
} from './services/database-bootstrap.service';
import { CardRecordsDAL } from './dal/card-records.dal';
import { CardCacheDAL } from './dal/card-cache.dal';
import { PendingOperationsDAL } from './dal/pending-operations.dal';
import { ReconcileLogDAL } from './dal/reconcile-log.dal';
import { CardAccessService, isReaderHealthFailure } from './services/card-access.service';
import { SyncReconcilerService } from './services/sync-reconciler.service';
import { CircuitBreakerService } from './services/circuit-breaker.service';
import { RetryStrategyService } from './services/retry-strategy.service';
import { SimulatedReader } from './hardware/simulated-reader';
import { XorCardCipher } from './hardware/card-layout';
import type { HardwareAdapter } from './hardware/hardware-adapter';
import { KeyedMutex } from './utils/keyed-mutex';
import { CardEventBus } from './utils/event-bus';
import { createLogger, logger } from './utils/logger';
import type { CardServiceConfig } from '../shared/types/config.types';

// ============================================================================
// Types
// ============================================================================

export interface CreateCardServicesOptions {
  /** Settings; resolved with loadConfig(configSources) when omitted */
  config?: CardServiceConfig;
  configSources?: ConfigSources;
  /** Reader to use; a SimulatedReader when omitted */
  adapter?: HardwareAdapter;
  /** Start the reconciler timer immediately (default: false) */
  startReconciler?: boolean;
}

export interface CardServices {
  config: CardServiceConfig;
  databases: CardDatabases;
  adapter: HardwareAdapter;
  access: CardAccessService;
  reconciler: SyncReconcilerService;
  store: CardRecordsDAL;
  cache: CardCacheDAL;
  queue: PendingOperationsDAL;
  reconcileLog: ReconcileLogDAL;
  events: CardEventBus;
  breaker: CircuitBreakerService;
  healthCheck(): HealthCheckResult;
  /** Stop the reconciler, release the reader and close both databases */
  close(): Promise<void>;
}

const log = createLogger('main');

// ============================================================================
// Composition Root
// ============================================================================

/**
 * Open the databases and construct every card service
 *
 * @throws ConfigValidationError on invalid settings
 * @throws Error if a database cannot be opened or migrated
 */
export function createCardServices(options: CreateCardServicesOptions = {}): CardServices {
  const config = options.config ?? loadConfig(options.configSources);
  logger.setLevel(config.logLevel);

  const { databases } = bootstrapDatabases({
    primaryDbPath: config.primaryDbPath,
    offlineDbPath: config.offlineDbPath,
  });

  let adapter = options.adapter;
  if (!adapter) {
    log.warn('No hardware adapter supplied, using the simulated reader');
    adapter = new SimulatedReader();
  }

  const events = new CardEventBus();
  const locks = new KeyedMutex();
  const store = new CardRecordsDAL(databases.primary);
  const cache = new CardCacheDAL(databases.offline, config.cacheTtlMs);
  const queue = new PendingOperationsDAL(databases.offline);
  const reconcileLog = new ReconcileLogDAL(databases.offline);

  const breaker = new CircuitBreakerService('nfc-reader', {
    failureThreshold: config.breakerFailureThreshold,
    resetTimeoutMs: config.breakerResetTimeoutMs,
    isFailure: isReaderHealthFailure,
  });

  const access = new CardAccessService({
    adapter,
    store,
    cache,
    queue,
    locks,
    events,
    breaker,
    cipher: new XorCardCipher(config.cardXorKey),
    hardwareTimeoutMs: config.hardwareTimeoutMs,
  });

  const reconciler = new SyncReconcilerService({
    store,
    queue,
    reconcileLog,
    locks,
    events,
    retry: new RetryStrategyService(
      { maxAttempts: config.reconcileMaxAttempts },
      { defaultBatchSize: config.reconcileBatchSize }
    ),
    syncedRetentionMs: config.syncedRetentionMs,
  });

  if (options.startReconciler) {
    reconciler.start(config.reconcileIntervalMs);
  }

  const readerAdapter = adapter;
  let closed = false;

  log.info('Card services ready', { adapter: adapter.name });

  return {
    config,
    databases,
    adapter: readerAdapter,
    access,
    reconciler,
    store,
    cache,
    queue,
    reconcileLog,
    events,
    breaker,
    healthCheck: () => performHealthCheck(databases),
    close: async () => {
      if (closed) return;
      closed = true;

      reconciler.stop();
      await reconciler.whenIdle();

      try {
        await readerAdapter.disconnect();
      } catch (error) {
        log.warn('Reader disconnect failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }

      events.removeAllListeners();
      shutdownDatabases(databases);
      log.info('Card services closed');
    },
  };
}

// ============================================================================
// Public API
// ============================================================================

export { CardAccessService } from './services/card-access.service';
export { SyncReconcilerService, type ReconcilerStatus } from './services/sync-reconciler.service';
export { CircuitBreakerService, CircuitOpenError } from './services/circuit-breaker.service';
export { RetryStrategyService } from './services/retry-strategy.service';
export { ConfigService, ConfigValidationError, loadConfig } from './services/config.service';
export { CardRecordsDAL, type CardRecordStore } from './dal/card-records.dal';
export { CardCacheDAL } from './dal/card-cache.dal';
export { PendingOperationsDAL } from './dal/pending-operations.dal';
export { ReconcileLogDAL, type ReconcileRun } from './dal/reconcile-log.dal';
export type { HardwareAdapter } from './hardware/hardware-adapter';
export {
  ApduHardwareAdapter,
  type CardChannel,
  type CardReaderTransport,
  type ApduAdapterOptions,
} from './hardware/apdu-adapter';
export { SimulatedReader } from './hardware/simulated-reader';
export { XorCardCipher, calculateChecksum } from './hardware/card-layout';
export { CardEventBus, CardEvents, type ReconcileSummary } from './utils/event-bus';
export * from './utils/errors';
export * from '../shared/money';
export * from '../shared/types/card.types';
export type { CardServiceConfig } from '../shared/types/config.types';
