/**
 * Retry Strategy Service
 *
 * Jittered exponential backoff for operations the reconciler could not
 * apply, plus batch-size reduction while the primary store is struggling.
 *
 * @module main/services/retry-strategy
 */

import { createLogger } from '../utils/logger';
import type { FailureCategory } from '../../shared/types/card.types';

// ============================================================================
// Types
// ============================================================================

export interface RetryConfig {
  /** Base delay in milliseconds (default: 1000 = 1s) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 300000 = 5m) */
  maxDelayMs: number;
  /** Jitter factor (0-1, default: 0.3 = ±30% jitter) */
  jitterFactor: number;
  /** Exponential multiplier (default: 2) */
  multiplier: number;
  /** Attempts after which a transient failure stops being re-queued (default: 5) */
  maxAttempts: number;
}

export interface BatchSizeConfig {
  /** Default batch size (default: 50) */
  defaultBatchSize: number;
  /** Minimum batch size (default: 5) */
  minBatchSize: number;
  /** Reduction factor on failure (default: 0.5 = halve) */
  reductionFactor: number;
  /** Consecutive clean batches before returning to the default (default: 3) */
  recoveryThreshold: number;
}

export interface RetryDecision {
  shouldRetry: boolean;
  /** Delay before the operation is eligible again */
  delayMs: number;
  reason: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 300_000,
  jitterFactor: 0.3,
  multiplier: 2,
  maxAttempts: 5,
};

const DEFAULT_BATCH_SIZE_CONFIG: BatchSizeConfig = {
  defaultBatchSize: 50,
  minBatchSize: 5,
  reductionFactor: 0.5,
  recoveryThreshold: 3,
};

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('retry-strategy');

// ============================================================================
// Retry Strategy Service
// ============================================================================

export class RetryStrategyService {
  private readonly retryConfig: RetryConfig;
  private readonly batchConfig: BatchSizeConfig;
  private currentBatchSize: number;
  private consecutiveSuccesses: number = 0;

  constructor(retryConfig?: Partial<RetryConfig>, batchConfig?: Partial<BatchSizeConfig>) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
    this.batchConfig = { ...DEFAULT_BATCH_SIZE_CONFIG, ...batchConfig };
    this.currentBatchSize = this.batchConfig.defaultBatchSize;
  }

  // ==========================================================================
  // Backoff Calculation
  // ==========================================================================

  /**
   * Jittered exponential backoff:
   * baseDelay * multiplier^attempt, capped at maxDelay, times (1 ± jitter)
   *
   * With defaults, attempt 0 waits 700-1300ms, attempt 3 waits 5600-10400ms.
   *
   * @param attempt - Attempts already made (0-based)
   */
  calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.retryConfig.baseDelayMs * Math.pow(this.retryConfig.multiplier, attempt);
    const cappedDelay = Math.min(exponentialDelay, this.retryConfig.maxDelayMs);

    const jitterRange = this.retryConfig.jitterFactor;
    const jitterMultiplier = 1 - jitterRange + Math.random() * 2 * jitterRange;

    return Math.round(cappedDelay * jitterMultiplier);
  }

  /**
   * ISO timestamp at which an operation with `attempt` prior attempts may run again
   */
  calculateRetryAfter(attempt: number, now: number = Date.now()): string {
    return new Date(now + this.calculateBackoffDelay(attempt)).toISOString();
  }

  // ==========================================================================
  // Retry Decision
  // ==========================================================================

  /**
   * Decide what happens to an operation after a failed apply
   *
   * - CONFLICT: never retried automatically; only an operator retry releases it
   * - TRANSIENT: retried with backoff until maxAttempts
   */
  makeRetryDecision(attempts: number, category: FailureCategory): RetryDecision {
    if (category === 'CONFLICT') {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: 'Rejected by primary store; held for manual retry',
      };
    }

    if (attempts >= this.retryConfig.maxAttempts) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Max attempts exceeded (${attempts}/${this.retryConfig.maxAttempts})`,
      };
    }

    const delayMs = this.calculateBackoffDelay(attempts);
    return {
      shouldRetry: true,
      delayMs,
      reason: `Jittered backoff: ${delayMs}ms (attempt ${attempts + 1}/${this.retryConfig.maxAttempts})`,
    };
  }

  getMaxAttempts(): number {
    return this.retryConfig.maxAttempts;
  }

  // ==========================================================================
  // Dynamic Batch Sizing
  // ==========================================================================

  getCurrentBatchSize(): number {
    return this.currentBatchSize;
  }

  /**
   * Record a batch with no transient failures.
   * Returns to the default size after enough clean batches.
   */
  recordBatchSuccess(): number {
    this.consecutiveSuccesses++;

    if (
      this.consecutiveSuccesses >= this.batchConfig.recoveryThreshold &&
      this.currentBatchSize < this.batchConfig.defaultBatchSize
    ) {
      const oldSize = this.currentBatchSize;
      this.currentBatchSize = this.batchConfig.defaultBatchSize;
      this.consecutiveSuccesses = 0;
      log.info('Batch size restored', { oldSize, newSize: this.currentBatchSize });
    }

    return this.currentBatchSize;
  }

  /**
   * Record a batch with transient failures; shrinks the next batch
   */
  recordBatchFailure(): number {
    this.consecutiveSuccesses = 0;

    const newSize = Math.max(
      Math.floor(this.currentBatchSize * this.batchConfig.reductionFactor),
      this.batchConfig.minBatchSize
    );

    if (newSize < this.currentBatchSize) {
      log.warn('Batch size reduced due to failures', {
        oldSize: this.currentBatchSize,
        newSize,
      });
      this.currentBatchSize = newSize;
    }

    return this.currentBatchSize;
  }

  resetBatchSize(): void {
    this.currentBatchSize = this.batchConfig.defaultBatchSize;
    this.consecutiveSuccesses = 0;
  }
}
