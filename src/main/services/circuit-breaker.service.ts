/**
 * Circuit Breaker Service
 *
 * Guards NFC reader calls so that a missing or wedged reader is skipped
 * quickly instead of costing every request a full hardware timeout.
 *
 * States:
 * - CLOSED: Normal operation, calls flow through
 * - OPEN: Circuit is tripped, calls fail immediately with CircuitOpenError
 * - HALF_OPEN: Testing recovery, calls flow through until one fails or
 *   enough succeed
 *
 * @module main/services/circuit-breaker
 */

import { createLogger } from '../utils/logger';
import { CardServiceError } from '../utils/errors';

// ============================================================================
// Types
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Number of failures within the window before the circuit opens (default: 3) */
  failureThreshold: number;
  /** Time in milliseconds before a trial call is allowed (default: 15000) */
  resetTimeoutMs: number;
  /** Time window in milliseconds to count failures (default: 60000) */
  failureWindowMs: number;
  /** Successful calls needed to close from HALF_OPEN (default: 1) */
  successThreshold: number;
  /**
   * Which errors count against the circuit. Errors that say nothing about
   * reader health (a checksum mismatch, no card presented) should not trip it.
   */
  isFailure: (error: Error) => boolean;
}

export interface CircuitBreakerMetrics {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  openedAt: number | null;
  lastStateChangeAt: number;
  totalRequests: number;
  rejectedRequests: number;
  lastFailureAt: number | null;
  lastFailureReason: string | null;
}

export type StateChangeListener = (from: CircuitState, to: CircuitState) => void;

interface FailureRecord {
  timestamp: number;
  reason: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_FAILURE_THRESHOLD = 3;
const DEFAULT_RESET_TIMEOUT_MS = 15_000;
const DEFAULT_FAILURE_WINDOW_MS = 60_000;
const DEFAULT_SUCCESS_THRESHOLD = 1;

/** Maximum recorded failures to bound memory */
const MAX_RECORDED_FAILURES = 100;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('circuit-breaker');

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when the breaker rejects a call without running it
 */
export class CircuitOpenError extends CardServiceError {
  public readonly code = 'CIRCUIT_OPEN';
  public readonly metrics: CircuitBreakerMetrics;

  constructor(message: string, metrics: CircuitBreakerMetrics) {
    super(message);
    this.name = 'CircuitOpenError';
    this.metrics = metrics;
  }
}

// ============================================================================
// Circuit Breaker Service
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const breaker = new CircuitBreakerService('nfc-reader');
 * const blocks = await breaker.execute(() => adapter.readBlock(cardId, 4));
 * ```
 */
export class CircuitBreakerService {
  private readonly name: string;
  private readonly config: CircuitBreakerConfig;
  private readonly listeners: StateChangeListener[] = [];

  private state: CircuitState = 'CLOSED';
  private failureRecords: FailureRecord[] = [];
  private successCountInHalfOpen: number = 0;
  private openedAt: number | null = null;
  private lastStateChangeAt: number = Date.now();
  private totalRequests: number = 0;
  private rejectedRequests: number = 0;
  private lastFailureAt: number | null = null;
  private lastFailureReason: string | null = null;

  constructor(name: string, config?: Partial<CircuitBreakerConfig>) {
    this.name = name;
    this.config = {
      failureThreshold: config?.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD,
      resetTimeoutMs: config?.resetTimeoutMs ?? DEFAULT_RESET_TIMEOUT_MS,
      failureWindowMs: config?.failureWindowMs ?? DEFAULT_FAILURE_WINDOW_MS,
      successThreshold: config?.successThreshold ?? DEFAULT_SUCCESS_THRESHOLD,
      isFailure: config?.isFailure ?? (() => true),
    };

    log.debug('Circuit breaker initialized', {
      name: this.name,
      failureThreshold: this.config.failureThreshold,
      resetTimeoutMs: this.config.resetTimeoutMs,
      failureWindowMs: this.config.failureWindowMs,
      successThreshold: this.config.successThreshold,
    });
  }

  // ==========================================================================
  // Core Methods
  // ==========================================================================

  /**
   * Run an operation through the breaker.
   * Rejects with CircuitOpenError while OPEN; otherwise resolves or rejects
   * exactly as the operation does.
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.totalRequests++;

    if (this.state === 'OPEN') {
      if (this.shouldAttemptReset()) {
        this.transitionTo('HALF_OPEN');
      } else {
        this.rejectedRequests++;
        log.debug('Request rejected by open circuit', {
          name: this.name,
          openedAt: this.openedAt,
        });
        throw new CircuitOpenError(
          `Circuit breaker [${this.name}] is OPEN. Request rejected.`,
          this.getMetrics()
        );
      }
    }

    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (this.config.isFailure(err)) {
        this.recordFailure(err.message);
      } else {
        // The reader answered; the failure is about the card
        this.recordSuccess();
      }
      throw err;
    }
  }

  /**
   * Record a failure from processing done outside execute()
   */
  recordFailure(reason: string): void {
    const now = Date.now();

    this.failureRecords.push({ timestamp: now, reason });
    this.lastFailureAt = now;
    this.lastFailureReason = reason;

    if (this.failureRecords.length > MAX_RECORDED_FAILURES) {
      this.failureRecords = this.failureRecords.slice(-MAX_RECORDED_FAILURES);
    }
    this.pruneOldFailures();

    if (this.state === 'CLOSED') {
      const recentFailures = this.countRecentFailures();
      if (recentFailures >= this.config.failureThreshold) {
        this.transitionTo('OPEN');
        log.warn('Circuit breaker opened due to failure threshold', {
          name: this.name,
          failures: recentFailures,
          threshold: this.config.failureThreshold,
          windowMs: this.config.failureWindowMs,
        });
      }
    } else if (this.state === 'HALF_OPEN') {
      // Any failure in HALF_OPEN reopens the circuit
      this.transitionTo('OPEN');
      log.warn('Circuit breaker reopened from HALF_OPEN state', {
        name: this.name,
        reason,
      });
    }
  }

  recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCountInHalfOpen++;
      if (this.successCountInHalfOpen >= this.config.successThreshold) {
        this.transitionTo('CLOSED');
        log.info('Circuit breaker closed after recovery', { name: this.name });
      }
    } else if (this.state === 'CLOSED' && this.failureRecords.length > 0) {
      this.failureRecords = [];
    }
  }

  // ==========================================================================
  // State Management
  // ==========================================================================

  getState(): CircuitState {
    return this.state;
  }

  /**
   * Register a listener for state transitions
   *
   * @returns Function that removes the listener
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      state: this.state,
      failureCount: this.countRecentFailures(),
      successCount: this.successCountInHalfOpen,
      openedAt: this.openedAt,
      lastStateChangeAt: this.lastStateChangeAt,
      totalRequests: this.totalRequests,
      rejectedRequests: this.rejectedRequests,
      lastFailureAt: this.lastFailureAt,
      lastFailureReason: this.lastFailureReason,
    };
  }

  /**
   * Manually reset to CLOSED (administrative override)
   */
  reset(): void {
    this.transitionTo('CLOSED');
    log.info('Circuit breaker manually reset', { name: this.name });
  }

  /**
   * Force the circuit OPEN, e.g. when the reader is known to be unplugged
   */
  forceOpen(): void {
    this.transitionTo('OPEN');
    log.warn('Circuit breaker force-opened', { name: this.name });
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private transitionTo(newState: CircuitState): void {
    const previousState = this.state;
    this.state = newState;
    this.lastStateChangeAt = Date.now();

    if (newState === 'OPEN') {
      this.openedAt = Date.now();
      this.successCountInHalfOpen = 0;
    } else if (newState === 'HALF_OPEN') {
      this.successCountInHalfOpen = 0;
    } else {
      this.openedAt = null;
      this.successCountInHalfOpen = 0;
      this.failureRecords = [];
    }

    if (previousState === newState) return;

    log.info('Circuit breaker state changed', {
      name: this.name,
      from: previousState,
      to: newState,
    });

    for (const listener of [...this.listeners]) {
      listener(previousState, newState);
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.openedAt === null) return false;
    return Date.now() - this.openedAt >= this.config.resetTimeoutMs;
  }

  private countRecentFailures(): number {
    const cutoff = Date.now() - this.config.failureWindowMs;
    return this.failureRecords.filter((f) => f.timestamp >= cutoff).length;
  }

  private pruneOldFailures(): void {
    const cutoff = Date.now() - this.config.failureWindowMs;
    this.failureRecords = this.failureRecords.filter((f) => f.timestamp >= cutoff);
  }
}
