/**
 * Circuit Breaker Service Unit Tests
 *
 * State transitions, failure windows and the health filter that decides
 * which reader errors count against the circuit.
 *
 * @module tests/unit/services/circuit-breaker.service.spec
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/main/utils/logger', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import {
  CircuitBreakerService,
  CircuitOpenError,
  type CircuitBreakerConfig,
} from '../../../src/main/services/circuit-breaker.service';

// ============================================================================
// Test Helpers
// ============================================================================

function createTestBreaker(config?: Partial<CircuitBreakerConfig>): CircuitBreakerService {
  return new CircuitBreakerService('test-breaker', {
    failureThreshold: 3,
    resetTimeoutMs: 100,
    failureWindowMs: 1000,
    successThreshold: 2,
    ...config,
  });
}

function tripCircuit(breaker: CircuitBreakerService, count: number = 3): void {
  for (let i = 0; i < count; i++) {
    breaker.recordFailure('reader not responding');
  }
}

class CardProblem extends Error {}

describe('Circuit Breaker Service', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('Initial State', () => {
    it('should start CLOSED with empty metrics', () => {
      const breaker = createTestBreaker();

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics()).toMatchObject({
        state: 'CLOSED',
        failureCount: 0,
        successCount: 0,
        openedAt: null,
        totalRequests: 0,
        rejectedRequests: 0,
        lastFailureAt: null,
        lastFailureReason: null,
      });
    });
  });

  describe('State Transitions', () => {
    it('should open after the failure threshold', () => {
      const breaker = createTestBreaker();

      tripCircuit(breaker, 2);
      expect(breaker.getState()).toBe('CLOSED');

      breaker.recordFailure('reader not responding');
      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getMetrics().openedAt).toBe(Date.now());
    });

    it('should reject calls while OPEN without running them', async () => {
      const breaker = createTestBreaker();
      tripCircuit(breaker);
      const operation = vi.fn(async () => 'ok');

      await expect(breaker.execute(operation)).rejects.toBeInstanceOf(CircuitOpenError);
      expect(operation).not.toHaveBeenCalled();
      expect(breaker.getMetrics().rejectedRequests).toBe(1);
    });

    it('should carry metrics on the rejection', async () => {
      const breaker = createTestBreaker();
      tripCircuit(breaker);

      await expect(breaker.execute(async () => 'ok')).rejects.toMatchObject({
        code: 'CIRCUIT_OPEN',
        metrics: { state: 'OPEN' },
      });
    });

    it('should let a trial call through after the reset timeout', async () => {
      const breaker = createTestBreaker();
      tripCircuit(breaker);

      vi.advanceTimersByTime(150);

      await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
      expect(breaker.getState()).toBe('HALF_OPEN');
      expect(breaker.getMetrics().successCount).toBe(1);
    });

    it('should close after enough successes in HALF_OPEN', async () => {
      const breaker = createTestBreaker();
      tripCircuit(breaker);
      vi.advanceTimersByTime(150);

      await breaker.execute(async () => 'ok');
      await breaker.execute(async () => 'ok');

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics()).toMatchObject({ failureCount: 0, openedAt: null });
    });

    it('should reopen on a failure in HALF_OPEN', async () => {
      const breaker = createTestBreaker();
      tripCircuit(breaker);
      vi.advanceTimersByTime(150);

      await expect(
        breaker.execute(async () => {
          throw new Error('still unplugged');
        })
      ).rejects.toThrow('still unplugged');

      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getMetrics().openedAt).toBe(Date.now());
    });
  });

  describe('Failure Window', () => {
    it('should forget failures older than the window', () => {
      const breaker = createTestBreaker();

      tripCircuit(breaker, 2);
      vi.advanceTimersByTime(1500);
      breaker.recordFailure('reader not responding');

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics().failureCount).toBe(1);
    });

    it('should clear failures after a success while CLOSED', async () => {
      const breaker = createTestBreaker();
      tripCircuit(breaker, 2);

      await breaker.execute(async () => 'ok');
      breaker.recordFailure('reader not responding');

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics().failureCount).toBe(1);
    });
  });

  describe('execute()', () => {
    it('should return the result and count the request', async () => {
      const breaker = createTestBreaker();

      await expect(breaker.execute(async () => 42)).resolves.toBe(42);
      expect(breaker.getMetrics().totalRequests).toBe(1);
    });

    it('should record a failure and rethrow', async () => {
      const breaker = createTestBreaker();

      await expect(
        breaker.execute(async () => {
          throw new Error('transmit failed');
        })
      ).rejects.toThrow('transmit failed');

      expect(breaker.getMetrics()).toMatchObject({
        failureCount: 1,
        lastFailureReason: 'transmit failed',
      });
    });

    it('should wrap non-Error rejections', async () => {
      const breaker = createTestBreaker();

      await expect(
        breaker.execute(async () => {
          throw 'bare string';
        })
      ).rejects.toThrow('bare string');
    });

    it('should not count errors the health filter rejects', async () => {
      const breaker = createTestBreaker({
        failureThreshold: 1,
        isFailure: (error) => !(error instanceof CardProblem),
      });

      await expect(
        breaker.execute(async () => {
          throw new CardProblem('checksum mismatch');
        })
      ).rejects.toBeInstanceOf(CardProblem);

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics().failureCount).toBe(0);
    });

    it('should treat a filtered error in HALF_OPEN as the reader answering', async () => {
      const breaker = createTestBreaker({
        successThreshold: 1,
        isFailure: (error) => !(error instanceof CardProblem),
      });
      tripCircuit(breaker);
      vi.advanceTimersByTime(150);

      await expect(
        breaker.execute(async () => {
          throw new CardProblem('blank card');
        })
      ).rejects.toBeInstanceOf(CardProblem);

      expect(breaker.getState()).toBe('CLOSED');
    });
  });

  describe('State Listeners', () => {
    it('should report each transition once', async () => {
      const breaker = createTestBreaker({ successThreshold: 1 });
      const listener = vi.fn();
      breaker.onStateChange(listener);

      tripCircuit(breaker, 4);
      vi.advanceTimersByTime(150);
      await breaker.execute(async () => 'ok');

      expect(listener.mock.calls).toEqual([
        ['CLOSED', 'OPEN'],
        ['OPEN', 'HALF_OPEN'],
        ['HALF_OPEN', 'CLOSED'],
      ]);
    });

    it('should stop calling a removed listener', () => {
      const breaker = createTestBreaker();
      const listener = vi.fn();
      const unsubscribe = breaker.onStateChange(listener);

      unsubscribe();
      tripCircuit(breaker);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('Manual Control', () => {
    it('should reset to CLOSED', () => {
      const breaker = createTestBreaker();
      tripCircuit(breaker);

      breaker.reset();

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getMetrics().failureCount).toBe(0);
    });

    it('should force OPEN', () => {
      const breaker = createTestBreaker();

      breaker.forceOpen();

      expect(breaker.getState()).toBe('OPEN');
    });
  });
});
