/**
 * Card Event Bus Unit Tests
 *
 * @module tests/unit/utils/event-bus.spec
 */

import { describe, it, expect, vi } from 'vitest';
import { CardEventBus, CardEvents } from '../../../src/main/utils/event-bus';

describe('CardEventBus', () => {
  it('delivers payloads to subscribers', () => {
    const bus = new CardEventBus();
    const listener = vi.fn();
    bus.on(CardEvents.CARD_QUEUED, listener);

    expect(bus.emit(CardEvents.CARD_QUEUED, { cardId: 'A1', operationId: 'op-1' })).toBe(true);
    expect(listener).toHaveBeenCalledWith({ cardId: 'A1', operationId: 'op-1' });
  });

  it('reports an event nobody listens to', () => {
    expect(new CardEventBus().emit(CardEvents.HARDWARE_RECONNECTED)).toBe(false);
  });

  it('unsubscribes through the returned function', () => {
    const bus = new CardEventBus();
    const listener = vi.fn();
    const off = bus.on(CardEvents.HARDWARE_DISCONNECTED, listener);

    off();
    bus.emit(CardEvents.HARDWARE_DISCONNECTED);

    expect(listener).not.toHaveBeenCalled();
  });

  it('drops every listener on removeAllListeners', () => {
    const bus = new CardEventBus();
    const listener = vi.fn();
    bus.on(CardEvents.HARDWARE_RECONNECTED, listener);
    bus.on(CardEvents.HARDWARE_DISCONNECTED, listener);

    bus.removeAllListeners();
    bus.emit(CardEvents.HARDWARE_RECONNECTED);
    bus.emit(CardEvents.HARDWARE_DISCONNECTED);

    expect(listener).not.toHaveBeenCalled();
  });
});
