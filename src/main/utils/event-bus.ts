/**
 * Card service event bus
 *
 * Carries notifications between the facade, the reconciler and the host
 * application without direct imports between them.
 */

import { EventEmitter } from 'events';
import type { ReconcileTrigger } from '../../shared/types/card.types';

export interface ReconcileSummary {
  runId: string;
  trigger: ReconcileTrigger;
  processed: number;
  synced: number;
  failed: number;
  requeued: number;
  durationMs: number;
}

export interface CardQueuedEvent {
  cardId: string;
  operationId: string;
}

// Event types for type safety
export const CardEvents = {
  /** The reader answered again after the hardware circuit opened */
  HARDWARE_RECONNECTED: 'hardware:reconnected',
  /** The reader failed often enough to open the hardware circuit */
  HARDWARE_DISCONNECTED: 'hardware:disconnected',
  RECONCILE_COMPLETED: 'reconcile:completed',
  CARD_QUEUED: 'card:queued',
} as const;

interface CardEventPayloads {
  [CardEvents.HARDWARE_RECONNECTED]: [];
  [CardEvents.HARDWARE_DISCONNECTED]: [];
  [CardEvents.RECONCILE_COMPLETED]: [ReconcileSummary];
  [CardEvents.CARD_QUEUED]: [CardQueuedEvent];
}

export type CardEventName = keyof CardEventPayloads;

export class CardEventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    // Increase max listeners since host applications may subscribe too
    this.emitter.setMaxListeners(20);
  }

  on<E extends CardEventName>(event: E, listener: (...args: CardEventPayloads[E]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<E extends CardEventName>(event: E, ...args: CardEventPayloads[E]): boolean {
    return this.emitter.emit(event, ...args);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
