import type { TargetEvent } from './target-events.js';

export type TargetEventListener = (event: TargetEvent) => void | Promise<void>;

export type Unsubscribe = () => void;

export interface TargetEventBusPort {
  publish(event: TargetEvent): Promise<void>;
  subscribe(listener: TargetEventListener): Unsubscribe;
}

/**
 * Delivers events to listeners one at a time, in subscription order, so log output follows the
 * order in which listeners were attached. A listener that throws rejects the publish call.
 */
export class InMemoryTargetEventBus implements TargetEventBusPort {
  private listeners: readonly TargetEventListener[] = [];

  get listenerCount(): number {
    return this.listeners.length;
  }

  subscribe(listener: TargetEventListener): Unsubscribe {
    this.listeners = [...this.listeners, listener];
    return () => {
      this.listeners = this.listeners.filter((candidate) => candidate !== listener);
    };
  }

  async publish(event: TargetEvent): Promise<void> {
    // Listeners added or removed during delivery take effect from the next event.
    for (const listener of this.listeners) {
      await listener(event);
    }
  }
}
