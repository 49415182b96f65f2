import type { VaultEvent, VaultEventType } from '../types/VaultEvents.js';

export interface EventSink {
  emit(event: VaultEvent): void;
}

export type VaultEventListener = (event: VaultEvent) => void;

/** Append-only, in-order record of every emitted event. A throwing listener rejects the event. */
export class InMemoryEventLog implements EventSink {
  private readonly events: VaultEvent[] = [];
  private readonly listeners = new Set<VaultEventListener>();

  emit(event: VaultEvent): void {
    for (const listener of this.listeners) listener(event);
    this.events.push(event);
  }

  all(): readonly VaultEvent[] {
    return [...this.events];
  }

  ofType<T extends VaultEventType>(type: T): Array<Extract<VaultEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<VaultEvent, { type: T }> => e.type === type);
  }

  subscribe(listener: VaultEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
