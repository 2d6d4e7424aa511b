/**
 * Registry Event Log
 *
 * Append-only record of notifications emitted by successful mutations.
 * Subscribers are called synchronously after the event is recorded; a
 * failing subscriber is logged and does not affect the operation that
 * emitted the event, which has already committed.
 */

import { logError } from '../utils/errors.js';
import type { RegistryEvent, RegistryEventPayload } from '../types/index.js';

export type RegistryEventListener = (event: RegistryEvent) => void;

export class RegistryEventLog {
  private readonly entries: RegistryEvent[] = [];
  private readonly listeners = new Set<RegistryEventListener>();

  /**
   * Record an event and notify subscribers
   */
  append(payload: RegistryEventPayload, emittedAt: number): RegistryEvent {
    const event: RegistryEvent = {
      ...payload,
      seq: this.entries.length + 1,
      emittedAt,
    };
    this.entries.push(event);

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logError(error, { eventType: event.type, seq: event.seq });
      }
    }

    return event;
  }

  /**
   * Events with seq greater than `sinceSeq`, oldest first
   */
  list(sinceSeq: number = 0): RegistryEvent[] {
    return this.entries.filter((event) => event.seq > sinceSeq).map((event) => ({ ...event }));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Register a listener. Returns a function that removes it.
   */
  subscribe(listener: RegistryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
