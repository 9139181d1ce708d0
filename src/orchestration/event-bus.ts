import { nanoid } from 'nanoid';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';
import { EVENT_WILDCARD, ID_PREFIX, NANOID_LENGTH_EVENT, type RunEventType } from '../constants.js';
import type { RunEvent, RunEventHandler, RunEventOf, RunEventPayloads } from './types.js';

/**
 * In-process publish/subscribe for run lifecycle events. Delivery is
 * synchronous in subscription order; a handler that throws or rejects is
 * logged and the remaining handlers still run.
 */
export class RunEventBus {
  private handlers = new Map<string, Set<RunEventHandler>>();
  private wildcardHandlers = new Set<RunEventHandler>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child('events');
  }

  on(eventType: RunEventType | typeof EVENT_WILDCARD, handler: RunEventHandler): () => void {
    if (eventType === EVENT_WILDCARD) {
      this.wildcardHandlers.add(handler);
    } else {
      let set = this.handlers.get(eventType);
      if (!set) {
        set = new Set();
        this.handlers.set(eventType, set);
      }
      set.add(handler);
    }
    return () => this.off(eventType, handler);
  }

  off(eventType: RunEventType | typeof EVENT_WILDCARD, handler: RunEventHandler): void {
    if (eventType === EVENT_WILDCARD) {
      this.wildcardHandlers.delete(handler);
      return;
    }
    this.handlers.get(eventType)?.delete(handler);
  }

  emit(event: RunEvent): void {
    for (const handler of [...(this.handlers.get(event.type) ?? [])]) {
      this.deliver(handler, event, false);
    }
    for (const handler of [...this.wildcardHandlers]) {
      this.deliver(handler, event, true);
    }
  }

  createEvent<K extends RunEventType>(
    type: K,
    runId: string,
    pluginId: string,
    payload: RunEventPayloads[K],
  ): RunEventOf<K> {
    return {
      id: `${ID_PREFIX.EVENT}${nanoid(NANOID_LENGTH_EVENT)}`,
      type,
      runId,
      pluginId,
      payload,
      timestamp: Date.now(),
    };
  }

  listenerCount(eventType?: RunEventType): number {
    if (eventType) return this.handlers.get(eventType)?.size ?? 0;
    let total = this.wildcardHandlers.size;
    for (const set of this.handlers.values()) total += set.size;
    return total;
  }

  private deliver(handler: RunEventHandler, event: RunEvent, wildcard: boolean): void {
    const label = wildcard ? 'Wildcard handler' : 'Handler';
    const report = (e: unknown) => {
      this.logger.error(`${label} error for '${event.type}': ${errorMessage(e)}`, { runId: event.runId });
    };
    try {
      const result = handler(event);
      if (result instanceof Promise) result.catch(report);
    } catch (e) {
      report(e);
    }
  }
}
