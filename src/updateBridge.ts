/**
 * Hands worker events to host listeners.
 *
 * Listeners never run on the worker's call stack: each delivery is scheduled
 * with setImmediate, in notify order, and a throwing listener is logged.
 */

import type { BridgeEvent, BridgeListener, Logger } from './types.js';
import { describeError } from './errors.js';

export class UpdateBridge {
  private readonly listeners: Set<BridgeListener> = new Set();

  constructor(private readonly log: Logger) {}

  subscribe(listener: BridgeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  notify(event: BridgeEvent): void {
    for (const listener of this.listeners) {
      setImmediate(() => {
        if (!this.listeners.has(listener)) return;
        try {
          listener(event);
        } catch (error) {
          this.log.error('Error in %s listener: %s', event.type, describeError(error));
        }
      });
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
