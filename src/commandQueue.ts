import type { Command } from './types.js';
import { DEFAULT_QUEUE_CAPACITY } from './settings.js';

/**
 * Bounded FIFO between the facade and the poll worker. `submit` never waits:
 * a full queue refuses the command. FIFO order keeps commands for the same
 * room in submission order.
 */
export class CommandQueue {
  private items: Command[] = [];
  private wake: (() => void) | null = null;

  constructor(readonly capacity: number = DEFAULT_QUEUE_CAPACITY) {}

  get size(): number {
    return this.items.length;
  }

  submit(command: Command): boolean {
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(command);
    this.signal();
    return true;
  }

  shift(): Command | undefined {
    return this.items.shift();
  }

  /** Drops every queued command and returns how many were dropped. */
  clear(): number {
    const dropped = this.items.length;
    this.items = [];
    return dropped;
  }

  /** Wakes a pending `waitForWork`. */
  signal(): void {
    this.wake?.();
  }

  /**
   * Resolves as soon as a command is queued, `timeoutMs` elapses, `signal()`
   * is called or `abort` fires.
   */
  waitForWork(timeoutMs: number, abort?: AbortSignal): Promise<void> {
    if (this.items.length > 0 || abort?.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        abort?.removeEventListener('abort', done);
        if (this.wake === done) {
          this.wake = null;
        }
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, timeoutMs));
      abort?.addEventListener('abort', done, { once: true });
      this.wake = done;
    });
  }
}
