/**
 * Subscription Channel
 *
 * Fan-out of values to any number of listeners. Listeners only see values
 * emitted after they subscribe. `stream()` exposes the same subscription as a
 * lazy async sequence with its own queue per iterator.
 */

import { errorMessage } from '../errors';
import { createUtilLogger, type UtilLogger } from '../logger';

const defaultLogger = createUtilLogger('SubscriptionChannel');

export type Unsubscribe = () => void;

export type Listener<T> = (value: T) => void;

export interface StreamOptions {
  /** Values held for a consumer that is not pulling; the oldest are dropped past this */
  maxBuffered?: number;
}

interface ListenerEntry<T> {
  listener: Listener<T>;
}

export class SubscriptionChannel<T> {
  private entries = new Set<ListenerEntry<T>>();
  private closeHandlers = new Set<() => void>();
  private closed = false;

  constructor(
    private readonly name: string,
    private readonly logger: UtilLogger = defaultLogger
  ) {}

  get listenerCount(): number {
    return this.entries.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Register a listener; the returned handle removes it
   */
  subscribe(listener: Listener<T>): Unsubscribe {
    if (this.closed) {
      return () => {};
    }

    const entry: ListenerEntry<T> = { listener };
    this.entries.add(entry);

    return () => {
      this.entries.delete(entry);
    };
  }

  emit(value: T): void {
    if (this.closed) return;

    // Listeners added while emitting wait for the next value
    [...this.entries].forEach(({ listener }) => {
      try {
        listener(value);
      } catch (error) {
        this.logger.error('Error in subscription listener', {
          channel: this.name,
          error: errorMessage(error),
        });
      }
    });
  }

  /**
   * Lazy sequence of future values. Subscribes immediately; `return()` (or
   * leaving a `for await` loop) unsubscribes. Without `maxBuffered` the queue
   * grows for as long as a consumer stops pulling but never returns.
   */
  stream(options: StreamOptions = {}): AsyncIterableIterator<T> {
    const maxBuffered = Math.max(1, options.maxBuffered ?? Number.POSITIVE_INFINITY);
    const buffered: T[] = [];
    const waiting: Array<(result: IteratorResult<T>) => void> = [];
    let done = this.closed;
    let unsubscribe: Unsubscribe = () => {};

    const finish = () => {
      if (done) return;
      done = true;
      unsubscribe();
      this.closeHandlers.delete(finish);
      waiting.splice(0).forEach(resolve => resolve({ value: undefined, done: true }));
    };

    if (!done) {
      unsubscribe = this.subscribe(value => {
        const [resolve] = waiting.splice(0, 1);
        if (resolve) {
          resolve({ value, done: false });
        } else {
          buffered.push(value);
          if (buffered.length > maxBuffered) {
            buffered.splice(0, buffered.length - maxBuffered);
          }
        }
      });
      this.closeHandlers.add(finish);
    }

    const iterator: AsyncIterableIterator<T> = {
      next: () => {
        if (buffered.length > 0) {
          const [value] = buffered.splice(0, 1);
          return Promise.resolve({ value, done: false });
        }
        if (done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>(resolve => {
          waiting.push(resolve);
        });
      },
      return: () => {
        finish();
        buffered.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
      [Symbol.asyncIterator]() {
        return iterator;
      },
    };

    return iterator;
  }

  /**
   * Drop every listener and complete every open stream
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    [...this.closeHandlers].forEach(handler => handler());
    this.closeHandlers.clear();
    this.entries.clear();
  }
}
