import { afterEach, describe, it, expect, vi } from 'vitest';
import { SubscriptionChannel, configureLogging, resetLogging } from '@streamcore/utils';

import { createRecordingSink } from '../helpers/logging';

describe('SubscriptionChannel', () => {
  afterEach(() => {
    resetLogging();
  });

  it('delivers values to every listener', () => {
    const channel = new SubscriptionChannel<number>('test');
    const first = vi.fn();
    const second = vi.fn();
    channel.subscribe(first);
    channel.subscribe(second);

    channel.emit(1);

    expect(first).toHaveBeenCalledWith(1);
    expect(second).toHaveBeenCalledWith(1);
    expect(channel.listenerCount).toBe(2);
  });

  it('stops delivering after unsubscribe', () => {
    const channel = new SubscriptionChannel<number>('test');
    const listener = vi.fn();
    const unsubscribe = channel.subscribe(listener);

    unsubscribe();
    unsubscribe();
    channel.emit(1);

    expect(listener).not.toHaveBeenCalled();
    expect(channel.listenerCount).toBe(0);
  });

  it('does not replay past values to late listeners', () => {
    const channel = new SubscriptionChannel<number>('test');
    channel.emit(1);
    const listener = vi.fn();
    channel.subscribe(listener);

    channel.emit(2);

    expect(listener.mock.calls).toEqual([[2]]);
  });

  it('keeps the same function subscribed twice as two listeners', () => {
    const channel = new SubscriptionChannel<number>('test');
    const listener = vi.fn();
    channel.subscribe(listener);
    channel.subscribe(listener);

    channel.emit(3);

    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('isolates a throwing listener and logs the error', () => {
    const sink = createRecordingSink();
    configureLogging({ sink });
    const channel = new SubscriptionChannel<number>('numbers');
    const healthy = vi.fn();
    channel.subscribe(() => {
      throw new Error('listener broke');
    });
    channel.subscribe(healthy);

    channel.emit(4);

    expect(healthy).toHaveBeenCalledWith(4);
    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]).toMatchObject({
      level: 'error',
      scope: 'SubscriptionChannel',
      message: 'Error in subscription listener',
      data: { channel: 'numbers', error: 'listener broke' },
    });
  });

  it('does not deliver the current value to listeners added during emit', () => {
    const channel = new SubscriptionChannel<number>('test');
    const late = vi.fn();
    channel.subscribe(() => {
      channel.subscribe(late);
    });

    channel.emit(5);

    expect(late).not.toHaveBeenCalled();
  });

  describe('stream', () => {
    it('buffers values emitted before next() is called', async () => {
      const channel = new SubscriptionChannel<string>('test');
      const stream = channel.stream();

      channel.emit('a');
      channel.emit('b');

      expect(await stream.next()).toEqual({ value: 'a', done: false });
      expect(await stream.next()).toEqual({ value: 'b', done: false });
    });

    it('keeps only the newest values past maxBuffered', async () => {
      const channel = new SubscriptionChannel<number>('test');
      const stream = channel.stream({ maxBuffered: 2 });

      channel.emit(1);
      channel.emit(2);
      channel.emit(3);
      channel.close();

      expect(await stream.next()).toEqual({ value: 2, done: false });
      expect(await stream.next()).toEqual({ value: 3, done: false });
      expect(await stream.next()).toEqual({ value: undefined, done: true });
    });

    it('resolves a pending next() on the following emit', async () => {
      const channel = new SubscriptionChannel<string>('test');
      const stream = channel.stream();
      const pending = stream.next();

      channel.emit('c');

      await expect(pending).resolves.toEqual({ value: 'c', done: false });
    });

    it('unsubscribes on return()', async () => {
      const channel = new SubscriptionChannel<string>('test');
      const stream = channel.stream();
      expect(channel.listenerCount).toBe(1);

      await stream.return?.();

      expect(channel.listenerCount).toBe(0);
      expect(await stream.next()).toEqual({ value: undefined, done: true });
    });

    it('drains buffered values before completing on close', async () => {
      const channel = new SubscriptionChannel<string>('test');
      const stream = channel.stream();
      channel.emit('d');

      channel.close();

      expect(await stream.next()).toEqual({ value: 'd', done: false });
      expect(await stream.next()).toEqual({ value: undefined, done: true });
    });

    it('is already complete when created on a closed channel', async () => {
      const channel = new SubscriptionChannel<string>('test');
      channel.close();

      expect(await channel.stream().next()).toEqual({ value: undefined, done: true });
      expect(channel.isClosed).toBe(true);
    });
  });

  it('ignores subscriptions and emits after close', () => {
    const channel = new SubscriptionChannel<number>('test');
    const listener = vi.fn();
    channel.subscribe(listener);
    channel.close();

    channel.subscribe(listener)();
    channel.emit(6);

    expect(listener).not.toHaveBeenCalled();
    expect(channel.listenerCount).toBe(0);
  });
});
