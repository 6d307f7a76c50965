/**
 * Memory Monitor
 *
 * Periodically samples device memory and broadcasts each snapshot. Sampling
 * runs on a timer, never on the stack of a caller asking for the current state.
 */

import { freemem, totalmem } from 'node:os';

import type {
  MemoryPressureLevel,
  MemorySample,
  MemoryState,
  MemoryThresholds,
} from '@streamcore/types';

import { SamplingError, errorMessage } from '../errors';
import { createUtilLogger, type UtilLogger } from '../logger';
import { createMemoryState, availableMB, memoryPressureOf, memoryUsedPercentage } from './memory-state';
import { DEFAULT_MEMORY_THRESHOLDS } from './memory-thresholds';
import { SubscriptionChannel, type Listener, type StreamOptions, type Unsubscribe } from './subscription-channel';

const defaultLogger = createUtilLogger('MemoryMonitor');

/**
 * Synchronous source of raw memory readings. May throw when the platform
 * sampler is unavailable.
 */
export type MemoryReader = () => MemorySample;

export interface MemoryStateProvider {
  currentMemoryState(): MemoryState;
}

export interface MemoryMonitor extends MemoryStateProvider {
  readonly isMonitoring: boolean;
  startMonitoring(): void;
  stopMonitoring(): void;
  subscribe(listener: Listener<MemoryState>): Unsubscribe;
  states(options?: StreamOptions): AsyncIterableIterator<MemoryState>;
}

export interface PollingMemoryMonitorOptions {
  thresholds?: MemoryThresholds;
  logger?: UtilLogger;
  /** Clock for snapshot timestamps */
  now?: () => number;
}

/**
 * Reads process-wide memory from the operating system
 */
export const systemMemoryReader: MemoryReader = () => {
  const totalBytes = totalmem();
  const availableBytes = freemem();
  return {
    availableBytes,
    totalBytes,
    usedBytes: Math.max(0, totalBytes - availableBytes),
  };
};

export class PollingMemoryMonitor implements MemoryMonitor {
  private readonly thresholds: MemoryThresholds;
  private readonly logger: UtilLogger;
  private readonly now: () => number;
  private readonly channel: SubscriptionChannel<MemoryState>;

  private polledState?: MemoryState;
  private lastPressure?: MemoryPressureLevel;
  private pollingTimer?: NodeJS.Timeout;
  private startupTimer?: NodeJS.Timeout;
  private failedSamples = 0;

  constructor(
    private readonly reader: MemoryReader = systemMemoryReader,
    options: PollingMemoryMonitorOptions = {}
  ) {
    this.thresholds = options.thresholds ?? DEFAULT_MEMORY_THRESHOLDS;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
    this.channel = new SubscriptionChannel<MemoryState>('memory-states', this.logger);
  }

  get isMonitoring(): boolean {
    return this.pollingTimer !== undefined;
  }

  /** Consecutive failed samples since the last good one */
  get consecutiveFailures(): number {
    return this.failedSamples;
  }

  /**
   * Latest polled snapshot. Before the first tick every call reads the
   * sampler again; after a stop the last polled snapshot is kept.
   */
  currentMemoryState(): MemoryState {
    if (this.polledState) {
      return this.polledState;
    }

    try {
      return createMemoryState(this.reader(), this.now());
    } catch (error) {
      throw new SamplingError(`Memory sampler unavailable: ${errorMessage(error)}`, error);
    }
  }

  startMonitoring(): void {
    if (this.pollingTimer) return;

    this.pollingTimer = setInterval(() => {
      this.sample();
    }, this.thresholds.pollingInterval);

    // First sample is deferred so it never runs on the caller's stack
    this.startupTimer = setTimeout(() => {
      this.startupTimer = undefined;
      this.sample();
    }, 0);

    this.logger.info('Memory monitoring started', {
      pollingInterval: this.thresholds.pollingInterval,
    });
  }

  stopMonitoring(): void {
    if (!this.pollingTimer) return;

    clearInterval(this.pollingTimer);
    this.pollingTimer = undefined;

    if (this.startupTimer) {
      clearTimeout(this.startupTimer);
      this.startupTimer = undefined;
    }

    this.logger.info('Memory monitoring stopped');
  }

  subscribe(listener: Listener<MemoryState>): Unsubscribe {
    return this.channel.subscribe(listener);
  }

  states(options?: StreamOptions): AsyncIterableIterator<MemoryState> {
    return this.channel.stream(options);
  }

  private sample(): void {
    let state: MemoryState;
    try {
      state = createMemoryState(this.reader(), this.now());
    } catch (error) {
      this.failedSamples += 1;
      this.logger.warn('Memory sample failed, retrying next tick', {
        error: errorMessage(error),
        consecutiveFailures: this.failedSamples,
      });
      return;
    }

    this.failedSamples = 0;
    this.polledState = state;

    const pressure = memoryPressureOf(state, this.thresholds);
    this.logger.debug('Memory sampled', {
      availableMB: Math.round(availableMB(state)),
      usedPercentage: Math.round(memoryUsedPercentage(state)),
      pressure,
    });

    if (this.lastPressure !== undefined && pressure !== this.lastPressure) {
      this.logger.warn('Memory pressure changed', { from: this.lastPressure, to: pressure });
    }
    this.lastPressure = pressure;

    this.channel.emit(state);
  }
}

/** Fully free 4 GB device, classified `normal` under any threshold below 4096 MB */
const IDLE_DEVICE_SAMPLE: MemorySample = {
  availableBytes: 4096 * 1_048_576,
  totalBytes: 4096 * 1_048_576,
  usedBytes: 0,
};

/**
 * In-memory monitor driven by explicit `emit` calls
 */
export class ManualMemoryMonitor implements MemoryMonitor {
  private readonly channel = new SubscriptionChannel<MemoryState>('manual-memory-states');
  private monitoring = false;
  private latestState: MemoryState;

  startCount = 0;
  stopCount = 0;

  constructor(initialState: MemoryState = createMemoryState(IDLE_DEVICE_SAMPLE, 0)) {
    this.latestState = initialState;
  }

  get isMonitoring(): boolean {
    return this.monitoring;
  }

  currentMemoryState(): MemoryState {
    return this.latestState;
  }

  startMonitoring(): void {
    this.startCount += 1;
    this.monitoring = true;
  }

  stopMonitoring(): void {
    this.stopCount += 1;
    this.monitoring = false;
  }

  subscribe(listener: Listener<MemoryState>): Unsubscribe {
    return this.channel.subscribe(listener);
  }

  states(options?: StreamOptions): AsyncIterableIterator<MemoryState> {
    return this.channel.stream(options);
  }

  /**
   * Publish a state to subscribers. Ignored while not monitoring, like a
   * stopped polling loop.
   */
  emit(state: MemoryState): void {
    this.latestState = state;
    if (this.monitoring) {
      this.channel.emit(state);
    }
  }
}
