/**
 * Adaptive Buffer Manager
 *
 * Fuses memory pressure and network quality into the single buffer
 * configuration the media pipeline reads. Each input caps the strategy; the
 * effective strategy is the most conservative of the caps.
 */

import type {
  AdaptationTrigger,
  BufferAdaptation,
  BufferConfiguration,
  BufferInputs,
  BufferStrategy,
  MemoryPressureLevel,
  MemoryState,
  MemoryThresholds,
  NetworkCeilings,
  NetworkQuality,
} from '@streamcore/types';

import { createUtilLogger, type UtilLogger } from '../logger';
import { BUFFER_PRESETS, configurationsEqual, createBufferConfiguration } from './buffer-configuration';
import { compareBufferStrategies } from './buffer-strategy';
import { memoryPressureOf } from './memory-state';
import { DEFAULT_MEMORY_THRESHOLDS } from './memory-thresholds';
import { DEFAULT_NETWORK_CEILINGS, mergeNetworkCeilings } from './network-quality';
import { SerialExecutor } from './serial-executor';
import { SubscriptionChannel, type Listener, type StreamOptions, type Unsubscribe } from './subscription-channel';

const logger = createUtilLogger('AdaptiveBufferManager');

const MAX_ADAPTATION_HISTORY = 100;

/**
 * Strategy ceiling imposed by memory pressure
 */
export const MEMORY_CEILINGS: Readonly<Record<MemoryPressureLevel, BufferStrategy>> = Object.freeze({
  critical: 'minimal',
  warning: 'conservative',
  normal: 'aggressive',
});

/**
 * Reasons reported when the network, not memory, limits the strategy
 */
const NETWORK_REASONS: Record<BufferStrategy, string> = {
  minimal: 'Poor network - minimal buffering',
  conservative: 'Poor network - conservative buffering to reduce rebuffering',
  balanced: BUFFER_PRESETS.balanced.reason,
  aggressive: BUFFER_PRESETS.aggressive.reason,
};

export interface BufferSizeProvider {
  readonly currentConfiguration: BufferConfiguration;
}

export interface BufferManager extends BufferSizeProvider {
  updateMemoryState(state: MemoryState): Promise<BufferConfiguration>;
  updateNetworkQuality(quality: NetworkQuality): Promise<BufferConfiguration>;
  subscribe(listener: Listener<BufferConfiguration>): Unsubscribe;
  configurations(options?: StreamOptions): AsyncIterableIterator<BufferConfiguration>;
}

export interface AdaptiveBufferManagerOptions {
  thresholds?: MemoryThresholds;

  /** Overrides for the network quality → strategy ceiling table */
  networkCeilings?: Partial<NetworkCeilings>;

  /** Network quality assumed until the first report */
  initialNetworkQuality?: NetworkQuality;

  logger?: UtilLogger;
}

/**
 * Combine both inputs into a configuration. Ties go to memory, so memory
 * pressure is reported whenever it is at least as limiting as the network.
 */
export function resolveBufferConfiguration(
  memoryPressure: MemoryPressureLevel,
  networkQuality: NetworkQuality,
  networkCeilings: NetworkCeilings = DEFAULT_NETWORK_CEILINGS
): BufferConfiguration {
  const memoryCeiling = MEMORY_CEILINGS[memoryPressure];
  const networkCeiling = networkCeilings[networkQuality];

  if (compareBufferStrategies(memoryCeiling, networkCeiling) <= 0) {
    return BUFFER_PRESETS[memoryCeiling];
  }

  return createBufferConfiguration(
    networkCeiling,
    BUFFER_PRESETS[networkCeiling].preferredForwardBufferSeconds,
    NETWORK_REASONS[networkCeiling]
  );
}

export class AdaptiveBufferManager implements BufferManager {
  private readonly thresholds: MemoryThresholds;
  private readonly networkCeilings: NetworkCeilings;
  private readonly logger: UtilLogger;
  private readonly executor = new SerialExecutor();
  private readonly channel: SubscriptionChannel<BufferConfiguration>;

  private memoryPressure: MemoryPressureLevel = 'normal';
  private networkQuality: NetworkQuality;
  private configuration: BufferConfiguration = BUFFER_PRESETS.balanced;
  private adaptationHistory: BufferAdaptation[] = [];

  constructor(options: AdaptiveBufferManagerOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_MEMORY_THRESHOLDS;
    this.networkCeilings = mergeNetworkCeilings(options.networkCeilings);
    this.networkQuality = options.initialNetworkQuality ?? 'good';
    this.logger = options.logger ?? logger;
    this.channel = new SubscriptionChannel<BufferConfiguration>('buffer-configurations', this.logger);

    this.logger.info('Adaptive Buffer Manager initialized', {
      strategy: this.configuration.strategy,
      networkQuality: this.networkQuality,
    });
  }

  /**
   * Latest computed configuration; `balanced` until an input arrives
   */
  get currentConfiguration(): BufferConfiguration {
    return this.configuration;
  }

  updateMemoryState(state: MemoryState): Promise<BufferConfiguration> {
    return this.executor.run(() => {
      this.memoryPressure = memoryPressureOf(state, this.thresholds);
      return this.recalculate('memory');
    });
  }

  updateNetworkQuality(quality: NetworkQuality): Promise<BufferConfiguration> {
    return this.executor.run(() => {
      this.networkQuality = quality;
      return this.recalculate('network');
    });
  }

  subscribe(listener: Listener<BufferConfiguration>): Unsubscribe {
    return this.channel.subscribe(listener);
  }

  configurations(options?: StreamOptions): AsyncIterableIterator<BufferConfiguration> {
    return this.channel.stream(options);
  }

  getInputs(): BufferInputs {
    return {
      memoryPressure: this.memoryPressure,
      networkQuality: this.networkQuality,
    };
  }

  /**
   * Recent configuration changes, oldest first
   */
  getAdaptationHistory(): BufferAdaptation[] {
    return this.adaptationHistory.map(entry => ({ ...entry }));
  }

  /**
   * Release subscribers and complete open sequences. Updates still recompute.
   */
  shutdown(): void {
    this.channel.close();
    this.logger.info('Adaptive Buffer Manager shutdown complete');
  }

  /**
   * Must only run inside the executor
   */
  private recalculate(trigger: AdaptationTrigger): BufferConfiguration {
    const next = resolveBufferConfiguration(this.memoryPressure, this.networkQuality, this.networkCeilings);

    if (configurationsEqual(next, this.configuration)) {
      return this.configuration;
    }

    const previous = this.configuration;
    this.configuration = next;

    this.adaptationHistory.push({ timestamp: Date.now(), trigger, configuration: next });
    if (this.adaptationHistory.length > MAX_ADAPTATION_HISTORY) {
      this.adaptationHistory = this.adaptationHistory.slice(-MAX_ADAPTATION_HISTORY);
    }

    this.logger.info('Buffer strategy adapted', {
      trigger,
      from: previous.strategy,
      to: next.strategy,
      forwardBufferSeconds: next.preferredForwardBufferSeconds,
      memoryPressure: this.memoryPressure,
      networkQuality: this.networkQuality,
    });

    this.channel.emit(next);
    return next;
  }
}
