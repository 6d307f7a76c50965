/**
 * Adaptive buffering and memory monitoring
 */

export {
  DEFAULT_MEMORY_THRESHOLDS,
  MEMORY_PRESSURE_LEVELS,
  createMemoryThresholds,
  classifyMemoryPressure,
  compareMemoryPressure,
} from './memory-thresholds';

export {
  createMemoryState,
  availableMB,
  usedMB,
  memoryUsedPercentage,
  memoryPressureOf,
} from './memory-state';

export {
  BUFFER_STRATEGIES,
  BUFFER_STRATEGY_RANK,
  compareBufferStrategies,
  minBufferStrategy,
  clampBufferStrategy,
  describeBufferStrategy,
} from './buffer-strategy';

export {
  BUFFER_PRESETS,
  bufferPresetFor,
  createBufferConfiguration,
  configurationsEqual,
} from './buffer-configuration';

export {
  NETWORK_QUALITY_LEVELS,
  DEFAULT_NETWORK_CEILINGS,
  compareNetworkQuality,
  determineNetworkQuality,
  mergeNetworkCeilings,
} from './network-quality';

export { SubscriptionChannel } from './subscription-channel';
export { SerialExecutor } from './serial-executor';
export { PollingMemoryMonitor, ManualMemoryMonitor, systemMemoryReader } from './memory-monitor';
export { AdaptiveBufferManager, resolveBufferConfiguration, MEMORY_CEILINGS } from './adaptive-buffer-manager';
export { AdaptiveBufferSession, createAdaptiveBufferSession } from './adaptive-buffer-session';

// Types
export type { Listener, StreamOptions, Unsubscribe } from './subscription-channel';

export type {
  MemoryReader,
  MemoryStateProvider,
  MemoryMonitor,
  PollingMemoryMonitorOptions,
} from './memory-monitor';

export type {
  BufferSizeProvider,
  BufferManager,
  AdaptiveBufferManagerOptions,
} from './adaptive-buffer-manager';

export type {
  NetworkQualitySource,
  AdaptiveBufferSessionOptions,
  ConfiguredSessionOptions,
} from './adaptive-buffer-session';
