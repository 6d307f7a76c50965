/**
 * Shared types for StreamCore
 */

export type {
  MemoryPressureLevel,
  MemorySample,
  MemoryState,
  MemoryThresholds,
} from './memory';

export type {
  NetworkQuality,
  NetworkConnectionType,
  NetworkPath,
} from './network';

export type {
  BufferStrategy,
  BufferConfiguration,
  NetworkCeilings,
  AdaptationTrigger,
  BufferAdaptation,
  BufferInputs,
} from './buffer';

export type {
  CleanupPriority,
  CleanupResult,
  ResourceCleaner,
} from './cleanup';

export type {
  LogLevel,
  LogEntry,
  LogSink,
} from './logging';
