/**
 * StreamCore utilities
 */

export {
  createUtilLogger,
  configureLogging,
  resetLogging,
  isLevelEnabled,
  formatLogEntry,
  createConsoleSink,
  createNullSink,
  createCompositeSink,
  LOG_LEVELS,
} from './logger';
export type { UtilLogger, LoggingOptions } from './logger';

export {
  StreamingCoreError,
  ConfigurationError,
  SamplingError,
  errorMessage,
} from './errors';

export {
  loadStreamingConfig,
  loadStreamingConfigFromEnv,
  memoryThresholdsSchema,
  networkCeilingsSchema,
  streamingConfigSchema,
  DEFAULT_STREAMING_CONFIG,
} from './config';
export type { StreamingConfig } from './config';

export * from './streaming';
export * from './cleanup';
