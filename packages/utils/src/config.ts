/**
 * Streaming configuration
 *
 * Memory thresholds, network ceilings and the log level are the only tunable
 * inputs. Values are merged over the defaults and validated before use.
 */

import { z } from 'zod';

import type { LogLevel, MemoryThresholds, NetworkCeilings } from '@streamcore/types';

import { ConfigurationError } from './errors';
import { DEFAULT_MEMORY_THRESHOLDS } from './streaming/memory-thresholds';
import { DEFAULT_NETWORK_CEILINGS } from './streaming/network-quality';

export interface StreamingConfig {
  thresholds: MemoryThresholds;
  networkCeilings: NetworkCeilings;
  logLevel: LogLevel;
}

const bufferStrategySchema = z.enum(['minimal', 'conservative', 'balanced', 'aggressive']);

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const memoryThresholdsSchema = z
  .object({
    warningAvailableMB: z.number().finite().nonnegative(),
    criticalAvailableMB: z.number().finite().nonnegative(),
    pollingInterval: z.number().int().positive(),
  })
  .refine(thresholds => thresholds.criticalAvailableMB < thresholds.warningAvailableMB, {
    message: 'criticalAvailableMB must be lower than warningAvailableMB',
    path: ['criticalAvailableMB'],
  });

export const networkCeilingsSchema = z.object({
  offline: bufferStrategySchema,
  poor: bufferStrategySchema,
  fair: bufferStrategySchema,
  good: bufferStrategySchema,
  excellent: bufferStrategySchema,
});

export const streamingConfigSchema = z.object({
  thresholds: memoryThresholdsSchema,
  networkCeilings: networkCeilingsSchema,
  logLevel: logLevelSchema,
});

export const DEFAULT_STREAMING_CONFIG: StreamingConfig = {
  thresholds: DEFAULT_MEMORY_THRESHOLDS,
  networkCeilings: DEFAULT_NETWORK_CEILINGS,
  logLevel: 'info',
};

const partialConfigSchema = z
  .object({
    thresholds: z.record(z.unknown()).optional(),
    networkCeilings: z.record(z.unknown()).optional(),
    logLevel: z.unknown().optional(),
  })
  .passthrough();

/**
 * Merge `input` over the defaults and validate the result
 */
export function loadStreamingConfig(input: unknown = {}): StreamingConfig {
  const partial = partialConfigSchema.safeParse(input);
  if (!partial.success) {
    throw new ConfigurationError('Invalid streaming configuration', formatIssues(partial.error));
  }

  const merged = {
    thresholds: { ...DEFAULT_STREAMING_CONFIG.thresholds, ...partial.data.thresholds },
    networkCeilings: { ...DEFAULT_STREAMING_CONFIG.networkCeilings, ...partial.data.networkCeilings },
    logLevel: partial.data.logLevel ?? DEFAULT_STREAMING_CONFIG.logLevel,
  };

  const result = streamingConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError('Invalid streaming configuration', formatIssues(result.error));
  }

  return result.data;
}

const ENV_KEYS = {
  warningAvailableMB: 'STREAMCORE_MEMORY_WARNING_MB',
  criticalAvailableMB: 'STREAMCORE_MEMORY_CRITICAL_MB',
  pollingInterval: 'STREAMCORE_MEMORY_POLL_INTERVAL_MS',
  logLevel: 'STREAMCORE_LOG_LEVEL',
} as const;

/**
 * Read configuration from environment variables; unset variables keep their defaults
 */
export function loadStreamingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StreamingConfig {
  const thresholds: Record<string, unknown> = {};

  for (const key of ['warningAvailableMB', 'criticalAvailableMB', 'pollingInterval'] as const) {
    const raw = env[ENV_KEYS[key]];
    if (raw !== undefined && raw.trim() !== '') {
      thresholds[key] = Number(raw);
    }
  }

  const logLevel = env[ENV_KEYS.logLevel]?.trim().toLowerCase();

  return loadStreamingConfig({
    thresholds,
    ...(logLevel ? { logLevel } : {}),
  });
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
