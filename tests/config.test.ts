import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_STREAMING_CONFIG,
  loadStreamingConfig,
  loadStreamingConfigFromEnv,
} from '@streamcore/utils';

function configurationIssues(load: () => unknown): string[] {
  try {
    load();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadStreamingConfig', () => {
  it('returns the defaults for empty input', () => {
    expect(loadStreamingConfig()).toEqual(DEFAULT_STREAMING_CONFIG);
    expect(loadStreamingConfig().thresholds).toEqual({
      warningAvailableMB: 100,
      criticalAvailableMB: 50,
      pollingInterval: 2000,
    });
  });

  it('merges partial overrides over the defaults', () => {
    const config = loadStreamingConfig({
      thresholds: { warningAvailableMB: 300 },
      networkCeilings: { excellent: 'balanced' },
      logLevel: 'debug',
    });

    expect(config.thresholds).toEqual({ warningAvailableMB: 300, criticalAvailableMB: 50, pollingInterval: 2000 });
    expect(config.networkCeilings).toEqual({
      offline: 'minimal',
      poor: 'minimal',
      fair: 'conservative',
      good: 'balanced',
      excellent: 'balanced',
    });
    expect(config.logLevel).toBe('debug');
  });

  it('rejects a critical threshold that is not below the warning threshold', () => {
    expect(() => loadStreamingConfig({ thresholds: { criticalAvailableMB: 150 } })).toThrow(ConfigurationError);
    expect(configurationIssues(() => loadStreamingConfig({ thresholds: { criticalAvailableMB: 100 } }))).toEqual([
      'thresholds.criticalAvailableMB: criticalAvailableMB must be lower than warningAvailableMB',
    ]);
  });

  it('rejects a non-positive polling interval', () => {
    const issues = configurationIssues(() => loadStreamingConfig({ thresholds: { pollingInterval: 0 } }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^thresholds\.pollingInterval: /);
  });

  it('rejects unknown strategies and log levels', () => {
    const issues = configurationIssues(() =>
      loadStreamingConfig({ networkCeilings: { poor: 'huge' }, logLevel: 'verbose' })
    );

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^networkCeilings\.poor: /);
    expect(issues[1]).toMatch(/^logLevel: /);
  });

  it('rejects input that is not an object', () => {
    expect(configurationIssues(() => loadStreamingConfig('nope'))).toEqual(['Expected object, received string']);
  });

  it('carries the error code', () => {
    try {
      loadStreamingConfig({ logLevel: 'loud' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: 'CONFIGURATION_ERROR', message: 'Invalid streaming configuration' });
      return;
    }
    throw new Error('expected a ConfigurationError');
  });
});

describe('loadStreamingConfigFromEnv', () => {
  it('reads thresholds and log level from the environment', () => {
    const config = loadStreamingConfigFromEnv({
      STREAMCORE_MEMORY_WARNING_MB: '256',
      STREAMCORE_MEMORY_CRITICAL_MB: '64',
      STREAMCORE_MEMORY_POLL_INTERVAL_MS: '500',
      STREAMCORE_LOG_LEVEL: ' DEBUG ',
    });

    expect(config.thresholds).toEqual({ warningAvailableMB: 256, criticalAvailableMB: 64, pollingInterval: 500 });
    expect(config.logLevel).toBe('debug');
  });

  it('keeps defaults for unset or blank variables', () => {
    const config = loadStreamingConfigFromEnv({ STREAMCORE_MEMORY_WARNING_MB: '  ', STREAMCORE_LOG_LEVEL: '' });

    expect(config).toEqual(DEFAULT_STREAMING_CONFIG);
  });

  it('rejects values that are not numbers', () => {
    const issues = configurationIssues(() =>
      loadStreamingConfigFromEnv({ STREAMCORE_MEMORY_POLL_INTERVAL_MS: 'soon' })
    );

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^thresholds\.pollingInterval: /);
  });
});
