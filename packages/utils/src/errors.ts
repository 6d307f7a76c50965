/**
 * Error types raised by StreamCore utilities
 */

export class StreamingCoreError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'StreamingCoreError';
  }
}

export class ConfigurationError extends StreamingCoreError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SamplingError extends StreamingCoreError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SAMPLING_ERROR', cause === undefined ? undefined : { cause });
    this.name = 'SamplingError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
