/**
 * Canonical buffer configurations
 */

import type { BufferConfiguration, BufferStrategy } from '@streamcore/types';

export function createBufferConfiguration(
  strategy: BufferStrategy,
  preferredForwardBufferSeconds: number,
  reason: string
): BufferConfiguration {
  return Object.freeze({ strategy, preferredForwardBufferSeconds, reason });
}

export const BUFFER_PRESETS: Readonly<Record<BufferStrategy, BufferConfiguration>> = Object.freeze({
  minimal: createBufferConfiguration('minimal', 2, 'Memory critical - minimal buffering'),
  conservative: createBufferConfiguration('conservative', 5, 'Limited resources - conservative buffering'),
  balanced: createBufferConfiguration('balanced', 10, 'Normal conditions - balanced buffering'),
  aggressive: createBufferConfiguration('aggressive', 30, 'Optimal conditions - aggressive buffering'),
});

export function bufferPresetFor(strategy: BufferStrategy): BufferConfiguration {
  return BUFFER_PRESETS[strategy];
}

export function configurationsEqual(a: BufferConfiguration, b: BufferConfiguration): boolean {
  return (
    a.strategy === b.strategy &&
    a.preferredForwardBufferSeconds === b.preferredForwardBufferSeconds &&
    a.reason === b.reason
  );
}
