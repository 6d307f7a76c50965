/**
 * Memory thresholds and pressure classification
 */

import type { MemoryPressureLevel, MemoryThresholds } from '@streamcore/types';

export const MEMORY_PRESSURE_LEVELS: readonly MemoryPressureLevel[] = ['normal', 'warning', 'critical'];

/**
 * Default thresholds: warning below 100MB, critical below 50MB, sampled every 2 seconds
 */
export const DEFAULT_MEMORY_THRESHOLDS: MemoryThresholds = Object.freeze({
  warningAvailableMB: 100,
  criticalAvailableMB: 50,
  pollingInterval: 2000,
});

/**
 * Build thresholds from overrides. `criticalAvailableMB < warningAvailableMB`
 * is left to the caller; the configuration loader validates it.
 */
export function createMemoryThresholds(overrides: Partial<MemoryThresholds> = {}): MemoryThresholds {
  return Object.freeze({ ...DEFAULT_MEMORY_THRESHOLDS, ...overrides });
}

export function classifyMemoryPressure(
  thresholds: MemoryThresholds,
  availableMB: number
): MemoryPressureLevel {
  if (availableMB < thresholds.criticalAvailableMB) return 'critical';
  if (availableMB < thresholds.warningAvailableMB) return 'warning';
  return 'normal';
}

export function compareMemoryPressure(a: MemoryPressureLevel, b: MemoryPressureLevel): number {
  return MEMORY_PRESSURE_LEVELS.indexOf(a) - MEMORY_PRESSURE_LEVELS.indexOf(b);
}
