/**
 * Memory snapshots and derived metrics
 */

import type {
  MemoryPressureLevel,
  MemorySample,
  MemoryState,
  MemoryThresholds,
} from '@streamcore/types';

import { classifyMemoryPressure } from './memory-thresholds';

const BYTES_PER_MB = 1_048_576;

export function createMemoryState(sample: MemorySample, timestamp: number = Date.now()): MemoryState {
  return Object.freeze({
    availableBytes: sample.availableBytes,
    totalBytes: sample.totalBytes,
    usedBytes: sample.usedBytes,
    timestamp,
  });
}

export function availableMB(state: MemorySample): number {
  return state.availableBytes / BYTES_PER_MB;
}

export function usedMB(state: MemorySample): number {
  return state.usedBytes / BYTES_PER_MB;
}

/**
 * Used share of total memory (0-100); 0 when the total is unknown
 */
export function memoryUsedPercentage(state: MemorySample): number {
  if (state.totalBytes <= 0) return 0;
  return (state.usedBytes / state.totalBytes) * 100;
}

export function memoryPressureOf(state: MemorySample, thresholds: MemoryThresholds): MemoryPressureLevel {
  return classifyMemoryPressure(thresholds, availableMB(state));
}
