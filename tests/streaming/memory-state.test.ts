import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MEMORY_THRESHOLDS,
  availableMB,
  createMemoryState,
  memoryPressureOf,
  memoryUsedPercentage,
  usedMB,
} from '@streamcore/utils';

import { MB } from '../helpers/memory';

describe('createMemoryState', () => {
  it('copies the sample and stamps it', () => {
    const state = createMemoryState({ availableBytes: 10, totalBytes: 40, usedBytes: 30 }, 1234);

    expect(state).toEqual({ availableBytes: 10, totalBytes: 40, usedBytes: 30, timestamp: 1234 });
  });

  it('produces a frozen snapshot', () => {
    const state = createMemoryState({ availableBytes: 10, totalBytes: 40, usedBytes: 30 }, 1);

    expect(Object.isFrozen(state)).toBe(true);
  });
});

describe('memory metrics', () => {
  it('computes used percentage', () => {
    const state = createMemoryState({ availableBytes: 25, totalBytes: 100, usedBytes: 75 }, 0);

    expect(memoryUsedPercentage(state)).toBe(75);
  });

  it('returns 0 percent when total is zero', () => {
    const state = createMemoryState({ availableBytes: 0, totalBytes: 0, usedBytes: 500 }, 0);

    expect(memoryUsedPercentage(state)).toBe(0);
  });

  it('converts bytes to megabytes', () => {
    const state = createMemoryState({ availableBytes: 512 * MB, totalBytes: 2048 * MB, usedBytes: 1536 * MB }, 0);

    expect(availableMB(state)).toBe(512);
    expect(usedMB(state)).toBe(1536);
  });

  it('classifies pressure from available megabytes', () => {
    const critical = createMemoryState({ availableBytes: 40 * MB, totalBytes: 1024 * MB, usedBytes: 984 * MB }, 0);
    const warning = createMemoryState({ availableBytes: 80 * MB, totalBytes: 1024 * MB, usedBytes: 944 * MB }, 0);

    expect(memoryPressureOf(critical, DEFAULT_MEMORY_THRESHOLDS)).toBe('critical');
    expect(memoryPressureOf(warning, DEFAULT_MEMORY_THRESHOLDS)).toBe('warning');
  });
});
