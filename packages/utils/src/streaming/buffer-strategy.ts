/**
 * Buffer strategy ordering
 */

import type { BufferStrategy } from '@streamcore/types';

export const BUFFER_STRATEGIES: readonly BufferStrategy[] = ['minimal', 'conservative', 'balanced', 'aggressive'];

export const BUFFER_STRATEGY_RANK: Record<BufferStrategy, number> = {
  minimal: 0,
  conservative: 1,
  balanced: 2,
  aggressive: 3,
};

export function compareBufferStrategies(a: BufferStrategy, b: BufferStrategy): number {
  return BUFFER_STRATEGY_RANK[a] - BUFFER_STRATEGY_RANK[b];
}

/**
 * Most conservative of the given strategies
 */
export function minBufferStrategy(first: BufferStrategy, ...rest: BufferStrategy[]): BufferStrategy {
  return rest.reduce(
    (lowest, strategy) => (compareBufferStrategies(strategy, lowest) < 0 ? strategy : lowest),
    first
  );
}

export function clampBufferStrategy(
  strategy: BufferStrategy,
  floor: BufferStrategy,
  ceiling: BufferStrategy
): BufferStrategy {
  if (compareBufferStrategies(strategy, floor) < 0) return floor;
  if (compareBufferStrategies(strategy, ceiling) > 0) return ceiling;
  return strategy;
}

export function describeBufferStrategy(strategy: BufferStrategy): string {
  switch (strategy) {
    case 'minimal':
      return 'Minimal (memory critical)';
    case 'conservative':
      return 'Conservative (low resources)';
    case 'balanced':
      return 'Balanced (normal)';
    case 'aggressive':
      return 'Aggressive (optimal conditions)';
  }
}
