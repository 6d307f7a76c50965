import type { MemoryPressureLevel } from './memory';
import type { NetworkQuality } from './network';

/**
 * Buffering policies, ordered from least to most forward content
 */
export type BufferStrategy = 'minimal' | 'conservative' | 'balanced' | 'aggressive';

/**
 * Buffering policy consumed by the media pipeline
 */
export interface BufferConfiguration {
  readonly strategy: BufferStrategy;

  /** Forward buffer the player should keep (seconds) */
  readonly preferredForwardBufferSeconds: number;

  /** Human-readable justification */
  readonly reason: string;
}

/**
 * Strategy ceiling permitted by each network quality
 */
export type NetworkCeilings = Record<NetworkQuality, BufferStrategy>;

export type AdaptationTrigger = 'memory' | 'network';

export interface BufferAdaptation {
  timestamp: number;
  trigger: AdaptationTrigger;
  configuration: BufferConfiguration;
}

export interface BufferInputs {
  memoryPressure: MemoryPressureLevel;
  networkQuality: NetworkQuality;
}
