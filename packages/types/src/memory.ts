/**
 * Memory pressure classification, ordered from least to most constrained
 */
export type MemoryPressureLevel = 'normal' | 'warning' | 'critical';

/**
 * Raw reading produced by a platform memory sampler
 */
export interface MemorySample {
  /** Bytes currently available to the process */
  availableBytes: number;

  /** Total physical bytes */
  totalBytes: number;

  /** Bytes in use */
  usedBytes: number;
}

/**
 * Point-in-time memory snapshot
 */
export interface MemoryState extends Readonly<MemorySample> {
  /** Sample time (epoch milliseconds) */
  readonly timestamp: number;
}

/**
 * Thresholds mapping available memory to a pressure level
 */
export interface MemoryThresholds {
  /** Below this many available MB memory is under warning pressure */
  readonly warningAvailableMB: number;

  /** Below this many available MB memory is critical */
  readonly criticalAvailableMB: number;

  /** Sampling interval (milliseconds) */
  readonly pollingInterval: number;
}
