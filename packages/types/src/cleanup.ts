export type CleanupPriority = 'low' | 'medium' | 'high';

export interface CleanupResult {
  resourceName: string;
  bytesFreed: number;
  itemsRemoved: number;
  success: boolean;
  error?: string;
}

/**
 * A resource that can release memory under pressure
 */
export interface ResourceCleaner {
  /** Name used in logs and results */
  readonly resourceName: string;

  /** Higher priorities are cleaned first */
  readonly priority: CleanupPriority;

  /** Estimate freeable bytes without modifying state */
  estimateCleanup(): Promise<number>;

  /** Release the resource; failures are reported in the result */
  cleanup(): Promise<CleanupResult>;
}
