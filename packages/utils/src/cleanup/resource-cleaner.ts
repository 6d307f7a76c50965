/**
 * Resource cleaners for memory-pressure cleanup
 */

import type { CleanupPriority, CleanupResult, ResourceCleaner } from '@streamcore/types';

import { errorMessage } from '../errors';

const BYTES_PER_MB = 1_048_576;

export const CLEANUP_PRIORITY_RANK: Record<CleanupPriority, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

export function compareCleanupPriority(a: CleanupPriority, b: CleanupPriority): number {
  return CLEANUP_PRIORITY_RANK[a] - CLEANUP_PRIORITY_RANK[b];
}

export function cleanupFailure(resourceName: string, error: string): CleanupResult {
  return { resourceName, bytesFreed: 0, itemsRemoved: 0, success: false, error };
}

export function freedMB(result: CleanupResult): number {
  return result.bytesFreed / BYTES_PER_MB;
}

export interface ImageCacheCleanerOptions {
  /** Clears the cache and returns the number of items removed */
  clearAction: () => number;
  /** Caches that cannot measure themselves report 0 */
  estimateSize?: number;
}

/**
 * Medium priority cleaner for in-memory image caches. Such caches rarely
 * expose their size, so freed bytes are reported as 0.
 */
export function createImageCacheCleaner(options: ImageCacheCleanerOptions): ResourceCleaner {
  const resourceName = 'Image Cache';

  return {
    resourceName,
    priority: 'medium',
    estimateCleanup: async () => options.estimateSize ?? 0,
    cleanup: async () => {
      try {
        const itemsRemoved = options.clearAction();
        return { resourceName, bytesFreed: 0, itemsRemoved, success: true };
      } catch (error) {
        return cleanupFailure(resourceName, errorMessage(error));
      }
    },
  };
}

export interface VideoCacheCleanerOptions {
  /** Deletes cached video files */
  deleteAction: () => void;
  /** Reports what the last deletion freed */
  statistics?: () => { bytesFreed: number; itemsRemoved: number };
  estimateSize?: number;
}

/**
 * High priority cleaner for cached video files
 */
export function createVideoCacheCleaner(options: VideoCacheCleanerOptions): ResourceCleaner {
  const resourceName = 'Video Cache';

  return {
    resourceName,
    priority: 'high',
    estimateCleanup: async () => options.estimateSize ?? 0,
    cleanup: async () => {
      try {
        options.deleteAction();
        const { bytesFreed, itemsRemoved } = options.statistics?.() ?? { bytesFreed: 0, itemsRemoved: 0 };
        return { resourceName, bytesFreed, itemsRemoved, success: true };
      } catch (error) {
        return cleanupFailure(resourceName, errorMessage(error));
      }
    },
  };
}
