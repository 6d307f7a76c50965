import { describe, it, expect } from 'vitest';
import {
  cleanupFailure,
  compareCleanupPriority,
  createImageCacheCleaner,
  createVideoCacheCleaner,
  freedMB,
} from '@streamcore/utils';

import { MB } from '../helpers/memory';

describe('createImageCacheCleaner', () => {
  it('is a medium priority cleaner', () => {
    const cleaner = createImageCacheCleaner({ clearAction: () => 0 });

    expect(cleaner.resourceName).toBe('Image Cache');
    expect(cleaner.priority).toBe('medium');
  });

  it('reports removed items but no freed bytes', async () => {
    const cleaner = createImageCacheCleaner({ clearAction: () => 12, estimateSize: 4 * MB });

    await expect(cleaner.cleanup()).resolves.toEqual({
      resourceName: 'Image Cache',
      bytesFreed: 0,
      itemsRemoved: 12,
      success: true,
    });
    await expect(cleaner.estimateCleanup()).resolves.toBe(4 * MB);
  });

  it('turns a failing clear into a failure result', async () => {
    const cleaner = createImageCacheCleaner({
      clearAction: () => {
        throw new Error('cache locked');
      },
    });

    await expect(cleaner.cleanup()).resolves.toEqual(cleanupFailure('Image Cache', 'cache locked'));
    await expect(cleaner.estimateCleanup()).resolves.toBe(0);
  });
});

describe('createVideoCacheCleaner', () => {
  it('is a high priority cleaner', () => {
    expect(createVideoCacheCleaner({ deleteAction: () => {} }).priority).toBe('high');
  });

  it('reports statistics after deleting', async () => {
    let deleted = false;
    const cleaner = createVideoCacheCleaner({
      deleteAction: () => {
        deleted = true;
      },
      statistics: () => ({ bytesFreed: 64 * MB, itemsRemoved: 3 }),
    });

    const result = await cleaner.cleanup();

    expect(deleted).toBe(true);
    expect(result).toEqual({ resourceName: 'Video Cache', bytesFreed: 64 * MB, itemsRemoved: 3, success: true });
    expect(freedMB(result)).toBe(64);
  });

  it('reports zero without statistics', async () => {
    const cleaner = createVideoCacheCleaner({ deleteAction: () => {} });

    await expect(cleaner.cleanup()).resolves.toEqual({
      resourceName: 'Video Cache',
      bytesFreed: 0,
      itemsRemoved: 0,
      success: true,
    });
  });

  it('turns a failing delete into a failure result', async () => {
    const cleaner = createVideoCacheCleaner({
      deleteAction: () => {
        throw new Error('disk busy');
      },
    });

    await expect(cleaner.cleanup()).resolves.toEqual({
      resourceName: 'Video Cache',
      bytesFreed: 0,
      itemsRemoved: 0,
      success: false,
      error: 'disk busy',
    });
  });
});

describe('compareCleanupPriority', () => {
  it('orders low < medium < high', () => {
    expect(compareCleanupPriority('low', 'medium')).toBeLessThan(0);
    expect(compareCleanupPriority('high', 'medium')).toBeGreaterThan(0);
    expect(compareCleanupPriority('medium', 'medium')).toBe(0);
  });
});
