export {
  CLEANUP_PRIORITY_RANK,
  compareCleanupPriority,
  cleanupFailure,
  freedMB,
  createImageCacheCleaner,
  createVideoCacheCleaner,
} from './resource-cleaner';
export type { ImageCacheCleanerOptions, VideoCacheCleanerOptions } from './resource-cleaner';

export { ResourceCleanupCoordinator } from './resource-cleanup-coordinator';
export type { ResourceCleanupCoordinatorOptions } from './resource-cleanup-coordinator';
