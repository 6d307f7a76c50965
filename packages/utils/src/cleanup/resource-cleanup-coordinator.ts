/**
 * Resource Cleanup Coordinator
 *
 * Releases registered resources in priority order, either on demand or
 * automatically when the memory monitor reports pressure.
 */

import type {
  CleanupPriority,
  CleanupResult,
  MemoryPressureLevel,
  MemoryState,
  MemoryThresholds,
  ResourceCleaner,
} from '@streamcore/types';

import { errorMessage } from '../errors';
import { createUtilLogger, type UtilLogger } from '../logger';
import { memoryPressureOf } from '../streaming/memory-state';
import { DEFAULT_MEMORY_THRESHOLDS } from '../streaming/memory-thresholds';
import type { MemoryMonitor } from '../streaming/memory-monitor';
import { SubscriptionChannel, type Listener, type Unsubscribe } from '../streaming/subscription-channel';
import { compareCleanupPriority } from './resource-cleaner';

const defaultLogger = createUtilLogger('ResourceCleanupCoordinator');

type CleanupPressure = Exclude<MemoryPressureLevel, 'normal'>;

export interface ResourceCleanupCoordinatorOptions {
  thresholds?: MemoryThresholds;
  logger?: UtilLogger;
}

export class ResourceCleanupCoordinator {
  private cleaners: ResourceCleaner[];
  private readonly thresholds: MemoryThresholds;
  private readonly logger: UtilLogger;
  private readonly channel: SubscriptionChannel<CleanupResult[]>;

  private monitorSubscription?: Unsubscribe;
  private inFlight?: Promise<void>;
  private inFlightPressure?: CleanupPressure;
  private fullCleanupQueued = false;

  constructor(
    cleaners: ResourceCleaner[],
    private readonly memoryMonitor: MemoryMonitor,
    options: ResourceCleanupCoordinatorOptions = {}
  ) {
    this.cleaners = sortByPriority(cleaners);
    this.thresholds = options.thresholds ?? DEFAULT_MEMORY_THRESHOLDS;
    this.logger = options.logger ?? defaultLogger;
    this.channel = new SubscriptionChannel<CleanupResult[]>('cleanup-results', this.logger);
  }

  get isAutoCleanupEnabled(): boolean {
    return this.monitorSubscription !== undefined;
  }

  /** Registered cleaners, highest priority first */
  get registeredCleaners(): readonly ResourceCleaner[] {
    return [...this.cleaners];
  }

  register(cleaner: ResourceCleaner): void {
    this.cleaners = sortByPriority([...this.cleaners, cleaner]);
  }

  /**
   * Receive each non-empty batch of automatic cleanup results
   */
  subscribe(listener: Listener<CleanupResult[]>): Unsubscribe {
    return this.channel.subscribe(listener);
  }

  enableAutoCleanup(): void {
    if (this.monitorSubscription) return;

    this.monitorSubscription = this.memoryMonitor.subscribe(state => this.handleMemoryState(state));
    this.memoryMonitor.startMonitoring();

    this.logger.info('Automatic cleanup enabled', { cleaners: this.cleaners.length });
  }

  disableAutoCleanup(): void {
    if (!this.monitorSubscription) return;

    this.monitorSubscription();
    this.monitorSubscription = undefined;
    this.fullCleanupQueued = false;
    this.memoryMonitor.stopMonitoring();

    this.logger.info('Automatic cleanup disabled');
  }

  /**
   * Clean every registered resource, highest priority first
   */
  cleanupAll(): Promise<CleanupResult[]> {
    return this.runCleaners(this.cleaners);
  }

  /**
   * Clean resources whose priority is at or below `priority`
   */
  cleanupUpTo(priority: CleanupPriority): Promise<CleanupResult[]> {
    return this.runCleaners(
      this.cleaners.filter(cleaner => compareCleanupPriority(cleaner.priority, priority) <= 0)
    );
  }

  async estimateTotalCleanup(): Promise<number> {
    let total = 0;
    for (const cleaner of this.cleaners) {
      total += await cleaner.estimateCleanup();
    }
    return total;
  }

  /**
   * Resolves once no automatic pass is running, including a queued follow-up
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private async runCleaners(cleaners: ResourceCleaner[]): Promise<CleanupResult[]> {
    const results: CleanupResult[] = [];
    for (const cleaner of cleaners) {
      const result = await cleaner.cleanup();
      if (!result.success) {
        this.logger.warn('Resource cleanup failed', {
          resource: result.resourceName,
          error: result.error,
        });
      }
      results.push(result);
    }
    return results;
  }

  private handleMemoryState(state: MemoryState): void {
    const pressure = memoryPressureOf(state, this.thresholds);
    if (pressure === 'normal') return;

    if (this.inFlight) {
      // Only an escalation from warning to critical is queued
      if (pressure === 'critical' && this.inFlightPressure === 'warning') {
        this.fullCleanupQueued = true;
        this.logger.debug('Critical pressure during warning cleanup, full cleanup queued');
      } else {
        this.logger.debug('Cleanup already running, skipping', { pressure });
      }
      return;
    }

    this.startAutomaticPass(pressure);
  }

  private startAutomaticPass(pressure: CleanupPressure): void {
    const pass = pressure === 'critical' ? this.cleanupAll() : this.cleanupUpTo('medium');

    this.inFlightPressure = pressure;
    this.inFlight = pass
      .then(results => {
        const bytesFreed = results.reduce((sum, result) => sum + result.bytesFreed, 0);
        this.logger.info('Automatic cleanup finished', {
          pressure,
          resources: results.length,
          bytesFreed,
        });
        if (results.length > 0) {
          this.channel.emit(results);
        }
      })
      .catch(error => {
        this.logger.error('Automatic cleanup failed', { pressure, error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight = undefined;
        this.inFlightPressure = undefined;

        if (this.fullCleanupQueued) {
          this.fullCleanupQueued = false;
          if (this.isAutoCleanupEnabled) {
            this.startAutomaticPass('critical');
          }
        }
      });
  }
}

function sortByPriority(cleaners: ResourceCleaner[]): ResourceCleaner[] {
  return [...cleaners].sort((a, b) => compareCleanupPriority(b.priority, a.priority));
}
