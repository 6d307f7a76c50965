/**
 * Adaptive Buffer Session
 *
 * Connects a memory monitor and an optional network quality source to one
 * buffer manager for the lifetime of a playback session. Consumers receive
 * the session's manager explicitly.
 */

import type { BufferConfiguration, MemoryState, NetworkQuality } from '@streamcore/types';

import { DEFAULT_STREAMING_CONFIG, type StreamingConfig } from '../config';
import { errorMessage } from '../errors';
import { configureLogging, createUtilLogger, type UtilLogger } from '../logger';
import { AdaptiveBufferManager, type BufferManager } from './adaptive-buffer-manager';
import { PollingMemoryMonitor, type MemoryMonitor, type MemoryReader } from './memory-monitor';
import type { Listener, Unsubscribe } from './subscription-channel';

const defaultLogger = createUtilLogger('AdaptiveBufferSession');

/**
 * External producer of network quality changes
 */
export interface NetworkQualitySource {
  subscribe(listener: Listener<NetworkQuality>): Unsubscribe;
}

export interface AdaptiveBufferSessionOptions {
  memoryMonitor: MemoryMonitor;
  bufferManager: BufferManager;
  networkSource?: NetworkQualitySource;
  logger?: UtilLogger;
}

export class AdaptiveBufferSession {
  readonly memoryMonitor: MemoryMonitor;
  readonly bufferManager: BufferManager;

  private readonly networkSource?: NetworkQualitySource;
  private readonly logger: UtilLogger;
  private subscriptions: Unsubscribe[] = [];

  constructor(options: AdaptiveBufferSessionOptions) {
    this.memoryMonitor = options.memoryMonitor;
    this.bufferManager = options.bufferManager;
    this.networkSource = options.networkSource;
    this.logger = options.logger ?? defaultLogger;
  }

  get isRunning(): boolean {
    return this.subscriptions.length > 0;
  }

  get currentConfiguration(): BufferConfiguration {
    return this.bufferManager.currentConfiguration;
  }

  start(): void {
    if (this.isRunning) return;

    this.subscriptions.push(
      this.memoryMonitor.subscribe(state => this.forwardMemoryState(state))
    );

    if (this.networkSource) {
      this.subscriptions.push(
        this.networkSource.subscribe(quality => this.forwardNetworkQuality(quality))
      );
    }

    this.memoryMonitor.startMonitoring();
    this.logger.info('Buffer session started', { networkSource: this.networkSource !== undefined });
  }

  stop(): void {
    if (!this.isRunning) return;

    this.subscriptions.forEach(unsubscribe => unsubscribe());
    this.subscriptions = [];
    this.memoryMonitor.stopMonitoring();

    this.logger.info('Buffer session stopped', {
      strategy: this.bufferManager.currentConfiguration.strategy,
    });
  }

  /**
   * Report a network change from a source that does not support subscription
   */
  updateNetworkQuality(quality: NetworkQuality): Promise<BufferConfiguration> {
    return this.bufferManager.updateNetworkQuality(quality);
  }

  private forwardMemoryState(state: MemoryState): void {
    this.bufferManager.updateMemoryState(state).catch(error => {
      this.logger.error('Failed to apply memory state', { error: errorMessage(error) });
    });
  }

  private forwardNetworkQuality(quality: NetworkQuality): void {
    this.bufferManager.updateNetworkQuality(quality).catch(error => {
      this.logger.error('Failed to apply network quality', { quality, error: errorMessage(error) });
    });
  }
}

export interface ConfiguredSessionOptions {
  reader?: MemoryReader;
  networkSource?: NetworkQualitySource;
}

/**
 * Polling session built from a loaded configuration. The configured log
 * level is applied process-wide.
 */
export function createAdaptiveBufferSession(
  config: StreamingConfig = DEFAULT_STREAMING_CONFIG,
  options: ConfiguredSessionOptions = {}
): AdaptiveBufferSession {
  configureLogging({ minimumLevel: config.logLevel });

  return new AdaptiveBufferSession({
    memoryMonitor: new PollingMemoryMonitor(options.reader, { thresholds: config.thresholds }),
    bufferManager: new AdaptiveBufferManager({
      thresholds: config.thresholds,
      networkCeilings: config.networkCeilings,
    }),
    networkSource: options.networkSource,
  });
}
