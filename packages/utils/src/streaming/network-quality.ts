/**
 * Network quality ordering and classification
 */

import type { NetworkCeilings, NetworkPath, NetworkQuality } from '@streamcore/types';

export const NETWORK_QUALITY_LEVELS: readonly NetworkQuality[] = ['offline', 'poor', 'fair', 'good', 'excellent'];

/**
 * Strategy ceiling per network quality; overridable per manager
 */
export const DEFAULT_NETWORK_CEILINGS: Readonly<NetworkCeilings> = Object.freeze({
  offline: 'minimal',
  poor: 'minimal',
  fair: 'conservative',
  good: 'balanced',
  excellent: 'aggressive',
});

/**
 * Apply overrides to the default ceilings. Entries left `undefined` keep their default.
 */
export function mergeNetworkCeilings(overrides: Partial<NetworkCeilings> = {}): NetworkCeilings {
  return {
    offline: overrides.offline ?? DEFAULT_NETWORK_CEILINGS.offline,
    poor: overrides.poor ?? DEFAULT_NETWORK_CEILINGS.poor,
    fair: overrides.fair ?? DEFAULT_NETWORK_CEILINGS.fair,
    good: overrides.good ?? DEFAULT_NETWORK_CEILINGS.good,
    excellent: overrides.excellent ?? DEFAULT_NETWORK_CEILINGS.excellent,
  };
}

export function compareNetworkQuality(a: NetworkQuality, b: NetworkQuality): number {
  return NETWORK_QUALITY_LEVELS.indexOf(a) - NETWORK_QUALITY_LEVELS.indexOf(b);
}

/**
 * Estimate quality from path properties. Expensive (metered) links are capped at fair.
 */
export function determineNetworkQuality(path: NetworkPath): NetworkQuality {
  if (path.status !== 'satisfied') {
    return 'offline';
  }

  if (path.isConstrained) {
    return 'poor';
  }

  let quality = baseQualityFor(path.connectionType);

  if (path.isExpensive && compareNetworkQuality(quality, 'fair') > 0) {
    quality = 'fair';
  }

  return quality;
}

function baseQualityFor(connectionType: NetworkPath['connectionType']): NetworkQuality {
  switch (connectionType) {
    case 'wifi':
    case 'wired':
    case 'loopback':
      return 'excellent';
    case 'cellular':
      return 'good';
    case 'other':
      return 'fair';
  }
}
