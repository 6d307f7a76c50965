export type NetworkQuality = 'offline' | 'poor' | 'fair' | 'good' | 'excellent';

export type NetworkConnectionType = 'wifi' | 'cellular' | 'wired' | 'loopback' | 'other';

/**
 * Network path properties reported by the platform
 */
export interface NetworkPath {
  status: 'satisfied' | 'unsatisfied' | 'requiresConnection';
  connectionType: NetworkConnectionType;

  /** Metered connection such as cellular or a personal hotspot */
  isExpensive: boolean;

  /** Low data mode */
  isConstrained: boolean;
}
