/**
 * Graceful Degradation Types
 */

export type DependencyName = 'store' | 'source';

export type DependencyStatus = 'healthy' | 'degraded' | 'down';

export type DegradationLevel = 'none' | 'partial' | 'full';

export interface DependencyHealth {
  name: DependencyName;
  status: DependencyStatus;
  lastCheck: number;
  consecutiveFailures: number;
  lastError?: string;
  /** Circuit breaker: open = requests blocked */
  circuitOpen: boolean;
  circuitOpenUntil?: number;
}
