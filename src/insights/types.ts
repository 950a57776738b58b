/**
 * Insight Types
 */

/** A single trend insight comparing the current snapshot to the previous one. */
export interface TrendInsight {
  metric: string;
  current: number;
  previous: number;
  changePercent: number;
  direction: 'up' | 'down' | 'stable';
  severity: 'info' | 'warning' | 'alert';
  message: string;
}
