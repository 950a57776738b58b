/**
 * Trend Analyzer
 *
 * Pure functions to compare a report snapshot against the previous one
 * for the same repository. Produces human-readable insights with
 * severity levels. No I/O — all data passed in, results returned.
 */

import type { Snapshot } from '../history/types.js';
import type { TrendInsight } from './types.js';
import type { TrendThresholds } from '../config/thresholds.js';
import { DEFAULT_ANALYTICS_CONFIG } from '../config/thresholds.js';

/**
 * Analyze trends between current and previous snapshots.
 * Returns insights sorted by severity (alerts first).
 *
 * If previous is null (first-ever snapshot), returns empty array.
 * DORA metrics are compared only when both periods had deployments.
 */
export function analyzeTrends(
  current: Snapshot,
  previous: Snapshot | null,
  thresholds: TrendThresholds = DEFAULT_ANALYTICS_CONFIG.trends
): TrendInsight[] {
  if (!previous) return [];

  const t = thresholds;
  const insights: TrendInsight[] = [];

  insights.push(
    compareStat('Commits', current.totalCommits, previous.totalCommits, t, {
      upGood: true,
      format: (c, p) => `${c} commits (was ${p})`,
    })
  );

  insights.push(
    compareStat('Code Churn', current.totalChurn, previous.totalChurn, t, {
      upGood: true,
      format: (c, p) => `${c} lines changed (was ${p})`,
    })
  );

  insights.push(
    compareStat('High-Risk Changes', current.highRiskCount, previous.highRiskCount, t, {
      upGood: false,
      format: (c, p) => `${c} high-risk changes (was ${p})`,
    })
  );

  if (current.deploymentFrequencyPerDay > 0 && previous.deploymentFrequencyPerDay > 0) {
    insights.push(
      compareStat('Lead Time', current.leadTimeHours, previous.leadTimeHours, t, {
        upGood: false,
        unit: 'h',
        format: (c, p) => `${c.toFixed(1)}h lead time (was ${p.toFixed(1)}h)`,
      })
    );

    insights.push(
      compareStat(
        'Deploy Frequency',
        current.deploymentFrequencyPerDay,
        previous.deploymentFrequencyPerDay,
        t,
        {
          upGood: true,
          unit: '/day',
          format: (c, p) => `${c.toFixed(2)} deploys/day (was ${p.toFixed(2)})`,
        }
      )
    );

    insights.push(
      compareStat('Change Failure Rate', current.changeFailureRate, previous.changeFailureRate, t, {
        upGood: false,
        format: (c, p) => `${Math.round(c * 100)}% failed deploys (was ${Math.round(p * 100)}%)`,
      })
    );

    insights.push(
      compareStat('MTTR', current.mttrHours, previous.mttrHours, t, {
        upGood: false,
        unit: 'h',
        format: (c, p) => `${c.toFixed(1)}h to restore (was ${p.toFixed(1)}h)`,
      })
    );
  }

  // Filter out stable/trivial changes and sort by severity
  return insights.filter((i) => i.direction !== 'stable').sort(severitySort);
}

// ─── Internals ──────────────────────────────────────────────

interface CompareOptions {
  upGood: boolean;
  unit?: string;
  format: (current: number, previous: number) => string;
}

function compareStat(
  metric: string,
  current: number,
  previous: number,
  t: TrendThresholds,
  opts: CompareOptions
): TrendInsight {
  const changePercent =
    previous === 0 ? (current > 0 ? 100 : 0) : Math.round(((current - previous) / previous) * 100);

  const absChange = Math.abs(changePercent);
  const direction: TrendInsight['direction'] =
    absChange < t.stablePercent ? 'stable' : changePercent > 0 ? 'up' : 'down';

  // Severity depends on whether the direction is bad for the metric
  const isBadDirection =
    (direction === 'up' && !opts.upGood) || (direction === 'down' && opts.upGood);

  let severity: TrendInsight['severity'] = 'info';
  if (isBadDirection && absChange >= t.trendAlertPercent) {
    severity = 'alert';
  } else if (isBadDirection && absChange >= t.trendWarningPercent) {
    severity = 'warning';
  }

  const sign = direction === 'up' ? '+' : '';
  const message =
    direction === 'stable'
      ? `${metric}: stable at ${current}${opts.unit ?? ''}`
      : `${metric}: ${sign}${changePercent}% (${opts.format(current, previous)})`;

  return {
    metric,
    current,
    previous,
    changePercent,
    direction,
    severity,
    message,
  };
}

const SEVERITY_ORDER: Record<TrendInsight['severity'], number> = {
  alert: 0,
  warning: 1,
  info: 2,
};

function severitySort(a: TrendInsight, b: TrendInsight): number {
  return SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity];
}
