/**
 * Weekly Series
 *
 * Buckets commits and merged PRs into UTC weeks (Monday start) to produce
 * the time series the trend forecaster consumes.
 * Pure functions — no I/O.
 */

import type { CommitRecord, PullRequestRecord } from '../types/records.js';
import type { WeeklyBucket } from '../types/report.js';
import { churnOf } from './churn-aggregator.js';
import { pullRequestLeadTimeHours } from './pull-request-summary.js';
import { meanOrZero } from './statistics.js';

const MS_PER_WEEK = 7 * 24 * 60 * 60 * 1000;

/** UTC Monday (midnight) of the week containing the timestamp, in epoch ms. */
export function weekStartOf(timestamp: string): number {
  const d = new Date(timestamp);
  const daysSinceMonday = (d.getUTCDay() + 6) % 7;
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() - daysSinceMonday);
}

interface WeekAccumulator {
  commits: number;
  additions: number;
  deletions: number;
  cycleTimes: number[];
  mergedPullRequests: number;
}

/**
 * Build a gap-free weekly series from the first to the last active week.
 * Weeks without activity appear with zero churn and a null cycle time.
 */
export function buildWeeklySeries(
  commits: readonly CommitRecord[],
  pullRequests: readonly PullRequestRecord[]
): WeeklyBucket[] {
  const weeks = new Map<number, WeekAccumulator>();

  const getWeek = (week: number): WeekAccumulator => {
    let entry = weeks.get(week);
    if (!entry) {
      entry = { commits: 0, additions: 0, deletions: 0, cycleTimes: [], mergedPullRequests: 0 };
      weeks.set(week, entry);
    }
    return entry;
  };

  for (const c of commits) {
    const w = getWeek(weekStartOf(c.timestamp));
    w.commits++;
    w.additions += c.additions;
    w.deletions += c.deletions;
  }

  for (const pr of pullRequests) {
    const leadTime = pullRequestLeadTimeHours(pr);
    if (leadTime === null || pr.mergedAt === null) continue;
    const w = getWeek(weekStartOf(pr.mergedAt));
    w.mergedPullRequests++;
    if (leadTime >= 0) w.cycleTimes.push(leadTime);
  }

  if (weeks.size === 0) return [];

  const keys = [...weeks.keys()];
  const first = Math.min(...keys);
  const last = Math.max(...keys);

  const series: WeeklyBucket[] = [];
  for (let week = first; week <= last; week += MS_PER_WEEK) {
    const w = weeks.get(week);
    series.push({
      weekStart: new Date(week).toISOString().slice(0, 10),
      commits: w?.commits ?? 0,
      additions: w?.additions ?? 0,
      deletions: w?.deletions ?? 0,
      churn: w ? churnOf(w) : 0,
      mergedPullRequests: w?.mergedPullRequests ?? 0,
      avgCycleTimeHours: w && w.cycleTimes.length > 0 ? meanOrZero(w.cycleTimes) : null,
    });
  }
  return series;
}

/** Weekly churn, one value per week. */
export function churnSeries(series: readonly WeeklyBucket[]): number[] {
  return series.map((w) => w.churn);
}

/** Weekly mean cycle time, only for weeks that merged a PR. */
export function cycleTimeSeries(series: readonly WeeklyBucket[]): number[] {
  return series.flatMap((w) => (w.avgCycleTimeHours === null ? [] : [w.avgCycleTimeHours]));
}
