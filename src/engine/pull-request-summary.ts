/**
 * Pull Request Summary
 *
 * Size distribution, cycle time and review coverage across a PR batch.
 * Pure function — no I/O.
 */

import type { PullRequestRecord } from '../types/records.js';
import type { PullRequestSummary } from '../types/report.js';
import { churnOf } from './churn-aggregator.js';
import { hoursBetween, meanOrZero } from './statistics.js';

/** Upper bounds (exclusive) of each PR size class, in changed lines. */
export const PR_SIZE_BOUNDS = {
  small: 50,
  medium: 300,
  large: 1000,
} as const;

/**
 * Lead time of a merged PR in hours; null while unmerged.
 */
export function pullRequestLeadTimeHours(pr: PullRequestRecord): number | null {
  return pr.mergedAt ? hoursBetween(pr.createdAt, pr.mergedAt) : null;
}

export function summarizePullRequests(
  pullRequests: readonly PullRequestRecord[],
  lowReviewThreshold: number
): PullRequestSummary {
  const sizeDistribution = { small: 0, medium: 0, large: 0, extraLarge: 0 };
  const cycleTimes: number[] = [];
  let merged = 0;
  let lowReviewMerged = 0;
  let ciFailures = 0;

  for (const pr of pullRequests) {
    const size = churnOf(pr);
    if (size < PR_SIZE_BOUNDS.small) sizeDistribution.small++;
    else if (size < PR_SIZE_BOUNDS.medium) sizeDistribution.medium++;
    else if (size < PR_SIZE_BOUNDS.large) sizeDistribution.large++;
    else sizeDistribution.extraLarge++;

    if (pr.ciStatus === 'failure') ciFailures++;

    const leadTime = pullRequestLeadTimeHours(pr);
    if (leadTime === null) continue;

    merged++;
    if (leadTime >= 0) cycleTimes.push(leadTime);
    if (pr.reviewCount <= lowReviewThreshold) lowReviewMerged++;
  }

  return {
    total: pullRequests.length,
    merged,
    open: pullRequests.length - merged,
    avgCycleTimeHours: cycleTimes.length > 0 ? meanOrZero(cycleTimes) : null,
    sizeDistribution,
    lowReviewMerged,
    ciFailures,
  };
}
