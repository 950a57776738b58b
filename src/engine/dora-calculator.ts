/**
 * DORA Calculator
 *
 * Computes the four key metrics (lead time, deployment frequency, change
 * failure rate, MTTR) from normalized commit, PR, deployment and incident
 * records, and bands each into elite/high/medium/low.
 *
 * Every association between records is a single sweep over time-sorted
 * lists, so the calculation stays linear after sorting.
 */

import type {
  CommitRecord,
  DeploymentRecord,
  IncidentRecord,
  PullRequestRecord,
} from '../types/records.js';
import type { AnalysisWarning, DORAMetrics, PerformanceCategory } from '../types/report.js';
import type { DoraThresholds } from '../config/thresholds.js';
import { MS_PER_HOUR, hoursBetween, meanOrZero } from './statistics.js';

export interface DoraInput {
  commits: readonly CommitRecord[];
  /** Only merged PRs take part; open ones are ignored */
  pullRequests: readonly PullRequestRecord[];
  deployments: readonly DeploymentRecord[];
  incidents: readonly IncidentRecord[];
  windowDays: number;
}

export interface DoraCalculation {
  metrics: DORAMetrics;
  warnings: AnalysisWarning[];
}

const CATEGORY_RANK: Record<PerformanceCategory, number> = {
  low: 0,
  medium: 1,
  high: 2,
  elite: 3,
};

/**
 * Metrics reported when there are no deployments: all zero, all low.
 */
export function emptyDoraMetrics(): DORAMetrics {
  return {
    leadTimeHours: 0,
    deploymentFrequencyPerDay: 0,
    changeFailureRate: 0,
    mttrHours: 0,
    categories: {
      leadTime: 'low',
      deploymentFrequency: 'low',
      changeFailureRate: 'low',
      mttr: 'low',
    },
    overallCategory: 'low',
    deploymentCount: 0,
    failedDeploymentCount: 0,
    resolvedIncidentCount: 0,
  };
}

export function calculateDoraMetrics(input: DoraInput, t: DoraThresholds): DoraCalculation {
  const warnings: AnalysisWarning[] = [];

  if (input.deployments.length === 0) {
    warnings.push({
      stage: 'dora',
      kind: 'insufficient_data',
      message: 'No deployments in the window; DORA metrics default to 0 and category low',
    });
    return { metrics: emptyDoraMetrics(), warnings };
  }

  const deployments = [...input.deployments].sort(
    (a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp)
  );

  let windowDays = input.windowDays;
  if (!Number.isFinite(windowDays) || windowDays <= 0) {
    warnings.push({
      stage: 'dora',
      kind: 'division_guard',
      message: `Window of ${input.windowDays} days is not usable; deployment frequency uses 1 day`,
    });
    windowDays = 1;
  }

  const leadTimeHours = meanOrZero(
    collectLeadTimes(deployments, input.commits, input.pullRequests, warnings)
  );
  const deploymentFrequencyPerDay = deployments.length / windowDays;
  const failedDeploymentCount = countFailedDeployments(
    deployments,
    input.incidents,
    t.incidentAttributionHours
  );
  const changeFailureRate = failedDeploymentCount / deployments.length;
  const recoveryTimes = collectRecoveryTimes(input.incidents, warnings);
  const mttrHours = meanOrZero(recoveryTimes);

  const categories = {
    leadTime: classifyLeadTime(leadTimeHours, t),
    deploymentFrequency: classifyDeploymentFrequency(deploymentFrequencyPerDay, t),
    changeFailureRate: classifyChangeFailureRate(changeFailureRate, t),
    mttr: classifyMttr(mttrHours, t),
  };

  return {
    metrics: {
      leadTimeHours,
      deploymentFrequencyPerDay,
      changeFailureRate,
      mttrHours,
      categories,
      overallCategory: worstCategory(Object.values(categories)),
      deploymentCount: deployments.length,
      failedDeploymentCount,
      resolvedIncidentCount: recoveryTimes.length,
    },
    warnings,
  };
}

// ─── Lead Time ──────────────────────────────────────────────

/**
 * For each deployment (time-ordered), the first change it shipped is:
 *   1. the earliest commit named in `commitShas`, else
 *   2. the earliest commit since the previous deployment, else
 *   3. the earliest-created PR merged since the previous deployment.
 * Deployments with no associable change are left out of the mean.
 */
function collectLeadTimes(
  deployments: readonly DeploymentRecord[],
  commits: readonly CommitRecord[],
  pullRequests: readonly PullRequestRecord[],
  warnings: AnalysisWarning[]
): number[] {
  const commitTimes = commits.map((c) => Date.parse(c.timestamp)).sort((a, b) => a - b);
  const commitTimeBySha = new Map<string, number>();
  for (const c of commits) {
    commitTimeBySha.set(c.sha, Date.parse(c.timestamp));
  }

  const merged = pullRequests
    .flatMap((pr) =>
      pr.mergedAt ? [{ mergedAt: Date.parse(pr.mergedAt), createdAt: Date.parse(pr.createdAt) }] : []
    )
    .sort((a, b) => a.mergedAt - b.mergedAt);

  const leadTimes: number[] = [];
  let commitIdx = 0;
  let prIdx = 0;

  for (const deployment of deployments) {
    const deployedAt = Date.parse(deployment.timestamp);

    let firstCommit: number | undefined;
    while (commitIdx < commitTimes.length && (commitTimes[commitIdx] ?? Infinity) <= deployedAt) {
      if (firstCommit === undefined) firstCommit = commitTimes[commitIdx];
      commitIdx++;
    }

    let firstPrCreated: number | undefined;
    while (prIdx < merged.length) {
      const pr = merged[prIdx];
      if (!pr || pr.mergedAt > deployedAt) break;
      firstPrCreated = Math.min(firstPrCreated ?? pr.createdAt, pr.createdAt);
      prIdx++;
    }

    const start = explicitStart(deployment, commitTimeBySha) ?? firstCommit ?? firstPrCreated;
    if (start === undefined) continue;

    const hours = (deployedAt - start) / MS_PER_HOUR;
    if (hours < 0) {
      warnings.push({
        stage: 'dora',
        kind: 'malformed_record',
        message: `Deployment ${deployment.id} predates the changes it lists; excluded from lead time`,
        recordId: deployment.id,
      });
      continue;
    }
    leadTimes.push(hours);
  }

  return leadTimes;
}

function explicitStart(
  deployment: DeploymentRecord,
  commitTimeBySha: ReadonlyMap<string, number>
): number | undefined {
  let earliest: number | undefined;
  for (const sha of deployment.commitShas ?? []) {
    const time = commitTimeBySha.get(sha);
    if (time !== undefined) earliest = Math.min(earliest ?? time, time);
  }
  return earliest;
}

// ─── Change Failure Rate ────────────────────────────────────

/**
 * A deployment fails if its status is `failed`, or if an incident is
 * detected within the attribution window after it (and before any later
 * deployment took its place as the most recent one).
 */
function countFailedDeployments(
  deployments: readonly DeploymentRecord[],
  incidents: readonly IncidentRecord[],
  attributionHours: number
): number {
  const failed = deployments.map((d) => d.status === 'failed');
  const deployTimes = deployments.map((d) => Date.parse(d.timestamp));
  const detections = incidents.map((i) => Date.parse(i.detectedAt)).sort((a, b) => a - b);
  const windowMs = attributionHours * MS_PER_HOUR;

  // Index of the latest deployment at or before the current incident
  let latest = -1;
  for (const detectedAt of detections) {
    while (latest + 1 < deployTimes.length && (deployTimes[latest + 1] ?? Infinity) <= detectedAt) {
      latest++;
    }
    const deployedAt = deployTimes[latest];
    if (deployedAt !== undefined && detectedAt - deployedAt <= windowMs) {
      failed[latest] = true;
    }
  }

  return failed.filter(Boolean).length;
}

// ─── MTTR ───────────────────────────────────────────────────

function collectRecoveryTimes(
  incidents: readonly IncidentRecord[],
  warnings: AnalysisWarning[]
): number[] {
  const times: number[] = [];
  for (const incident of incidents) {
    if (!incident.resolvedAt) continue;
    const hours = hoursBetween(incident.detectedAt, incident.resolvedAt);
    if (hours < 0) {
      warnings.push({
        stage: 'dora',
        kind: 'malformed_record',
        message: `Incident ${incident.id} resolves before it was detected; excluded from MTTR`,
        recordId: incident.id,
      });
      continue;
    }
    times.push(hours);
  }
  return times;
}

// ─── Banding ────────────────────────────────────────────────

export function classifyLeadTime(hours: number, t: DoraThresholds): PerformanceCategory {
  if (hours < t.leadTimeEliteHours) return 'elite';
  if (hours < t.leadTimeHighHours) return 'high';
  if (hours < t.leadTimeMediumHours) return 'medium';
  return 'low';
}

export function classifyDeploymentFrequency(
  perDay: number,
  t: DoraThresholds
): PerformanceCategory {
  if (perDay >= t.deployEliteMinPerDay) return 'elite';
  if (perDay >= t.deployHighMinPerDay) return 'high';
  if (perDay >= t.deployMediumMinPerDay) return 'medium';
  return 'low';
}

export function classifyChangeFailureRate(rate: number, t: DoraThresholds): PerformanceCategory {
  if (rate < t.failureRateElite) return 'elite';
  if (rate < t.failureRateHigh) return 'high';
  if (rate < t.failureRateMedium) return 'medium';
  return 'low';
}

export function classifyMttr(hours: number, t: DoraThresholds): PerformanceCategory {
  if (hours < t.mttrEliteHours) return 'elite';
  if (hours < t.mttrHighHours) return 'high';
  if (hours < t.mttrMediumHours) return 'medium';
  return 'low';
}

/** DORA reads as bottleneck-driven: the overall band is the weakest one. */
export function worstCategory(categories: readonly PerformanceCategory[]): PerformanceCategory {
  let worst: PerformanceCategory = 'elite';
  for (const c of categories) {
    if (CATEGORY_RANK[c] < CATEGORY_RANK[worst]) worst = c;
  }
  return worst;
}
