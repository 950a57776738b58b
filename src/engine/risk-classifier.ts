/**
 * Risk Classifier
 *
 * Scores commits and pull requests for defect risk with additive,
 * order-independent rules, partitions them into high/medium/low buckets,
 * and flags churn outliers with the IQR rule.
 * Pure functions — no I/O, all data passed in.
 */

import type { CommitRecord, PullRequestRecord } from '../types/records.js';
import type {
  AnalysisWarning,
  ChurnOutlier,
  RiskAssessment,
  RiskBuckets,
  RiskFactor,
  RiskReport,
  RiskTier,
} from '../types/report.js';
import type { RiskThresholds } from '../config/thresholds.js';
import { churnOf, deletionRatio } from './churn-aggregator.js';
import { interpolatedQuantile } from './statistics.js';

export interface ClassifyRiskInput {
  commits: readonly CommitRecord[];
  pullRequests: readonly PullRequestRecord[];
  /** Team mean commit churn, from the churn aggregator */
  avgChurn: number;
  /** Team sample standard deviation of commit churn */
  churnStdDev: number;
}

export interface RiskClassification extends RiskReport {
  warnings: AnalysisWarning[];
}

export interface RiskScore {
  riskScore: number;
  factors: RiskFactor[];
}

/**
 * Classify every commit and PR. Records with unusable line counts are
 * skipped with a warning; the rest of the batch is still scored.
 */
export function classifyRisk(input: ClassifyRiskInput, t: RiskThresholds): RiskClassification {
  const warnings: AnalysisWarning[] = [];
  const assessments: RiskAssessment[] = [];
  const zScore = (churn: number): number =>
    input.churnStdDev > 0 ? (churn - input.avgChurn) / input.churnStdDev : 0;

  const validCommits: CommitRecord[] = [];
  for (const commit of input.commits) {
    if (!hasValidCounts(commit.additions, commit.deletions, commit.filesChanged)) {
      warnings.push(malformed(`commit ${commit.sha}`, commit.sha));
      continue;
    }
    validCommits.push(commit);
    const churn = churnOf(commit);
    assessments.push({
      subjectType: 'commit',
      id: commit.sha,
      author: commit.author,
      churn,
      ...withTier(scoreCommit(commit, t), t),
      zScore: zScore(churn),
    });
  }

  for (const pr of input.pullRequests) {
    if (!hasValidCounts(pr.additions, pr.deletions, pr.reviewCount)) {
      warnings.push(malformed(`pull request ${pr.id}`, pr.id));
      continue;
    }
    const churn = churnOf(pr);
    assessments.push({
      subjectType: 'pull_request',
      id: pr.id,
      author: pr.author,
      churn,
      ...withTier(scorePullRequest(pr, t), t),
      zScore: zScore(churn),
    });
  }

  const outliers = detectChurnOutliers(validCommits, t);
  if (validCommits.length > 0 && validCommits.length < t.minOutlierDataPoints) {
    warnings.push({
      stage: 'risk',
      kind: 'insufficient_data',
      message: `Outlier detection needs at least ${t.minOutlierDataPoints} commits (got ${validCommits.length})`,
    });
  }

  return {
    assessments,
    buckets: bucketize(assessments),
    outliers,
    warnings,
  };
}

// ─── Scoring ────────────────────────────────────────────────

/** Shared line-count rules for commits and PRs. */
function scoreChurn(
  record: { additions: number; deletions: number },
  t: RiskThresholds,
  out: RiskScore
): void {
  const churn = churnOf(record);
  if (churn > t.churnThreshold) add(out, 'high_churn', t.highChurnWeight);
  if (deletionRatio(record) > t.deletionRatioThreshold) {
    add(out, 'high_deletion_ratio', t.highDeletionRatioWeight);
  }
  if (churn > t.massiveChurnThreshold) add(out, 'massive_commit', t.massiveCommitWeight);
}

export function scoreCommit(commit: CommitRecord, t: RiskThresholds): RiskScore {
  const out: RiskScore = { riskScore: 0, factors: [] };
  scoreChurn(commit, t, out);
  if (commit.filesChanged > t.manyFilesThreshold) add(out, 'many_files', t.manyFilesWeight);
  return out;
}

export function scorePullRequest(pr: PullRequestRecord, t: RiskThresholds): RiskScore {
  const out: RiskScore = { riskScore: 0, factors: [] };
  scoreChurn(pr, t, out);
  if (pr.mergedAt && pr.reviewCount <= t.lowReviewThreshold) {
    add(out, 'low_review', t.lowReviewWeight);
  }
  if (pr.ciStatus === 'failure') add(out, 'ci_failure', t.ciFailureWeight);
  return out;
}

/** Score >= high cutoff → high; >= medium cutoff → medium; > 0 → low; 0 → none. */
export function tierForScore(score: number, t: RiskThresholds): RiskTier | 'none' {
  if (score >= t.highTierMinScore) return 'high';
  if (score >= t.mediumTierMinScore) return 'medium';
  if (score > 0) return 'low';
  return 'none';
}

function withTier(score: RiskScore, t: RiskThresholds) {
  return { ...score, tier: tierForScore(score.riskScore, t) };
}

function add(out: RiskScore, factor: RiskFactor, weight: number): void {
  out.riskScore += weight;
  out.factors.push(factor);
}

function bucketize(assessments: readonly RiskAssessment[]): RiskBuckets {
  const buckets: RiskBuckets = { high: [], medium: [], low: [] };
  for (const a of assessments) {
    if (a.tier !== 'none') buckets[a.tier].push(a);
  }
  for (const list of Object.values(buckets)) {
    list.sort((a: RiskAssessment, b: RiskAssessment) => b.riskScore - a.riskScore);
  }
  return buckets;
}

// ─── Outliers ───────────────────────────────────────────────

/**
 * Tag commits whose churn falls outside [Q1 - k·IQR, Q3 + k·IQR].
 * Fewer than `minOutlierDataPoints` commits → no outliers.
 */
export function detectChurnOutliers(
  commits: readonly CommitRecord[],
  t: RiskThresholds
): ChurnOutlier[] {
  if (commits.length < t.minOutlierDataPoints) return [];

  const sorted = commits.map(churnOf).sort((a, b) => a - b);
  const q1 = interpolatedQuantile(sorted, 0.25);
  const q3 = interpolatedQuantile(sorted, 0.75);
  const iqr = q3 - q1;
  const lowerBound = q1 - t.iqrMultiplier * iqr;
  const upperBound = q3 + t.iqrMultiplier * iqr;

  const outliers: ChurnOutlier[] = [];
  for (const c of commits) {
    const churn = churnOf(c);
    if (churn > upperBound) {
      outliers.push({ sha: c.sha, author: c.author, churn, direction: 'high' });
    } else if (churn < lowerBound) {
      outliers.push({ sha: c.sha, author: c.author, churn, direction: 'low' });
    }
  }
  return outliers;
}

// ─── Validation ─────────────────────────────────────────────

function hasValidCounts(...values: number[]): boolean {
  return values.every((v) => Number.isFinite(v) && v >= 0);
}

function malformed(label: string, recordId: string): AnalysisWarning {
  return {
    stage: 'risk',
    kind: 'malformed_record',
    message: `Skipped ${label}: missing or invalid line counts`,
    recordId,
  };
}
