/**
 * Snapshot Builder
 *
 * Converts an analytics report into a Snapshot for persistence.
 * Pure function — no I/O.
 */

import type { AuthorSnapshot, Snapshot } from './types.js';
import type { AnalysisReport } from '../types/report.js';

interface BuildSnapshotInput {
  repository: string;
  periodStart: string;
  periodEnd: string;
  report: AnalysisReport;
}

const round1 = (value: number): number => Math.round(value * 10) / 10;

/**
 * Build a Snapshot from a report's headline numbers.
 * Averages and hours are rounded to one decimal; rates keep full precision.
 */
export function buildSnapshot(input: BuildSnapshotInput): Snapshot {
  const { repository, periodStart, periodEnd, report } = input;
  const { team } = report.churn;

  return {
    repository,
    periodStart,
    periodEnd,
    windowDays: report.windowDays,
    totalCommits: team.totalCommits,
    totalChurn: team.totalChurn,
    avgChurn: round1(team.avgChurn),
    highRiskCount: report.risk.buckets.high.length,
    outlierCount: report.risk.outliers.length,
    leadTimeHours: round1(report.dora.leadTimeHours),
    deploymentFrequencyPerDay: report.dora.deploymentFrequencyPerDay,
    changeFailureRate: report.dora.changeFailureRate,
    mttrHours: round1(report.dora.mttrHours),
    overallCategory: report.dora.overallCategory,
    churnForecast: round1(report.forecasts.churn.predictedValue),
    cycleTimeForecast: round1(report.forecasts.cycleTime.predictedValue),
  };
}

/** One row per author, in the report's ranking order. */
export function buildAuthorSnapshots(report: AnalysisReport): AuthorSnapshot[] {
  return report.authorStats.map((a) => ({
    author: a.author,
    commits: a.commitCount,
    additions: a.additions,
    deletions: a.deletions,
    churn: a.churn,
    productivityScore: a.productivityScore,
  }));
}
