/**
 * History Types
 *
 * Report snapshots stored in SQLite. Only aggregated numbers are
 * persisted, never commit messages or raw records.
 */

import type { PerformanceCategory } from '../types/report.js';

/** Headline numbers of one analytics report for one repository. */
export interface Snapshot {
  id?: number;
  repository: string;
  periodStart: string;
  periodEnd: string;
  windowDays: number;
  createdAt?: string;

  // Churn and risk
  totalCommits: number;
  totalChurn: number;
  avgChurn: number;
  highRiskCount: number;
  outlierCount: number;

  // DORA
  leadTimeHours: number;
  deploymentFrequencyPerDay: number;
  changeFailureRate: number;
  mttrHours: number;
  overallCategory: PerformanceCategory;

  // Forecasts
  churnForecast: number;
  cycleTimeForecast: number;
}

/** Per-author churn within a snapshot. */
export interface AuthorSnapshot {
  id?: number;
  snapshotId?: number;
  author: string;
  commits: number;
  additions: number;
  deletions: number;
  churn: number;
  productivityScore: number;
}
