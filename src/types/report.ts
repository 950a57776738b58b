/**
 * Report types
 *
 * Everything the engine derives from one batch of records.
 * An AnalysisReport is built once per pipeline run and never mutated.
 */

// ─── Warnings ───────────────────────────────────────────────

export type AnalysisStage =
  | 'ingest'
  | 'churn'
  | 'pull_requests'
  | 'risk'
  | 'dora'
  | 'weekly_series'
  | 'forecast';

export interface AnalysisWarning {
  stage: AnalysisStage;
  kind: 'malformed_record' | 'insufficient_data' | 'division_guard' | 'stage_failure';
  message: string;
  recordId?: string;
}

// ─── Churn ──────────────────────────────────────────────────

export interface AuthorChurnStats {
  author: string;
  commitCount: number;
  additions: number;
  deletions: number;
  churn: number;
  netChange: number;
  filesChanged: number;
  /** deletions / max(additions, 1) */
  churnRatio: number;
  avgChurnPerCommit: number;
  /** Ranking aid only */
  productivityScore: number;
  /** Mean gap between consecutive commits; null under two commits */
  avgCommitIntervalHours: number | null;
}

export interface TeamChurnTotals {
  totalCommits: number;
  totalAdditions: number;
  totalDeletions: number;
  netChange: number;
  totalChurn: number;
  totalFilesChanged: number;
  avgChurn: number;
  medianChurn: number;
  churnStdDev: number;
}

export interface CommitMessageTags {
  fix: number;
  refactor: number;
  feat: number;
}

export interface ChurnSummary {
  team: TeamChurnTotals;
  byAuthor: Record<string, AuthorChurnStats>;
  messageTags: CommitMessageTags;
}

// ─── Pull Requests ──────────────────────────────────────────

export interface PullRequestSummary {
  total: number;
  merged: number;
  open: number;
  avgCycleTimeHours: number | null;
  sizeDistribution: { small: number; medium: number; large: number; extraLarge: number };
  lowReviewMerged: number;
  ciFailures: number;
}

// ─── Risk ───────────────────────────────────────────────────

export type RiskFactor =
  | 'high_churn'
  | 'many_files'
  | 'high_deletion_ratio'
  | 'massive_commit'
  | 'low_review'
  | 'ci_failure';

export type RiskTier = 'high' | 'medium' | 'low';

export interface RiskAssessment {
  subjectType: 'commit' | 'pull_request';
  /** Commit SHA or PR id */
  id: string;
  author: string;
  churn: number;
  riskScore: number;
  /** 'none' when the score is 0 and the item is not flagged */
  tier: RiskTier | 'none';
  factors: RiskFactor[];
  /** Standard deviations from the team's mean commit churn */
  zScore: number;
}

export interface ChurnOutlier {
  sha: string;
  author: string;
  churn: number;
  direction: 'high' | 'low';
}

export interface RiskBuckets {
  high: RiskAssessment[];
  medium: RiskAssessment[];
  low: RiskAssessment[];
}

export interface RiskReport {
  assessments: RiskAssessment[];
  buckets: RiskBuckets;
  outliers: ChurnOutlier[];
}

// ─── DORA ───────────────────────────────────────────────────

export type PerformanceCategory = 'elite' | 'high' | 'medium' | 'low';

export interface DORAMetrics {
  leadTimeHours: number;
  deploymentFrequencyPerDay: number;
  /** 0..1 */
  changeFailureRate: number;
  mttrHours: number;
  categories: {
    leadTime: PerformanceCategory;
    deploymentFrequency: PerformanceCategory;
    changeFailureRate: PerformanceCategory;
    mttr: PerformanceCategory;
  };
  /** Worst of the four categories */
  overallCategory: PerformanceCategory;
  deploymentCount: number;
  failedDeploymentCount: number;
  resolvedIncidentCount: number;
}

// ─── Forecasts ──────────────────────────────────────────────

export type ForecastMetric = 'churn' | 'cycle_time';

export interface ForecastResult {
  metric: ForecastMetric;
  predictedValue: number;
  confidence: 'high' | 'medium' | 'low';
  trendDirection: 'increasing' | 'decreasing' | 'stable';
  range: { optimistic: number; pessimistic: number };
  /** Change per week from the least-squares fit */
  slope: number;
  residualStdDev: number;
  observations: number;
  /** Set when the forecast is a fallback */
  reason?: string;
}

export interface WeeklyBucket {
  /** UTC Monday, YYYY-MM-DD */
  weekStart: string;
  commits: number;
  additions: number;
  deletions: number;
  churn: number;
  mergedPullRequests: number;
  avgCycleTimeHours: number | null;
}

// ─── Report ─────────────────────────────────────────────────

export interface AnalysisReport {
  windowDays: number;
  recordCounts: {
    commits: number;
    pullRequests: number;
    deployments: number;
    incidents: number;
  };
  churn: ChurnSummary;
  /** Ranked by productivity score */
  authorStats: AuthorChurnStats[];
  pullRequests: PullRequestSummary;
  risk: RiskReport;
  dora: DORAMetrics;
  weeklySeries: WeeklyBucket[];
  forecasts: {
    churn: ForecastResult;
    cycleTime: ForecastResult;
  };
  warnings: AnalysisWarning[];
}
