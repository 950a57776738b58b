/**
 * Configurable Thresholds
 *
 * Defines every analytics threshold in one place, grouped by engine stage.
 * Callers can override any subset per section; missing overrides fall back
 * to defaults. Nothing reads these from module state: the resolved config is
 * passed into each stage.
 */

export interface RiskThresholds {
  churnThreshold: number;
  manyFilesThreshold: number;
  deletionRatioThreshold: number;
  massiveChurnThreshold: number;
  /** Merged PRs with at most this many reviews count as low-review */
  lowReviewThreshold: number;
  highChurnWeight: number;
  manyFilesWeight: number;
  highDeletionRatioWeight: number;
  massiveCommitWeight: number;
  lowReviewWeight: number;
  ciFailureWeight: number;
  highTierMinScore: number;
  mediumTierMinScore: number;
  iqrMultiplier: number;
  minOutlierDataPoints: number;
}

export interface DoraThresholds {
  leadTimeEliteHours: number;
  leadTimeHighHours: number;
  leadTimeMediumHours: number;
  deployEliteMinPerDay: number;
  deployHighMinPerDay: number;
  deployMediumMinPerDay: number;
  failureRateElite: number;
  failureRateHigh: number;
  failureRateMedium: number;
  mttrEliteHours: number;
  mttrHighHours: number;
  mttrMediumHours: number;
  /** Incidents detected this long after a deployment count against it */
  incidentAttributionHours: number;
}

export interface ForecastThresholds {
  churnHighConfidenceStdDev: number;
  churnMediumConfidenceStdDev: number;
  cycleTimeHighConfidenceStdDev: number;
  cycleTimeMediumConfidenceStdDev: number;
  minObservationsForHighConfidence: number;
}

export interface TrendThresholds {
  trendWarningPercent: number;
  trendAlertPercent: number;
  stablePercent: number;
}

export interface AnalyticsConfig {
  risk: RiskThresholds;
  dora: DoraThresholds;
  forecast: ForecastThresholds;
  trends: TrendThresholds;
}

export type AnalyticsConfigOverrides = {
  [K in keyof AnalyticsConfig]?: Partial<AnalyticsConfig[K]>;
};

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = {
  risk: {
    churnThreshold: 300,
    manyFilesThreshold: 8,
    deletionRatioThreshold: 0.7,
    massiveChurnThreshold: 1000,
    lowReviewThreshold: 1,
    highChurnWeight: 3,
    manyFilesWeight: 2,
    highDeletionRatioWeight: 1,
    massiveCommitWeight: 2,
    lowReviewWeight: 1,
    ciFailureWeight: 1,
    highTierMinScore: 5,
    mediumTierMinScore: 2,
    iqrMultiplier: 1.5,
    minOutlierDataPoints: 4,
  },
  dora: {
    leadTimeEliteHours: 24,
    leadTimeHighHours: 7 * 24,
    leadTimeMediumHours: 30 * 24,
    deployEliteMinPerDay: 1,
    deployHighMinPerDay: 1 / 7,
    deployMediumMinPerDay: 1 / 30,
    failureRateElite: 0.15,
    failureRateHigh: 0.3,
    failureRateMedium: 0.45,
    mttrEliteHours: 1,
    mttrHighHours: 24,
    mttrMediumHours: 7 * 24,
    incidentAttributionHours: 24,
  },
  forecast: {
    churnHighConfidenceStdDev: 100,
    churnMediumConfidenceStdDev: 500,
    cycleTimeHighConfidenceStdDev: 5,
    cycleTimeMediumConfidenceStdDev: 10,
    minObservationsForHighConfidence: 3,
  },
  trends: {
    trendWarningPercent: 25,
    trendAlertPercent: 50,
    stablePercent: 5,
  },
};

/**
 * Merge user overrides onto defaults, section by section.
 * Returns a fresh, fully-resolved config.
 */
export function resolveAnalyticsConfig(overrides?: AnalyticsConfigOverrides): AnalyticsConfig {
  const d = DEFAULT_ANALYTICS_CONFIG;
  return {
    risk: { ...d.risk, ...overrides?.risk },
    dora: { ...d.dora, ...overrides?.dora },
    forecast: { ...d.forecast, ...overrides?.forecast },
    trends: { ...d.trends, ...overrides?.trends },
  };
}
