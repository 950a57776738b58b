/**
 * Analytics Pipeline
 *
 * Validates raw records, then runs every engine stage in order and
 * assembles a frozen AnalysisReport. A stage that throws is replaced by its
 * default output plus a `stage_failure` warning, so a report always comes
 * back.
 */

import {
  resolveAnalyticsConfig,
  type AnalyticsConfig,
  type AnalyticsConfigOverrides,
} from '../config/thresholds.js';
import { aggregateChurn, rankAuthors } from '../engine/churn-aggregator.js';
import {
  calculateDoraMetrics,
  emptyDoraMetrics,
  type DoraCalculation,
} from '../engine/dora-calculator.js';
import { summarizePullRequests } from '../engine/pull-request-summary.js';
import { classifyRisk, type RiskClassification } from '../engine/risk-classifier.js';
import { fallbackForecast, forecastSeries } from '../engine/trend-forecaster.js';
import { buildWeeklySeries, churnSeries, cycleTimeSeries } from '../engine/weekly-series.js';
import type {
  AnalysisReport,
  AnalysisStage,
  AnalysisWarning,
  AuthorChurnStats,
  WeeklyBucket,
} from '../types/report.js';
import {
  AnalyticsInputSchema,
  validateCommits,
  validateDeployments,
  validateIncidents,
  validatePullRequests,
} from '../validators.js';

export interface RunAnalyticsOptions {
  /** Per-section threshold overrides; unset keys use defaults */
  config?: AnalyticsConfigOverrides;
}

/**
 * Run a stage, substituting its default when it throws.
 */
function runStage<T>(
  stage: AnalysisStage,
  warnings: AnalysisWarning[],
  fallback: () => T,
  fn: () => T
): T {
  try {
    return fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warnings.push({
      stage,
      kind: 'stage_failure',
      message: `Stage ${stage} failed and was replaced by its default: ${message}`,
    });
    return fallback();
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Produce a full analytics report from one batch of records.
 * Never throws; problems surface as report warnings.
 */
export function runAnalytics(
  commits: readonly unknown[],
  pullRequests: readonly unknown[],
  deployments: readonly unknown[],
  incidents: readonly unknown[],
  windowDays: number,
  options: RunAnalyticsOptions = {}
): AnalysisReport {
  const config: AnalyticsConfig = resolveAnalyticsConfig(options.config);

  const c = validateCommits(commits);
  const p = validatePullRequests(pullRequests);
  const d = validateDeployments(deployments);
  const i = validateIncidents(incidents);
  const warnings: AnalysisWarning[] = [...c.warnings, ...p.warnings, ...d.warnings, ...i.warnings];

  const churn = runStage(
    'churn',
    warnings,
    () => aggregateChurn([]),
    () => aggregateChurn(c.records)
  );
  const authorStats = runStage<AuthorChurnStats[]>(
    'churn',
    warnings,
    () => [],
    () => rankAuthors(churn.byAuthor)
  );

  const prSummary = runStage(
    'pull_requests',
    warnings,
    () => summarizePullRequests([], config.risk.lowReviewThreshold),
    () => summarizePullRequests(p.records, config.risk.lowReviewThreshold)
  );

  const risk = runStage<RiskClassification>(
    'risk',
    warnings,
    () => ({
      assessments: [],
      buckets: { high: [], medium: [], low: [] },
      outliers: [],
      warnings: [],
    }),
    () =>
      classifyRisk(
        {
          commits: c.records,
          pullRequests: p.records,
          avgChurn: churn.team.avgChurn,
          churnStdDev: churn.team.churnStdDev,
        },
        config.risk
      )
  );
  warnings.push(...risk.warnings);

  const dora = runStage<DoraCalculation>(
    'dora',
    warnings,
    () => ({ metrics: emptyDoraMetrics(), warnings: [] }),
    () =>
      calculateDoraMetrics(
        {
          commits: c.records,
          pullRequests: p.records,
          deployments: d.records,
          incidents: i.records,
          windowDays,
        },
        config.dora
      )
  );
  warnings.push(...dora.warnings);

  const weeklySeries = runStage<WeeklyBucket[]>(
    'weekly_series',
    warnings,
    () => [],
    () => buildWeeklySeries(c.records, p.records)
  );

  const churnForecast = runStage(
    'forecast',
    warnings,
    () => fallbackForecast('churn', 0, 'Forecast unavailable'),
    () => forecastSeries(churnSeries(weeklySeries), 'churn', config.forecast)
  );
  const cycleTimeForecast = runStage(
    'forecast',
    warnings,
    () => fallbackForecast('cycle_time', 0, 'Forecast unavailable'),
    () => forecastSeries(cycleTimeSeries(weeklySeries), 'cycle_time', config.forecast)
  );
  for (const forecast of [churnForecast, cycleTimeForecast]) {
    if (forecast.reason) {
      warnings.push({
        stage: 'forecast',
        kind: 'insufficient_data',
        message: `${forecast.metric} forecast uses a fallback: ${forecast.reason}`,
      });
    }
  }

  return deepFreeze({
    windowDays,
    recordCounts: {
      commits: c.records.length,
      pullRequests: p.records.length,
      deployments: d.records.length,
      incidents: i.records.length,
    },
    churn,
    authorStats,
    pullRequests: prSummary,
    risk: {
      assessments: risk.assessments,
      buckets: risk.buckets,
      outliers: risk.outliers,
    },
    dora: dora.metrics,
    weeklySeries,
    forecasts: { churn: churnForecast, cycleTime: cycleTimeForecast },
    warnings,
  });
}

/**
 * Parse a JSON envelope `{ commits, pullRequests, deployments, incidents, windowDays }`
 * and run the pipeline on it. Throws a ZodError only when the envelope
 * itself is malformed; bad individual records become warnings.
 */
export function analyzeInput(raw: unknown, options: RunAnalyticsOptions = {}): AnalysisReport {
  const envelope = AnalyticsInputSchema.parse(raw);
  return runAnalytics(
    envelope.commits,
    envelope.pullRequests,
    envelope.deployments,
    envelope.incidents,
    envelope.windowDays,
    options
  );
}
