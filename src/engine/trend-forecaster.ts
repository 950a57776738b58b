/**
 * Trend Forecaster
 *
 * One-step-ahead forecast of a weekly series by ordinary least squares
 * against the week index. Deterministic and total: short or unusable series
 * yield a documented fallback instead of an error.
 */

import type { ForecastThresholds } from '../config/thresholds.js';
import type { ForecastMetric, ForecastResult } from '../types/report.js';
import { fitLinearTrend } from './statistics.js';

/** Predicted value when fewer than two observations exist. */
export const FORECAST_FALLBACKS: Record<ForecastMetric, number> = {
  churn: 1000,
  cycle_time: 24,
};

/** Multipliers applied to the prediction to get the optimistic/pessimistic range. */
export const FORECAST_RANGE_MULTIPLIERS: Record<
  ForecastMetric,
  { optimistic: number; pessimistic: number }
> = {
  churn: { optimistic: 0.7, pessimistic: 1.4 },
  cycle_time: { optimistic: 0.85, pessimistic: 1.25 },
};

const MIN_OBSERVATIONS = 2;

function rangeFor(metric: ForecastMetric, predicted: number): ForecastResult['range'] {
  const m = FORECAST_RANGE_MULTIPLIERS[metric];
  return { optimistic: predicted * m.optimistic, pessimistic: predicted * m.pessimistic };
}

function confidenceFor(
  metric: ForecastMetric,
  residualStdDev: number,
  observations: number,
  t: ForecastThresholds
): ForecastResult['confidence'] {
  const [highBelow, mediumBelow] =
    metric === 'churn'
      ? [t.churnHighConfidenceStdDev, t.churnMediumConfidenceStdDev]
      : [t.cycleTimeHighConfidenceStdDev, t.cycleTimeMediumConfidenceStdDev];

  if (residualStdDev < highBelow) {
    // A line through two points always fits perfectly
    return observations < t.minObservationsForHighConfidence ? 'medium' : 'high';
  }
  if (residualStdDev < mediumBelow) return 'medium';
  return 'low';
}

/** Fallback result used when the series is too short to fit. */
export function fallbackForecast(
  metric: ForecastMetric,
  observations: number,
  reason: string
): ForecastResult {
  const predicted = FORECAST_FALLBACKS[metric];
  return {
    metric,
    predictedValue: predicted,
    confidence: 'low',
    trendDirection: 'stable',
    range: rangeFor(metric, predicted),
    slope: 0,
    residualStdDev: 0,
    observations,
    reason,
  };
}

/**
 * Forecast the next value of a weekly series.
 * Non-finite entries are ignored.
 */
export function forecastSeries(
  values: readonly number[],
  metric: ForecastMetric,
  t: ForecastThresholds
): ForecastResult {
  const series = values.filter((v) => Number.isFinite(v));

  if (series.length < MIN_OBSERVATIONS) {
    return fallbackForecast(
      metric,
      series.length,
      `Need at least ${MIN_OBSERVATIONS} weekly observations (got ${series.length})`
    );
  }

  const { slope, residualStdDev } = fitLinearTrend(series);
  const last = series[series.length - 1] ?? 0;
  const predicted = Math.max(0, last + slope);

  return {
    metric,
    predictedValue: predicted,
    confidence: confidenceFor(metric, residualStdDev, series.length, t),
    trendDirection: slope > 0 ? 'increasing' : slope < 0 ? 'decreasing' : 'stable',
    range: rangeFor(metric, predicted),
    slope,
    residualStdDev,
    observations: series.length,
  };
}
