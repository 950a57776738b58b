import { describe, it, expect } from 'vitest';
import {
  forecastSeries,
  fallbackForecast,
  FORECAST_FALLBACKS,
  FORECAST_RANGE_MULTIPLIERS,
} from './trend-forecaster.js';
import { DEFAULT_ANALYTICS_CONFIG } from '../config/thresholds.js';

const t = DEFAULT_ANALYTICS_CONFIG.forecast;

describe('trend-forecaster', () => {
  it('extrapolates a rising churn series one week ahead', () => {
    const result = forecastSeries([100, 120, 140, 160], 'churn', t);

    expect(result.slope).toBeCloseTo(20, 10);
    expect(result.predictedValue).toBeCloseTo(180, 10);
    expect(result.residualStdDev).toBeCloseTo(0, 10);
    expect(result.confidence).toBe('high');
    expect(result.trendDirection).toBe('increasing');
    expect(result.range.optimistic).toBeCloseTo(126, 10);
    expect(result.range.pessimistic).toBeCloseTo(252, 10);
    expect(result.observations).toBe(4);
    expect(result.reason).toBeUndefined();
  });

  it('clamps a falling forecast at zero', () => {
    const result = forecastSeries([30, 10], 'cycle_time', t);
    expect(result.slope).toBeCloseTo(-20, 10);
    expect(result.predictedValue).toBe(0);
    expect(result.trendDirection).toBe('decreasing');
  });

  it('caps confidence at medium with two observations', () => {
    const result = forecastSeries([10, 12], 'cycle_time', t);
    expect(result.residualStdDev).toBeCloseTo(0, 10);
    expect(result.confidence).toBe('medium');
  });

  it('reports a flat series as stable', () => {
    const result = forecastSeries([50, 50, 50], 'churn', t);
    expect(result.slope).toBe(0);
    expect(result.trendDirection).toBe('stable');
    expect(result.predictedValue).toBe(50);
  });

  it('lowers confidence as residuals grow', () => {
    // Fit line is 500 everywhere; residuals are +-400, RMS 400
    const medium = forecastSeries([100, 900, 900, 100], 'churn', t);
    expect(medium.slope).toBeCloseTo(0, 10);
    expect(medium.residualStdDev).toBeCloseTo(400, 10);
    expect(medium.confidence).toBe('medium');

    const low = forecastSeries([0, 1200, 1200, 0], 'churn', t);
    expect(low.residualStdDev).toBeCloseTo(600, 10);
    expect(low.confidence).toBe('low');
  });

  it('falls back under two observations', () => {
    const churn = forecastSeries([420], 'churn', t);
    expect(churn.predictedValue).toBe(FORECAST_FALLBACKS.churn);
    expect(churn.confidence).toBe('low');
    expect(churn.trendDirection).toBe('stable');
    expect(churn.observations).toBe(1);
    expect(churn.reason).toBe('Need at least 2 weekly observations (got 1)');

    const cycle = forecastSeries([], 'cycle_time', t);
    expect(cycle.predictedValue).toBe(24);
    expect(cycle.range).toEqual({ optimistic: 24 * 0.85, pessimistic: 24 * 1.25 });
  });

  it('ignores non-finite values', () => {
    const result = forecastSeries([Number.NaN, 5, Number.POSITIVE_INFINITY], 'cycle_time', t);
    expect(result.observations).toBe(1);
    expect(result.reason).toBeDefined();
  });

  it('returns identical output for identical input', () => {
    const values = [310, 275, 402, 389, 350];
    expect(forecastSeries(values, 'churn', t)).toEqual(forecastSeries(values, 'churn', t));
  });

  it('builds fallback ranges from the named multipliers', () => {
    const result = fallbackForecast('churn', 0, 'empty');
    expect(result.range).toEqual({
      optimistic: FORECAST_FALLBACKS.churn * FORECAST_RANGE_MULTIPLIERS.churn.optimistic,
      pessimistic: FORECAST_FALLBACKS.churn * FORECAST_RANGE_MULTIPLIERS.churn.pessimistic,
    });
  });
});
