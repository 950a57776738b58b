/**
 * Statistics helpers
 *
 * Thin wrappers over simple-statistics that return 0 instead of throwing on
 * short inputs, plus the interpolated quartiles used for outlier bounds.
 */

import {
  linearRegression,
  linearRegressionLine,
  mean,
  median,
  rootMeanSquare,
  sampleStandardDeviation,
} from 'simple-statistics';

export const MS_PER_HOUR = 3_600_000;

/** Arithmetic mean; 0 for an empty list. */
export function meanOrZero(values: readonly number[]): number {
  return values.length === 0 ? 0 : mean([...values]);
}

/** Median; 0 for an empty list. */
export function medianOrZero(values: readonly number[]): number {
  return values.length === 0 ? 0 : median([...values]);
}

/** Sample standard deviation (n-1); 0 under two values. */
export function sampleStdDevOrZero(values: readonly number[]): number {
  return values.length < 2 ? 0 : sampleStandardDeviation([...values]);
}

/**
 * Quantile by linear interpolation between order statistics,
 * position (n-1)·p. Input must be sorted ascending and non-empty.
 */
export function interpolatedQuantile(sorted: readonly number[], p: number): number {
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowValue = sorted[lower] ?? 0;
  const highValue = sorted[upper] ?? lowValue;
  return lowValue + (highValue - lowValue) * (position - lower);
}

export interface LinearTrend {
  slope: number;
  intercept: number;
  /** Root mean square of the residuals */
  residualStdDev: number;
}

/**
 * Closed-form least-squares fit of value against index 0..n-1.
 * Callers must pass at least two values.
 */
export function fitLinearTrend(values: readonly number[]): LinearTrend {
  const points = values.map((value, index) => [index, value]);
  const { m, b } = linearRegression(points);
  const line = linearRegressionLine({ m, b });
  const residuals = values.map((value, index) => value - line(index));
  return {
    slope: m,
    intercept: b,
    residualStdDev: rootMeanSquare(residuals),
  };
}

/** Hours from one ISO timestamp to another (negative when `to` is earlier). */
export function hoursBetween(from: string, to: string): number {
  return (Date.parse(to) - Date.parse(from)) / MS_PER_HOUR;
}
