/**
 * Analytics Config File
 *
 * Reads optional threshold overrides from ~/.repo-velocity/config.json
 * (or an explicit path). Validates with Zod on read.
 */

import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import { resolvePaths } from './paths.js';
import { resolveAnalyticsConfig } from './thresholds.js';
import type { AnalyticsConfig, AnalyticsConfigOverrides } from './thresholds.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const positive = z.number().positive();
const weight = z.number().nonnegative();

const RiskOverridesSchema = z
  .object({
    churnThreshold: z.number().nonnegative(),
    manyFilesThreshold: z.number().nonnegative(),
    deletionRatioThreshold: z.number().nonnegative(),
    massiveChurnThreshold: z.number().nonnegative(),
    lowReviewThreshold: z.number().int().nonnegative(),
    highChurnWeight: weight,
    manyFilesWeight: weight,
    highDeletionRatioWeight: weight,
    massiveCommitWeight: weight,
    lowReviewWeight: weight,
    ciFailureWeight: weight,
    highTierMinScore: positive,
    mediumTierMinScore: positive,
    iqrMultiplier: positive,
    minOutlierDataPoints: z.number().int().min(2),
  })
  .partial();

const DoraOverridesSchema = z
  .object({
    leadTimeEliteHours: positive,
    leadTimeHighHours: positive,
    leadTimeMediumHours: positive,
    deployEliteMinPerDay: positive,
    deployHighMinPerDay: positive,
    deployMediumMinPerDay: positive,
    failureRateElite: z.number().min(0).max(1),
    failureRateHigh: z.number().min(0).max(1),
    failureRateMedium: z.number().min(0).max(1),
    mttrEliteHours: positive,
    mttrHighHours: positive,
    mttrMediumHours: positive,
    incidentAttributionHours: z.number().nonnegative(),
  })
  .partial();

const ForecastOverridesSchema = z
  .object({
    churnHighConfidenceStdDev: positive,
    churnMediumConfidenceStdDev: positive,
    cycleTimeHighConfidenceStdDev: positive,
    cycleTimeMediumConfidenceStdDev: positive,
    minObservationsForHighConfidence: z.number().int().min(2),
  })
  .partial();

const TrendOverridesSchema = z
  .object({
    trendWarningPercent: positive,
    trendAlertPercent: positive,
    stablePercent: z.number().nonnegative(),
  })
  .partial();

export const AnalyticsConfigOverridesSchema = z.object({
  risk: RiskOverridesSchema.optional(),
  dora: DoraOverridesSchema.optional(),
  forecast: ForecastOverridesSchema.optional(),
  trends: TrendOverridesSchema.optional(),
});

const AnalyticsConfigFileSchema = z.object({
  version: z.literal(1),
  thresholds: AnalyticsConfigOverridesSchema.default({}),
});

// ─── Read ────────────────────────────────────────────────────

/**
 * Read and validate threshold overrides.
 * Returns null if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readAnalyticsConfig(filePath?: string): AnalyticsConfigOverrides | null {
  const path = filePath ?? resolvePaths().configFile;
  if (!existsSync(path)) {
    return null;
  }

  const raw = readFileSync(path, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return AnalyticsConfigFileSchema.parse(parsed).thresholds;
}

/**
 * Resolve the effective config: defaults, then the config file if present.
 */
export function loadAnalyticsConfig(filePath?: string): AnalyticsConfig {
  return resolveAnalyticsConfig(readAnalyticsConfig(filePath) ?? undefined);
}
