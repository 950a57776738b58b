/**
 * repo-velocity forecast — one-step forecast of a comma-separated series
 */

import { z } from 'zod';
import { loadAnalyticsConfig } from '../config/analytics-config.js';
import { forecastSeries } from '../engine/trend-forecaster.js';

const ForecastFlagsSchema = z.object({
  metric: z.enum(['churn', 'cycle_time'], {
    errorMap: () => ({ message: '--metric must be churn or cycle_time' }),
  }),
  values: z
    .string({ required_error: '--values is required (e.g. --values 120,140,180)' })
    .transform((list) => (list.trim() === '' ? [] : list.split(',').map((v) => Number(v.trim()))))
    .refine((values) => values.every((v) => Number.isFinite(v)), {
      message: '--values must be comma-separated numbers',
    }),
  config: z.string().min(1).optional(),
});

export function runForecastCommand(flags: Record<string, string>): string {
  const opts = ForecastFlagsSchema.parse(flags);
  const config = loadAnalyticsConfig(opts.config);
  return JSON.stringify(forecastSeries(opts.values, opts.metric, config.forecast), null, 2);
}
