import { describe, it, expect } from 'vitest';
import { resolveAnalyticsConfig, DEFAULT_ANALYTICS_CONFIG } from './thresholds.js';
import type { AnalyticsConfigOverrides } from './thresholds.js';

describe('thresholds', () => {
  describe('DEFAULT_ANALYTICS_CONFIG', () => {
    it('flags churn above 300 lines', () => {
      expect(DEFAULT_ANALYTICS_CONFIG.risk.churnThreshold).toBe(300);
    });

    it('has the risk scoring defaults', () => {
      const r = DEFAULT_ANALYTICS_CONFIG.risk;
      expect(r.manyFilesThreshold).toBe(8);
      expect(r.deletionRatioThreshold).toBe(0.7);
      expect(r.massiveChurnThreshold).toBe(1000);
      expect(r.highChurnWeight).toBe(3);
      expect(r.manyFilesWeight).toBe(2);
      expect(r.highDeletionRatioWeight).toBe(1);
      expect(r.massiveCommitWeight).toBe(2);
      expect(r.highTierMinScore).toBe(5);
      expect(r.mediumTierMinScore).toBe(2);
      expect(r.minOutlierDataPoints).toBe(4);
    });

    it('has DORA band cutoffs in hours and deploys per day', () => {
      const d = DEFAULT_ANALYTICS_CONFIG.dora;
      expect(d.leadTimeEliteHours).toBe(24);
      expect(d.leadTimeHighHours).toBe(168);
      expect(d.leadTimeMediumHours).toBe(720);
      expect(d.deployEliteMinPerDay).toBe(1);
      expect(d.deployHighMinPerDay).toBe(1 / 7);
      expect(d.deployMediumMinPerDay).toBe(1 / 30);
      expect(d.mttrMediumHours).toBe(168);
    });
  });

  describe('resolveAnalyticsConfig', () => {
    it('returns defaults when no overrides provided', () => {
      expect(resolveAnalyticsConfig()).toEqual(DEFAULT_ANALYTICS_CONFIG);
    });

    it('applies partial overrides within a section while keeping other defaults', () => {
      const overrides: AnalyticsConfigOverrides = {
        risk: { churnThreshold: 500 },
      };
      const result = resolveAnalyticsConfig(overrides);

      expect(result.risk.churnThreshold).toBe(500);
      expect(result.risk.manyFilesThreshold).toBe(8);
      expect(result.dora).toEqual(DEFAULT_ANALYTICS_CONFIG.dora);
      expect(result.forecast).toEqual(DEFAULT_ANALYTICS_CONFIG.forecast);
    });

    it('applies overrides across several sections', () => {
      const result = resolveAnalyticsConfig({
        dora: { incidentAttributionHours: 6 },
        trends: { trendAlertPercent: 80 },
      });

      expect(result.dora.incidentAttributionHours).toBe(6);
      expect(result.dora.leadTimeEliteHours).toBe(24);
      expect(result.trends.trendAlertPercent).toBe(80);
      expect(result.trends.trendWarningPercent).toBe(25);
    });

    it('returns a fresh object each call', () => {
      const a = resolveAnalyticsConfig();
      a.risk.churnThreshold = 1;
      expect(resolveAnalyticsConfig().risk.churnThreshold).toBe(300);
      expect(DEFAULT_ANALYTICS_CONFIG.risk.churnThreshold).toBe(300);
    });
  });
});
