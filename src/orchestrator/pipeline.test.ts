import { describe, it, expect, vi } from 'vitest';
import { runAnalytics, analyzeInput } from './pipeline.js';
import { buildWeeklySeries } from '../engine/weekly-series.js';
import { emptyDoraMetrics } from '../engine/dora-calculator.js';
import type { CommitRecord, DeploymentRecord } from '../types/records.js';
import type { AnalysisWarning } from '../types/report.js';

vi.mock('../engine/weekly-series.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../engine/weekly-series.js')>();
  return { ...actual, buildWeeklySeries: vi.fn(actual.buildWeeklySeries) };
});

function makeCommit(overrides: Partial<CommitRecord> = {}): CommitRecord {
  return {
    sha: 'abc123',
    author: 'alice',
    timestamp: '2026-03-02T10:00:00Z',
    additions: 10,
    deletions: 5,
    filesChanged: 1,
    message: '',
    ...overrides,
  };
}

const sameDayCommits: CommitRecord[] = [
  makeCommit({ sha: 'c1', author: 'alice', additions: 100, deletions: 50, filesChanged: 3 }),
  makeCommit({
    sha: 'c2',
    author: 'bob',
    additions: 200,
    deletions: 10,
    filesChanged: 2,
    timestamp: '2026-03-02T12:00:00Z',
  }),
  makeCommit({
    sha: 'c3',
    author: 'alice',
    additions: 50,
    deletions: 300,
    filesChanged: 4,
    timestamp: '2026-03-02T16:00:00Z',
  }),
];

describe('pipeline', () => {
  describe('runAnalytics', () => {
    it('aggregates, ranks and classifies a single week of commits', () => {
      const report = runAnalytics(sameDayCommits, [], [], [], 30);

      expect(report.windowDays).toBe(30);
      expect(report.recordCounts).toEqual({ commits: 3, pullRequests: 0, deployments: 0, incidents: 0 });
      expect(report.churn.team.totalChurn).toBe(710);
      expect(report.authorStats.map((a) => a.author)).toEqual(['alice', 'bob']);

      expect(report.risk.buckets.medium.map((a) => a.id)).toEqual(['c3']);
      expect(report.risk.buckets.high).toEqual([]);
      expect(report.risk.buckets.low).toEqual([]);
      expect(report.risk.outliers).toEqual([]);

      expect(report.weeklySeries).toHaveLength(1);
      expect(report.forecasts.churn.predictedValue).toBe(1000);
      expect(report.forecasts.cycleTime.predictedValue).toBe(24);

      expect(report.warnings.map((w) => [w.stage, w.kind])).toEqual([
        ['risk', 'insufficient_data'],
        ['dora', 'insufficient_data'],
        ['forecast', 'insufficient_data'],
        ['forecast', 'insufficient_data'],
      ]);
    });

    it('forecasts a steadily rising weekly churn', () => {
      const commits = [100, 120, 140, 160].map((additions, week) =>
        makeCommit({
          sha: `w${week}`,
          additions,
          deletions: 0,
          timestamp: new Date(Date.UTC(2026, 2, 2 + week * 7, 9)).toISOString(),
        })
      );

      const report = runAnalytics(commits, [], [], [], 28);

      expect(report.weeklySeries.map((w) => w.churn)).toEqual([100, 120, 140, 160]);
      expect(report.forecasts.churn.predictedValue).toBeCloseTo(180, 10);
      expect(report.forecasts.churn.confidence).toBe('high');
      expect(report.forecasts.churn.trendDirection).toBe('increasing');
    });

    it('reports empty DORA metrics without deployments', () => {
      const report = runAnalytics(sameDayCommits, [], [], [], 30);
      expect(report.dora).toEqual(emptyDoraMetrics());
    });

    it('computes DORA metrics from deployments and incidents', () => {
      const deployments: DeploymentRecord[] = [
        { id: 'd1', timestamp: '2026-03-02T20:00:00Z', status: 'success' },
        { id: 'd2', timestamp: '2026-03-03T20:00:00Z', status: 'failed' },
      ];
      const report = runAnalytics(sameDayCommits, [], deployments, [], 10);

      expect(report.dora.deploymentCount).toBe(2);
      expect(report.dora.deploymentFrequencyPerDay).toBeCloseTo(0.2, 10);
      expect(report.dora.changeFailureRate).toBe(0.5);
    });

    it('applies threshold overrides', () => {
      const report = runAnalytics(sameDayCommits, [], [], [], 30, {
        config: { risk: { churnThreshold: 100 } },
      });
      // c1 (150) and c2 (210) now cross the churn threshold
      expect(report.risk.buckets.medium.map((a) => a.id)).toEqual(['c3', 'c1', 'c2']);
    });

    it('turns malformed records into warnings instead of throwing', () => {
      const report = runAnalytics(
        [null, 'x', { sha: 'a1' }, sameDayCommits[0]],
        [42],
        [{}],
        [undefined],
        30
      );

      expect(report.recordCounts).toEqual({ commits: 1, pullRequests: 0, deployments: 0, incidents: 0 });
      const ingest = report.warnings.filter((w) => w.stage === 'ingest');
      expect(ingest).toHaveLength(6);
      expect(ingest.every((w) => w.kind === 'malformed_record')).toBe(true);
      expect(ingest[2]!.recordId).toBe('a1');
    });

    it('drops far-flung timestamps before weekly bucketing', () => {
      const report = runAnalytics(
        [
          makeCommit({ sha: 'past', timestamp: '-271000-01-01T00:00:00Z' }),
          makeCommit({ sha: 'future', timestamp: '+275000-01-01T00:00:00Z' }),
          sameDayCommits[0],
        ],
        [],
        [],
        [],
        30
      );

      expect(report.recordCounts.commits).toBe(1);
      expect(report.weeklySeries).toHaveLength(1);
      expect(report.weeklySeries[0]!.churn).toBe(150);
      const ingest = report.warnings.filter((w) => w.stage === 'ingest');
      expect(ingest.map((w) => w.recordId)).toEqual(['past', 'future']);
    });

    it('keeps churn totals finite by rejecting oversized line counts', () => {
      const report = runAnalytics(
        [makeCommit({ sha: 'huge', additions: 1e308, deletions: 1e308 }), makeCommit({ sha: 'ok' })],
        [],
        [],
        [],
        30
      );

      expect(report.churn.team.totalChurn).toBe(15);
      expect(report.churn.team.avgChurn).toBe(15);
      expect(Number.isFinite(report.churn.team.churnStdDev)).toBe(true);
      const ingest = report.warnings.filter((w) => w.stage === 'ingest');
      expect(ingest).toHaveLength(1);
      expect(ingest[0]).toMatchObject({ kind: 'malformed_record', recordId: 'huge' });
    });

    it('replaces a failing stage with its default', () => {
      vi.mocked(buildWeeklySeries).mockImplementationOnce(() => {
        throw new Error('boom');
      });

      const report = runAnalytics(sameDayCommits, [], [], [], 30);

      expect(report.weeklySeries).toEqual([]);
      expect(report.churn.team.totalChurn).toBe(710);
      expect(report.warnings).toContainEqual({
        stage: 'weekly_series',
        kind: 'stage_failure',
        message: 'Stage weekly_series failed and was replaced by its default: boom',
      });
      expect(report.forecasts.churn.observations).toBe(0);
    });

    it('returns a deeply frozen report', () => {
      const report = runAnalytics(sameDayCommits, [], [], [], 30);

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.churn.team)).toBe(true);
      expect(Object.isFrozen(report.risk.assessments[0])).toBe(true);
      const extra: AnalysisWarning = { stage: 'churn', kind: 'stage_failure', message: 'x' };
      expect(() => report.warnings.push(extra)).toThrow(TypeError);
    });

    it('is deterministic', () => {
      expect(runAnalytics(sameDayCommits, [], [], [], 30)).toEqual(
        runAnalytics(sameDayCommits, [], [], [], 30)
      );
    });
  });

  describe('analyzeInput', () => {
    it('runs the pipeline on a JSON envelope', () => {
      const report = analyzeInput({ commits: sameDayCommits, windowDays: 7 });
      expect(report.windowDays).toBe(7);
      expect(report.churn.team.totalCommits).toBe(3);
    });

    it('defaults the window to 30 days', () => {
      expect(analyzeInput({}).windowDays).toBe(30);
    });

    it('throws on a malformed envelope', () => {
      expect(() => analyzeInput({ deployments: 'none' })).toThrow();
    });
  });
});
