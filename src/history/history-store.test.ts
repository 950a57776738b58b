import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HistoryStore } from './history-store.js';
import type { Snapshot, AuthorSnapshot } from './types.js';

function makeSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    repository: 'acme/api',
    periodStart: '2026-01-31T00:00:00Z',
    periodEnd: '2026-02-07T00:00:00Z',
    windowDays: 7,
    totalCommits: 42,
    totalChurn: 1600,
    avgChurn: 38.1,
    highRiskCount: 2,
    outlierCount: 1,
    leadTimeHours: 18.5,
    deploymentFrequencyPerDay: 0.5,
    changeFailureRate: 0.25,
    mttrHours: 3,
    overallCategory: 'high',
    churnForecast: 1700,
    cycleTimeForecast: 20.4,
    ...overrides,
  };
}

describe('HistoryStore', () => {
  let store: HistoryStore;

  beforeEach(() => {
    // In-memory database for fast, isolated tests
    store = new HistoryStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('saveSnapshot', () => {
    it('saves a snapshot and returns its ID', () => {
      const id = store.saveSnapshot(makeSnapshot());
      expect(id).toBeGreaterThan(0);
    });

    it('saves multiple snapshots with incrementing IDs', () => {
      const id1 = store.saveSnapshot(makeSnapshot());
      const id2 = store.saveSnapshot(makeSnapshot({ periodEnd: '2026-02-14T00:00:00Z' }));
      expect(id2).toBe(id1 + 1);
    });
  });

  describe('saveAuthorSnapshots', () => {
    it('saves per-author data linked to a snapshot', () => {
      const snapshotId = store.saveSnapshot(makeSnapshot());

      const authors: AuthorSnapshot[] = [
        { author: 'alice', commits: 20, additions: 600, deletions: 200, churn: 800, productivityScore: 9.5 },
        { author: 'bob', commits: 22, additions: 600, deletions: 200, churn: 800, productivityScore: 10.1 },
      ];

      store.saveAuthorSnapshots(snapshotId, authors);

      const retrieved = store.getAuthorSnapshots(snapshotId);
      expect(retrieved).toHaveLength(2);
      expect(retrieved[0]!.author).toBe('alice');
      expect(retrieved[0]!.commits).toBe(20);
      expect(retrieved[1]!.author).toBe('bob');
      expect(retrieved[1]!.productivityScore).toBe(10.1);
      expect(retrieved[1]!.snapshotId).toBe(snapshotId);
    });

    it('rejects rows for a snapshot that does not exist', () => {
      expect(() =>
        store.saveAuthorSnapshots(999, [
          { author: 'x', commits: 1, additions: 1, deletions: 0, churn: 1, productivityScore: 0.3 },
        ])
      ).toThrow();
    });
  });

  describe('getLatestSnapshot', () => {
    it('returns the most recent snapshot for the repository', () => {
      store.saveSnapshot(makeSnapshot({ periodEnd: '2026-01-31T00:00:00Z', totalCommits: 30 }));
      store.saveSnapshot(makeSnapshot({ periodEnd: '2026-02-07T00:00:00Z', totalCommits: 42 }));

      const latest = store.getLatestSnapshot('acme/api');
      expect(latest).not.toBeNull();
      expect(latest!.totalCommits).toBe(42);
    });

    it('returns null when no snapshots exist', () => {
      expect(store.getLatestSnapshot('acme/api')).toBeNull();
    });

    it('filters by repository', () => {
      store.saveSnapshot(makeSnapshot({ repository: 'acme/web' }));

      expect(store.getLatestSnapshot('acme/api')).toBeNull();
      expect(store.getLatestSnapshot('acme/web')).not.toBeNull();
    });
  });

  describe('getPreviousSnapshot', () => {
    it('returns the snapshot before a given date', () => {
      store.saveSnapshot(
        makeSnapshot({
          periodStart: '2026-01-24T00:00:00Z',
          periodEnd: '2026-01-31T00:00:00Z',
          totalCommits: 30,
        })
      );
      store.saveSnapshot(
        makeSnapshot({
          periodStart: '2026-01-31T00:00:00Z',
          periodEnd: '2026-02-07T00:00:00Z',
          totalCommits: 42,
        })
      );

      const previous = store.getPreviousSnapshot('acme/api', '2026-02-07T00:00:00Z');
      expect(previous).not.toBeNull();
      expect(previous!.totalCommits).toBe(30);
    });

    it('returns null when no previous snapshot exists', () => {
      store.saveSnapshot(makeSnapshot({ periodEnd: '2026-02-07T00:00:00Z' }));

      expect(store.getPreviousSnapshot('acme/api', '2026-01-01T00:00:00Z')).toBeNull();
    });
  });

  describe('getHistory', () => {
    it('returns snapshots in descending order up to the limit', () => {
      store.saveSnapshot(makeSnapshot({ periodEnd: '2026-01-13T00:00:00Z', totalCommits: 10 }));
      store.saveSnapshot(makeSnapshot({ periodEnd: '2026-01-27T00:00:00Z', totalCommits: 11 }));
      store.saveSnapshot(makeSnapshot({ periodEnd: '2026-02-07T00:00:00Z', totalCommits: 12 }));

      const history = store.getHistory('acme/api', 2);
      expect(history.map((s) => s.totalCommits)).toEqual([12, 11]);
    });

    it('excludes other repositories', () => {
      store.saveSnapshot(makeSnapshot({ repository: 'acme/web' }));
      store.saveSnapshot(makeSnapshot());

      expect(store.getHistory('acme/api')).toHaveLength(1);
    });
  });

  describe('schema resilience', () => {
    it('handles an empty database', () => {
      expect(store.getLatestSnapshot('acme/api')).toBeNull();
      expect(store.getHistory('acme/api')).toEqual([]);
      expect(store.getAuthorSnapshots(999)).toEqual([]);
    });

    it('round-trips all fields correctly', () => {
      const snapshot = makeSnapshot({ overallCategory: 'elite', changeFailureRate: 0.125 });
      const id = store.saveSnapshot(snapshot);
      const retrieved = store.getLatestSnapshot('acme/api')!;

      const { createdAt, ...rest } = retrieved;
      expect(typeof createdAt).toBe('string');
      expect(rest).toEqual({ ...snapshot, id });
    });
  });
});
