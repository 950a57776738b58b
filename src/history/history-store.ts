/**
 * History Store
 *
 * SQLite-backed persistence for report snapshots.
 * Uses better-sqlite3 for synchronous local storage.
 * Database lives at ~/.repo-velocity/history.db by default.
 */

import Database from 'better-sqlite3';
import type { Snapshot, AuthorSnapshot } from './types.js';
import type { PerformanceCategory } from '../types/report.js';
import { ensureHome, resolvePaths } from '../config/paths.js';

export class HistoryStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    let path = dbPath;
    if (!path) {
      const paths = resolvePaths();
      ensureHome(paths.home);
      path = paths.historyDb;
    }
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.migrate();
  }

  /**
   * Save a repository snapshot. Returns the inserted row ID.
   */
  saveSnapshot(snapshot: Snapshot): number {
    const stmt = this.db.prepare(`
      INSERT INTO snapshots (
        repository, period_start, period_end, window_days,
        total_commits, total_churn, avg_churn, high_risk_count, outlier_count,
        lead_time_h, deploy_freq_per_day, change_failure_rate, mttr_h, overall_category,
        churn_forecast, cycle_time_forecast_h
      ) VALUES (
        @repository, @periodStart, @periodEnd, @windowDays,
        @totalCommits, @totalChurn, @avgChurn, @highRiskCount, @outlierCount,
        @leadTimeHours, @deploymentFrequencyPerDay, @changeFailureRate, @mttrHours, @overallCategory,
        @churnForecast, @cycleTimeForecast
      )
    `);

    const result = stmt.run({
      repository: snapshot.repository,
      periodStart: snapshot.periodStart,
      periodEnd: snapshot.periodEnd,
      windowDays: snapshot.windowDays,
      totalCommits: snapshot.totalCommits,
      totalChurn: snapshot.totalChurn,
      avgChurn: snapshot.avgChurn,
      highRiskCount: snapshot.highRiskCount,
      outlierCount: snapshot.outlierCount,
      leadTimeHours: snapshot.leadTimeHours,
      deploymentFrequencyPerDay: snapshot.deploymentFrequencyPerDay,
      changeFailureRate: snapshot.changeFailureRate,
      mttrHours: snapshot.mttrHours,
      overallCategory: snapshot.overallCategory,
      churnForecast: snapshot.churnForecast,
      cycleTimeForecast: snapshot.cycleTimeForecast,
    });

    return Number(result.lastInsertRowid);
  }

  /**
   * Save per-author rows linked to a snapshot.
   */
  saveAuthorSnapshots(snapshotId: number, authors: AuthorSnapshot[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO author_snapshots (
        snapshot_id, author, commits, additions, deletions, churn, productivity_score
      ) VALUES (
        @snapshotId, @author, @commits, @additions, @deletions, @churn, @productivityScore
      )
    `);

    const insertMany = this.db.transaction((items: AuthorSnapshot[]) => {
      for (const a of items) {
        stmt.run({
          snapshotId,
          author: a.author,
          commits: a.commits,
          additions: a.additions,
          deletions: a.deletions,
          churn: a.churn,
          productivityScore: a.productivityScore,
        });
      }
    });

    insertMany(authors);
  }

  /**
   * Get the most recent snapshot for a repository.
   */
  getLatestSnapshot(repository: string): Snapshot | null {
    const row = this.db
      .prepare<[string], SnapshotRow>(
        `SELECT * FROM snapshots WHERE repository = ? ORDER BY period_end DESC, id DESC LIMIT 1`
      )
      .get(repository);

    return row ? mapRow(row) : null;
  }

  /**
   * Get the latest snapshot that ended before a given date.
   * Used as the baseline for trend comparison.
   */
  getPreviousSnapshot(repository: string, beforeDate: string): Snapshot | null {
    const row = this.db
      .prepare<[string, string], SnapshotRow>(
        `SELECT * FROM snapshots
         WHERE repository = ? AND period_end < ?
         ORDER BY period_end DESC, id DESC LIMIT 1`
      )
      .get(repository, beforeDate);

    return row ? mapRow(row) : null;
  }

  /**
   * Get snapshot history for a repository, most recent first.
   */
  getHistory(repository: string, limit = 10): Snapshot[] {
    const rows = this.db
      .prepare<[string, number], SnapshotRow>(
        `SELECT * FROM snapshots WHERE repository = ?
         ORDER BY period_end DESC, id DESC LIMIT ?`
      )
      .all(repository, limit);

    return rows.map(mapRow);
  }

  getAuthorSnapshots(snapshotId: number): AuthorSnapshot[] {
    const rows = this.db
      .prepare<[number], AuthorSnapshotRow>(
        `SELECT * FROM author_snapshots WHERE snapshot_id = ? ORDER BY id`
      )
      .all(snapshotId);

    return rows.map(mapAuthorRow);
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        repository      TEXT NOT NULL,
        period_start    TEXT NOT NULL,
        period_end      TEXT NOT NULL,
        window_days     REAL NOT NULL,
        created_at      TEXT NOT NULL DEFAULT (datetime('now')),

        total_commits     INTEGER NOT NULL DEFAULT 0,
        total_churn       INTEGER NOT NULL DEFAULT 0,
        avg_churn         REAL NOT NULL DEFAULT 0,
        high_risk_count   INTEGER NOT NULL DEFAULT 0,
        outlier_count     INTEGER NOT NULL DEFAULT 0,

        lead_time_h          REAL NOT NULL DEFAULT 0,
        deploy_freq_per_day  REAL NOT NULL DEFAULT 0,
        change_failure_rate  REAL NOT NULL DEFAULT 0,
        mttr_h               REAL NOT NULL DEFAULT 0,
        overall_category     TEXT NOT NULL DEFAULT 'low',

        churn_forecast         REAL NOT NULL DEFAULT 0,
        cycle_time_forecast_h  REAL NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS author_snapshots (
        id                  INTEGER PRIMARY KEY AUTOINCREMENT,
        snapshot_id         INTEGER NOT NULL REFERENCES snapshots(id),
        author              TEXT NOT NULL,
        commits             INTEGER NOT NULL DEFAULT 0,
        additions           INTEGER NOT NULL DEFAULT 0,
        deletions           INTEGER NOT NULL DEFAULT 0,
        churn               INTEGER NOT NULL DEFAULT 0,
        productivity_score  REAL NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_repo_period
        ON snapshots(repository, period_end);
      CREATE INDEX IF NOT EXISTS idx_author_snapshots
        ON author_snapshots(snapshot_id);
    `);
  }
}

// ─── Row Mapping ────────────────────────────────────────────

interface SnapshotRow {
  id: number;
  repository: string;
  period_start: string;
  period_end: string;
  window_days: number;
  created_at: string;
  total_commits: number;
  total_churn: number;
  avg_churn: number;
  high_risk_count: number;
  outlier_count: number;
  lead_time_h: number;
  deploy_freq_per_day: number;
  change_failure_rate: number;
  mttr_h: number;
  overall_category: string;
  churn_forecast: number;
  cycle_time_forecast_h: number;
}

interface AuthorSnapshotRow {
  id: number;
  snapshot_id: number;
  author: string;
  commits: number;
  additions: number;
  deletions: number;
  churn: number;
  productivity_score: number;
}

const CATEGORIES: readonly PerformanceCategory[] = ['elite', 'high', 'medium', 'low'];

function toCategory(value: string): PerformanceCategory {
  return CATEGORIES.find((c) => c === value) ?? 'low';
}

function mapRow(row: SnapshotRow): Snapshot {
  return {
    id: row.id,
    repository: row.repository,
    periodStart: row.period_start,
    periodEnd: row.period_end,
    windowDays: row.window_days,
    createdAt: row.created_at,
    totalCommits: row.total_commits,
    totalChurn: row.total_churn,
    avgChurn: row.avg_churn,
    highRiskCount: row.high_risk_count,
    outlierCount: row.outlier_count,
    leadTimeHours: row.lead_time_h,
    deploymentFrequencyPerDay: row.deploy_freq_per_day,
    changeFailureRate: row.change_failure_rate,
    mttrHours: row.mttr_h,
    overallCategory: toCategory(row.overall_category),
    churnForecast: row.churn_forecast,
    cycleTimeForecast: row.cycle_time_forecast_h,
  };
}

function mapAuthorRow(row: AuthorSnapshotRow): AuthorSnapshot {
  return {
    id: row.id,
    snapshotId: row.snapshot_id,
    author: row.author,
    commits: row.commits,
    additions: row.additions,
    deletions: row.deletions,
    churn: row.churn,
    productivityScore: row.productivity_score,
  };
}
