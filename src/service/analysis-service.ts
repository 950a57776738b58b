/**
 * Analysis Service
 *
 * Shared entry point for the CLI and MCP server: runs the pipeline on a
 * JSON envelope, then (with a repository name and a history store)
 * compares against the previous snapshot and optionally saves a new one.
 */

import { analyzeInput } from '../orchestrator/pipeline.js';
import { resolveAnalyticsConfig, type AnalyticsConfigOverrides } from '../config/thresholds.js';
import type { HistoryStore } from '../history/history-store.js';
import { buildAuthorSnapshots, buildSnapshot } from '../history/snapshot-builder.js';
import type { Snapshot } from '../history/types.js';
import { analyzeTrends } from '../insights/trend-analyzer.js';
import type { TrendInsight } from '../insights/types.js';
import type { AnalysisReport } from '../types/report.js';
import { log } from '../logger.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface RunAnalysisOptions {
  /** e.g. "acme/api"; required for history and trends */
  repository?: string;
  store?: HistoryStore;
  /** Persist the snapshot after comparing */
  save?: boolean;
  config?: AnalyticsConfigOverrides;
  /** End of the analysed period; defaults to now */
  periodEnd?: Date;
}

export interface AnalysisResult {
  report: AnalysisReport;
  snapshot?: Snapshot;
  snapshotId?: number;
  previous?: Snapshot | null;
  trends: TrendInsight[];
}

export function runAnalysis(raw: unknown, options: RunAnalysisOptions = {}): AnalysisResult {
  const report = analyzeInput(raw, { config: options.config });
  const { repository, store } = options;
  if (!repository || !store) {
    return { report, trends: [] };
  }

  const end = options.periodEnd ?? new Date();
  const spanMs =
    Number.isFinite(report.windowDays) && report.windowDays > 0 ? report.windowDays * MS_PER_DAY : 0;
  const periodEnd = end.toISOString();
  const periodStart = new Date(end.getTime() - spanMs).toISOString();

  const snapshot = buildSnapshot({ repository, periodStart, periodEnd, report });
  const previous = store.getPreviousSnapshot(repository, periodEnd);
  const trends = analyzeTrends(snapshot, previous, resolveAnalyticsConfig(options.config).trends);

  if (!options.save) {
    return { report, snapshot, previous, trends };
  }

  const snapshotId = store.saveSnapshot(snapshot);
  store.saveAuthorSnapshots(snapshotId, buildAuthorSnapshots(report));
  log('info', `Saved snapshot ${snapshotId}`, { repository, periodEnd });

  return { report, snapshot, snapshotId, previous, trends };
}
