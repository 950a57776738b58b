/**
 * repo-velocity analyze — run the analytics pipeline on a JSON file
 *
 * Reads `{ commits, pullRequests, deployments, incidents, windowDays }`,
 * prints the report (plus trends when a repository is named) as JSON.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { readAnalyticsConfig } from '../config/analytics-config.js';
import { HistoryStore } from '../history/history-store.js';
import { runAnalysis } from '../service/analysis-service.js';
import { logWarnings } from '../logger.js';

const AnalyzeFlagsSchema = z.object({
  input: z.string({ required_error: '--input <file> is required' }).min(1, '--input <file> is required'),
  repository: z.string().min(1, '--repository needs a name').optional(),
  save: z.string().optional(),
  config: z.string().min(1, '--config needs a file path').optional(),
});

export interface AnalyzeDeps {
  openStore: () => HistoryStore;
}

const defaultDeps: AnalyzeDeps = {
  openStore: () => new HistoryStore(),
};

/** Parse the JSON input file; a missing or unreadable file is an error. */
export function readInputFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read input file ${path}: ${reason}`);
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new Error(`Input file ${path} is not valid JSON`);
  }
}

export function runAnalyzeCommand(
  flags: Record<string, string>,
  deps: AnalyzeDeps = defaultDeps
): string {
  const opts = AnalyzeFlagsSchema.parse(flags);
  const save = opts.save !== undefined;
  if (save && !opts.repository) {
    throw new Error('--save requires --repository <name>');
  }

  const config = readAnalyticsConfig(opts.config) ?? undefined;
  if (opts.config && !config) {
    throw new Error(`Config file not found: ${opts.config}`);
  }

  const raw = readInputFile(opts.input);
  const store = opts.repository ? deps.openStore() : undefined;
  try {
    const result = runAnalysis(raw, { repository: opts.repository, store, save, config });
    logWarnings(result.report.warnings);
    return JSON.stringify(
      {
        report: result.report,
        trends: result.trends,
        ...(result.snapshotId !== undefined ? { snapshotId: result.snapshotId } : {}),
      },
      null,
      2
    );
  } finally {
    store?.close();
  }
}
