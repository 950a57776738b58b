/**
 * MCP Tools
 *
 * Tool definitions and handlers for the stdio server. Every tool answers
 * with a single text block holding JSON; failures come back as
 * `isError: true` with an `Error: <message>` text.
 *
 * Tools:
 *   run_analytics     Analyze a record envelope (inline or from a file)
 *   forecast_series   One-step forecast of a weekly series
 *   get_history       Saved snapshots for a repository
 *   get_capabilities  Tools, config locations and effective thresholds
 */

import { existsSync } from 'node:fs';
import { z } from 'zod';
import { loadAnalyticsConfig, readAnalyticsConfig } from './config/analytics-config.js';
import { resolvePaths } from './config/paths.js';
import { forecastSeries } from './engine/trend-forecaster.js';
import { HistoryStore } from './history/history-store.js';
import { readInputFile } from './commands/analyze.js';
import { runAnalysis } from './service/analysis-service.js';
import { describeError } from './errors.js';
import { logWarnings, withLogging } from './logger.js';

export const SERVER_VERSION = '1.0.0';

// Alias, not interface: must be assignable to the SDK's index-signature result type
export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolDeps {
  openStore: () => HistoryStore;
}

const defaultDeps: ToolDeps = {
  openStore: () => new HistoryStore(),
};

// ─── Definitions ─────────────────────────────────────────────

export const TOOL_DEFINITIONS = [
  {
    name: 'run_analytics',
    description:
      'Analyze commits, pull requests, deployments and incidents: churn per author, risky changes, churn outliers, DORA metrics and next-week forecasts. Pass the records inline as `input` or point `inputPath` at a JSON file.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        input: {
          type: 'object' as const,
          description:
            'Envelope { commits, pullRequests, deployments, incidents, windowDays }. Missing arrays count as empty.',
        },
        inputPath: {
          type: 'string' as const,
          description: 'Path to a JSON file holding the envelope (alternative to input)',
        },
        repository: {
          type: 'string' as const,
          description: 'Repository name (e.g., "acme/api") to compare against saved history',
        },
        save: {
          type: 'boolean' as const,
          description: 'Save a snapshot of this report (requires repository)',
        },
      },
    },
  },
  {
    name: 'forecast_series',
    description:
      'Forecast next week from a weekly churn or cycle-time series using a least-squares trend.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        metric: {
          type: 'string' as const,
          enum: ['churn', 'cycle_time'],
          description: 'churn (lines changed) or cycle_time (hours)',
        },
        values: {
          type: 'array' as const,
          items: { type: 'number' as const },
          description: 'Weekly values, oldest first',
        },
      },
      required: ['metric', 'values'],
    },
  },
  {
    name: 'get_history',
    description: 'List saved report snapshots for a repository, newest first.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        repository: { type: 'string' as const, description: 'Repository name' },
        limit: { type: 'number' as const, description: 'Maximum snapshots (default: 10)' },
      },
      required: ['repository'],
    },
  },
  {
    name: 'get_capabilities',
    description: 'Returns available tools, config locations and the effective thresholds.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
];

// ─── Argument Schemas ────────────────────────────────────────

const RunAnalyticsArgsSchema = z
  .object({
    input: z.record(z.unknown()).optional(),
    inputPath: z.string().min(1).optional(),
    repository: z.string().min(1).optional(),
    save: z.boolean().default(false),
  })
  .refine((a) => (a.input === undefined) !== (a.inputPath === undefined), {
    message: 'Provide exactly one of input or inputPath',
  })
  .refine((a) => !a.save || a.repository !== undefined, {
    message: 'save requires repository',
  });

const ForecastArgsSchema = z.object({
  metric: z.enum(['churn', 'cycle_time']),
  values: z.array(z.number()),
});

const HistoryArgsSchema = z.object({
  repository: z.string().min(1),
  limit: z.number().int().positive().default(10),
});

// ─── Handlers ────────────────────────────────────────────────

function json(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function handleRunAnalytics(args: unknown, deps: ToolDeps): ToolResult {
  const opts = RunAnalyticsArgsSchema.parse(args ?? {});
  const raw = opts.inputPath ? readInputFile(opts.inputPath) : opts.input;
  const config = readAnalyticsConfig() ?? undefined;

  const store = opts.repository ? deps.openStore() : undefined;
  try {
    const result = runAnalysis(raw, {
      repository: opts.repository,
      store,
      save: opts.save,
      config,
    });
    logWarnings(result.report.warnings);
    return json({
      report: result.report,
      trends: result.trends,
      ...(result.snapshotId !== undefined ? { snapshotId: result.snapshotId } : {}),
    });
  } finally {
    store?.close();
  }
}

function handleForecastSeries(args: unknown): ToolResult {
  const opts = ForecastArgsSchema.parse(args ?? {});
  const config = loadAnalyticsConfig();
  return json(forecastSeries(opts.values, opts.metric, config.forecast));
}

function handleGetHistory(args: unknown, deps: ToolDeps): ToolResult {
  const opts = HistoryArgsSchema.parse(args ?? {});
  const store = deps.openStore();
  try {
    return json(store.getHistory(opts.repository, opts.limit));
  } finally {
    store.close();
  }
}

function handleGetCapabilities(): ToolResult {
  const { home, configFile, historyDb } = resolvePaths();
  return json({
    name: 'repo-velocity',
    version: SERVER_VERSION,
    tools: TOOL_DEFINITIONS.map((t) => t.name),
    configDir: home,
    configFile: existsSync(configFile) ? configFile : null,
    historyDb,
    thresholds: loadAnalyticsConfig(),
  });
}

/**
 * Dispatch a tool call. Never throws: errors become `isError` results.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  deps: ToolDeps = defaultDeps
): Promise<ToolResult> {
  try {
    return await withLogging(name, async () => {
      switch (name) {
        case 'run_analytics':
          return handleRunAnalytics(args, deps);
        case 'forecast_series':
          return handleForecastSeries(args);
        case 'get_history':
          return handleGetHistory(args, deps);
        case 'get_capabilities':
          return handleGetCapabilities();
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    });
  } catch (error) {
    return {
      content: [{ type: 'text', text: `Error: ${describeError(error)}` }],
      isError: true,
    };
  }
}
