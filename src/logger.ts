/**
 * Structured logging.
 *
 * Everything goes to stderr: stdout carries MCP JSON-RPC and CLI output.
 */

import type { AnalysisWarning } from './types/report.js';

// ─── Types ──────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tool?: string;
  durationMs?: number;
  message: string;
  context?: Record<string, unknown>;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/** Minimum level from REPO_VELOCITY_LOG_LEVEL; info when unset or unknown. */
function minLevel(): LogLevel {
  const configured = process.env['REPO_VELOCITY_LOG_LEVEL']?.toLowerCase();
  return configured && isLogLevel(configured) ? configured : 'info';
}

// ─── Logger ─────────────────────────────────────────────

export function formatEntry(entry: LogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5)];

  if (entry.tool) {
    parts.push(`[${entry.tool}]`);
  }

  parts.push(entry.message);

  if (entry.durationMs !== undefined) {
    parts.push(`(${entry.durationMs}ms)`);
  }

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function write(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[minLevel()]) return;
  console.error(formatEntry(entry));
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  write({ timestamp: new Date().toISOString(), level, message, context });
}

export function logTool(
  tool: string,
  level: LogLevel,
  message: string,
  durationMs?: number,
  context?: Record<string, unknown>
): void {
  write({ timestamp: new Date().toISOString(), level, tool, durationMs, message, context });
}

/** Log each report warning at `warn`. */
export function logWarnings(warnings: readonly AnalysisWarning[]): void {
  for (const w of warnings) {
    log('warn', w.message, {
      stage: w.stage,
      kind: w.kind,
      ...(w.recordId ? { recordId: w.recordId } : {}),
    });
  }
}

/**
 * Wrap a tool handler with timing and error logging.
 * Returns the same result; errors are logged and rethrown.
 */
export async function withLogging<T>(toolName: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    logTool(toolName, 'debug', 'completed', Date.now() - start);
    return result;
  } catch (error) {
    logTool(
      toolName,
      'error',
      error instanceof Error ? error.message : String(error),
      Date.now() - start
    );
    throw error;
  }
}
