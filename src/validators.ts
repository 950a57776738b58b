/**
 * Zod schemas for the ingestion boundary.
 *
 * Records arrive as loosely-typed JSON from the harvester. Each record is
 * validated on its own: a record with a missing or invalid numeric field is
 * dropped with a `malformed_record` warning instead of failing the batch.
 * Descriptive fields fall back to defaults so partial data still counts.
 */

import { z } from 'zod';
import type {
  CommitRecord,
  DeploymentRecord,
  IncidentRecord,
  PullRequestRecord,
} from './types/records.js';
import type { AnalysisWarning } from './types/report.js';

/** Observation window used when the envelope omits one. */
export const DEFAULT_WINDOW_DAYS = 30;

/** Accepted timestamp range; weekly bucketing spans first to last record. */
export const EARLIEST_TIMESTAMP = Date.UTC(1970, 0, 1);
export const LATEST_TIMESTAMP = Date.UTC(2100, 0, 1);

const Timestamp = z.string().superRefine((value, ctx) => {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
  } else if (ms < EARLIEST_TIMESTAMP || ms >= LATEST_TIMESTAMP) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Timestamp outside 1970-01-01..2100-01-01',
    });
  }
});

const LineCount = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const RecordId = z.union([z.string().min(1), z.number()]).transform(String);

export const CommitRecordSchema = z.object({
  sha: z.string().min(1),
  author: z.string().min(1).default('unknown'),
  timestamp: Timestamp,
  additions: LineCount,
  deletions: LineCount,
  filesChanged: LineCount,
  message: z.string().default(''),
});

export const PullRequestRecordSchema = z.object({
  id: RecordId,
  author: z.string().min(1).default('unknown'),
  createdAt: Timestamp,
  mergedAt: Timestamp.nullable().default(null),
  reviewCount: LineCount.default(0),
  additions: LineCount,
  deletions: LineCount,
  ciStatus: z.enum(['success', 'failure', 'pending']).default('pending'),
});

export const DeploymentRecordSchema = z.object({
  id: RecordId,
  timestamp: Timestamp,
  status: z.enum(['success', 'failed', 'pending']).default('success'),
  commitShas: z.array(z.string()).optional(),
});

export const IncidentRecordSchema = z.object({
  id: RecordId,
  detectedAt: Timestamp,
  resolvedAt: Timestamp.nullable().default(null),
  status: z.enum(['open', 'resolved']).optional(),
});

export const AnalyticsInputSchema = z.object({
  commits: z.array(z.unknown()).default([]),
  pullRequests: z.array(z.unknown()).default([]),
  deployments: z.array(z.unknown()).default([]),
  incidents: z.array(z.unknown()).default([]),
  windowDays: z.number().default(DEFAULT_WINDOW_DAYS),
});

// ─── Per-record validation ──────────────────────────────────

export interface ValidatedRecords<T> {
  records: T[];
  warnings: AnalysisWarning[];
}

function validateEach<T>(
  items: readonly unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): ValidatedRecords<T> {
  const records: T[] = [];
  const warnings: AnalysisWarning[] = [];

  items.forEach((item, index) => {
    const result = schema.safeParse(item);
    if (result.success) {
      records.push(result.data);
      return;
    }
    const recordId = rawRecordId(item);
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    warnings.push({
      stage: 'ingest',
      kind: 'malformed_record',
      message: `Skipped ${label} #${index}${recordId ? ` (${recordId})` : ''}: ${issues}`,
      ...(recordId ? { recordId } : {}),
    });
  });

  return { records, warnings };
}

function rawRecordId(item: unknown): string | undefined {
  if (typeof item !== 'object' || item === null) return undefined;
  const value = 'sha' in item ? item.sha : 'id' in item ? item.id : undefined;
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function validateCommits(items: readonly unknown[]): ValidatedRecords<CommitRecord> {
  return validateEach(items, CommitRecordSchema, 'commit');
}

export function validatePullRequests(
  items: readonly unknown[]
): ValidatedRecords<PullRequestRecord> {
  return validateEach(items, PullRequestRecordSchema, 'pull request');
}

export function validateDeployments(
  items: readonly unknown[]
): ValidatedRecords<DeploymentRecord> {
  return validateEach(items, DeploymentRecordSchema, 'deployment');
}

export function validateIncidents(items: readonly unknown[]): ValidatedRecords<IncidentRecord> {
  const { records, warnings } = validateEach(items, IncidentRecordSchema, 'incident');
  return {
    records: records.map((incident) => ({
      ...incident,
      status: incident.status ?? (incident.resolvedAt ? 'resolved' : 'open'),
    })),
    warnings,
  };
}
