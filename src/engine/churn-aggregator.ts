/**
 * Churn Aggregator
 *
 * Reduces commit records into team-wide and per-author churn statistics.
 * Pure function — no I/O, all data passed in, results returned.
 */

import type { CommitRecord } from '../types/records.js';
import type {
  AuthorChurnStats,
  ChurnSummary,
  CommitMessageTags,
  TeamChurnTotals,
} from '../types/report.js';
import { MS_PER_HOUR, meanOrZero, medianOrZero, sampleStdDevOrZero } from './statistics.js';

/** Weights of the productivity score (ranking aid, not a correctness metric). */
const PRODUCTIVITY_WEIGHTS = {
  commits: 0.3,
  churnPer100: 0.4,
  filesPer10: 0.3,
} as const;

/** Lines added plus lines deleted. */
export function churnOf(record: { additions: number; deletions: number }): number {
  return record.additions + record.deletions;
}

/** deletions / max(additions, 1) — never divides by zero. */
export function deletionRatio(record: { additions: number; deletions: number }): number {
  return record.deletions / Math.max(record.additions, 1);
}

/**
 * Aggregate churn for a batch of commits.
 * An empty batch yields a zeroed, well-formed summary.
 */
export function aggregateChurn(commits: readonly CommitRecord[]): ChurnSummary {
  const churns = commits.map(churnOf);

  let totalAdditions = 0;
  let totalDeletions = 0;
  let totalFilesChanged = 0;
  for (const c of commits) {
    totalAdditions += c.additions;
    totalDeletions += c.deletions;
    totalFilesChanged += c.filesChanged;
  }

  const team: TeamChurnTotals = {
    totalCommits: commits.length,
    totalAdditions,
    totalDeletions,
    netChange: totalAdditions - totalDeletions,
    totalChurn: totalAdditions + totalDeletions,
    totalFilesChanged,
    avgChurn: meanOrZero(churns),
    medianChurn: medianOrZero(churns),
    churnStdDev: sampleStdDevOrZero(churns),
  };

  return {
    team,
    byAuthor: aggregateByAuthor(commits),
    messageTags: countMessageTags(commits),
  };
}

/**
 * Order authors by productivity score (descending), ties broken by name.
 */
export function rankAuthors(byAuthor: Record<string, AuthorChurnStats>): AuthorChurnStats[] {
  return Object.values(byAuthor).sort(
    (a, b) => b.productivityScore - a.productivityScore || a.author.localeCompare(b.author)
  );
}

// ─── Per Author ─────────────────────────────────────────────

function aggregateByAuthor(commits: readonly CommitRecord[]): Record<string, AuthorChurnStats> {
  const grouped = new Map<string, CommitRecord[]>();
  for (const c of commits) {
    const list = grouped.get(c.author);
    if (list) {
      list.push(c);
    } else {
      grouped.set(c.author, [c]);
    }
  }

  const result: Record<string, AuthorChurnStats> = {};
  for (const [author, list] of grouped) {
    let additions = 0;
    let deletions = 0;
    let filesChanged = 0;
    for (const c of list) {
      additions += c.additions;
      deletions += c.deletions;
      filesChanged += c.filesChanged;
    }
    const churn = additions + deletions;

    result[author] = {
      author,
      commitCount: list.length,
      additions,
      deletions,
      churn,
      netChange: additions - deletions,
      filesChanged,
      churnRatio: deletionRatio({ additions, deletions }),
      avgChurnPerCommit: churn / list.length,
      productivityScore:
        PRODUCTIVITY_WEIGHTS.commits * list.length +
        PRODUCTIVITY_WEIGHTS.churnPer100 * (churn / 100) +
        PRODUCTIVITY_WEIGHTS.filesPer10 * (filesChanged / 10),
      avgCommitIntervalHours: averageIntervalHours(list),
    };
  }
  return result;
}

function averageIntervalHours(commits: readonly CommitRecord[]): number | null {
  if (commits.length < 2) return null;

  const times = commits.map((c) => Date.parse(c.timestamp)).sort((a, b) => a - b);
  const first = times[0] ?? 0;
  const last = times[times.length - 1] ?? first;
  // Mean of consecutive gaps telescopes to (last - first) / (n - 1)
  return (last - first) / (times.length - 1) / MS_PER_HOUR;
}

// ─── Message Tags ───────────────────────────────────────────

function countMessageTags(commits: readonly CommitRecord[]): CommitMessageTags {
  const tags: CommitMessageTags = { fix: 0, refactor: 0, feat: 0 };
  for (const c of commits) {
    const msg = c.message.toLowerCase();
    if (msg.includes('fix')) tags.fix++;
    if (msg.includes('refactor')) tags.refactor++;
    if (msg.includes('feat')) tags.feat++;
  }
  return tags;
}
