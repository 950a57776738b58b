/**
 * Record types
 *
 * Normalized repository activity as handed to the analytics engine.
 * Timestamps are ISO-8601 strings, as delivered by the GitHub API.
 */

export interface CommitRecord {
  sha: string;
  author: string;
  timestamp: string;
  additions: number;
  deletions: number;
  filesChanged: number;
  message: string;
}

export type CiStatus = 'success' | 'failure' | 'pending';

export interface PullRequestRecord {
  id: string;
  author: string;
  createdAt: string;
  /** null while the PR is open or was closed without merging */
  mergedAt: string | null;
  reviewCount: number;
  additions: number;
  deletions: number;
  ciStatus: CiStatus;
}

export interface DeploymentRecord {
  id: string;
  timestamp: string;
  status: 'success' | 'failed' | 'pending';
  /** Commits shipped by this deployment, when the pipeline reports them */
  commitShas?: string[];
}

export interface IncidentRecord {
  id: string;
  detectedAt: string;
  resolvedAt: string | null;
  status: 'open' | 'resolved';
}
