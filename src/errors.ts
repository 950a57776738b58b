import { ZodError } from 'zod';

/**
 * One-line description of a thrown value for CLI and MCP error output.
 * Validation failures list each issue with its path.
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return error instanceof Error ? error.message : 'Unknown error';
}
