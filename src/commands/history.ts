/**
 * repo-velocity history — list saved snapshots for a repository
 */

import { z } from 'zod';
import { HistoryStore } from '../history/history-store.js';

const HistoryFlagsSchema = z.object({
  repository: z
    .string({ required_error: '--repository <name> is required' })
    .min(1, '--repository <name> is required'),
  limit: z.coerce.number().int().positive().default(10),
});

export function runHistoryCommand(
  flags: Record<string, string>,
  openStore: () => HistoryStore = () => new HistoryStore()
): string {
  const opts = HistoryFlagsSchema.parse(flags);
  const store = openStore();
  try {
    return JSON.stringify(store.getHistory(opts.repository, opts.limit), null, 2);
  } finally {
    store.close();
  }
}
