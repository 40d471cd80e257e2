import { z } from 'zod';

import { countSnapshotEntries, listRecentRuns } from '../pipeline/snapshot.js';
import { normalizeLimit, type ToolContext } from './tracker-utils.js';

export const listRunsInputSchema = z.object({
  limit: z.number().optional(),
});

export type ListRunsInput = z.infer<typeof listRunsInputSchema>;

export interface RunSummary {
  id: number;
  created_at: string;
  entries: number;
}

export async function listRuns(context: ToolContext, input: ListRunsInput): Promise<{ runs: RunSummary[] }> {
  const limit = normalizeLimit(input.limit, 2, 50);

  return {
    runs: listRecentRuns(context.db, limit).map((run) => ({
      id: run.id,
      created_at: run.created_at,
      entries: countSnapshotEntries(context.db, run.id),
    })),
  };
}
