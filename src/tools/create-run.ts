import { z } from 'zod';

import { countSnapshotEntries, createRun, getRun } from '../pipeline/snapshot.js';
import type { ToolContext } from './tracker-utils.js';

export const createRunInputSchema = z.object({}).strict();

export type CreateRunInput = z.infer<typeof createRunInputSchema>;

export interface CreateRunResult {
  run_id: number;
  created_at: string;
  entries: number;
}

export async function createRunTool(context: ToolContext, _input: CreateRunInput): Promise<CreateRunResult> {
  const runId = createRun(context.db);
  const run = getRun(context.db, runId);

  return {
    run_id: runId,
    created_at: run?.created_at ?? new Date().toISOString(),
    entries: countSnapshotEntries(context.db, runId),
  };
}
