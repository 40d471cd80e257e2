import { z } from 'zod';

import { resetStore, type InitializeStoreResult } from '../db/schema.js';
import type { ToolContext } from './tracker-utils.js';

export const resetStoreInputSchema = z.object({
  confirm: z.literal(true, { errorMap: () => ({ message: 'confirm must be true to wipe the store' }) }),
});

export type ResetStoreInput = z.infer<typeof resetStoreInputSchema>;

export async function resetStoreTool(context: ToolContext, _input: ResetStoreInput): Promise<InitializeStoreResult> {
  return resetStore(context.db, {
    seedPath: context.config.seedPath,
    defaults: context.config.defaults,
  });
}
