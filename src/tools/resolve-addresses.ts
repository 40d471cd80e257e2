import { z } from 'zod';

import { resolveBatch, type ResolveBatchResult } from '../pipeline/resolver.js';
import { normalizeLimit, type ToolContext } from './tracker-utils.js';

export const resolveAddressesInputSchema = z.object({
  max_items: z.number().optional(),
});

export type ResolveAddressesInput = z.infer<typeof resolveAddressesInputSchema>;

const MAX_BATCH = 200;

export async function resolveAddresses(
  context: ToolContext,
  input: ResolveAddressesInput,
): Promise<ResolveBatchResult> {
  const { config } = context;

  return resolveBatch(context.db, {
    maxItems: normalizeLimit(input.max_items, config.resolverBatchSize, MAX_BATCH),
    concurrency: config.resolverConcurrency,
    lookupUrlTemplate: config.lookupUrlTemplate,
    timeoutMs: config.lookupTimeoutMs,
    defaults: config.defaults,
    fetchImpl: context.fetchImpl,
  });
}
