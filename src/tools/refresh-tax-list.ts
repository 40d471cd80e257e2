import { z } from 'zod';

import { refreshTaxList, type TaxRefreshFailure, type TaxRefreshSummary } from '../pipeline/tax-list.js';
import type { ToolContext } from './tracker-utils.js';

export const refreshTaxListInputSchema = z.object({
  document_url: z.string().url().optional(),
});

export type RefreshTaxListInput = z.infer<typeof refreshTaxListInputSchema>;

export type RefreshTaxListResult = ({ ok: true } & TaxRefreshSummary) | ({ ok: false } & TaxRefreshFailure);

export async function refreshTaxListTool(context: ToolContext, input: RefreshTaxListInput): Promise<RefreshTaxListResult> {
  const { config } = context;
  const result = await refreshTaxList(context.db, {
    pageUrl: config.taxListPageUrl,
    fallbackUrl: config.taxListFallbackUrl,
    documentUrl: input.document_url,
    timeoutMs: config.documentTimeoutMs,
    defaults: config.defaults,
    sourceUrl: null,
    fetchImpl: context.fetchImpl,
  });

  if (!result.ok) {
    console.error(`distress-tracker: tax list refresh failed (${result.error.reason}): ${result.error.message}`);
    return { ok: false, ...result.error };
  }
  return { ok: true, ...result.value };
}
