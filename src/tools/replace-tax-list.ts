import { z } from 'zod';

import { extractParcelNumbers, replaceTaxRecords } from '../pipeline/tax-list.js';
import type { ToolContext } from './tracker-utils.js';

export const replaceTaxListInputSchema = z
  .object({
    parcel_numbers: z.array(z.string()).optional(),
    document_text: z.string().optional(),
    source_url: z.string().url().optional(),
  })
  .refine((input) => input.parcel_numbers !== undefined || input.document_text !== undefined, {
    message: 'either parcel_numbers or document_text is required',
  });

export type ReplaceTaxListInput = z.infer<typeof replaceTaxListInputSchema>;

export interface ReplaceTaxListResult {
  parcels: number;
  deleted: number;
  inserted: number;
}

/**
 * Replaces the tax-delinquency list from parcel numbers supplied directly or
 * found in already-extracted document text. An empty list is rejected rather
 * than wiping every tax record.
 */
export async function replaceTaxList(context: ToolContext, input: ReplaceTaxListInput): Promise<ReplaceTaxListResult> {
  const parcels = Array.from(
    new Set([...(input.parcel_numbers ?? []), ...extractParcelNumbers(input.document_text ?? '')].map((apn) => apn.trim())),
  ).filter((apn) => apn.length > 0);

  if (parcels.length === 0) {
    throw new Error('no parcel numbers supplied');
  }

  const { deleted, inserted } = replaceTaxRecords(context.db, parcels, {
    defaults: context.config.defaults,
    sourceUrl: input.source_url ?? null,
  });

  return {
    parcels: parcels.length,
    deleted,
    inserted,
  };
}
