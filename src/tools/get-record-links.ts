import { z } from 'zod';

import { getRecord } from '../db/records.js';
import { buildRecordLinks, type RecordLinks } from '../pipeline/links.js';
import { resolutionStatus, type ResolutionStatus } from '../pipeline/resolver.js';
import type { ToolContext } from './tracker-utils.js';

export const getRecordLinksInputSchema = z.object({
  item_id: z.number().int().positive(),
});

export type GetRecordLinksInput = z.infer<typeof getRecordLinksInputSchema>;

export interface RecordLinksResult extends RecordLinks {
  item_id: number;
  resolved_situs: string | null;
  resolution_status: ResolutionStatus;
}

export async function getRecordLinks(
  context: ToolContext,
  input: GetRecordLinksInput,
): Promise<RecordLinksResult | null> {
  const record = getRecord(context.db, input.item_id);
  if (!record) {
    return null;
  }

  return {
    item_id: record.id,
    resolved_situs: record.resolved_situs,
    resolution_status: resolutionStatus(record),
    ...buildRecordLinks(record, context.config.lookupUrlTemplate),
  };
}
