import { z } from 'zod';

import { STAGE_LABELS, STAGES, type PropertyRecord, type RunRecord } from '../db/types.js';
import {
  CHANGE_LABELS,
  getLatestChanges,
  type ChangeLabel,
  type ChangeSummary,
  type KeyCollision,
  type RemovedEntry,
} from '../pipeline/diff.js';
import { deriveKey } from '../pipeline/identity.js';
import { buildRecordLinks, type RecordLinks } from '../pipeline/links.js';
import { resolutionStatus, type ResolutionStatus } from '../pipeline/resolver.js';
import { normalizeLimit, type ToolContext } from './tracker-utils.js';

export const getChangesInputSchema = z.object({
  stage: z.enum(STAGES).optional(),
  change: z.enum(CHANGE_LABELS).optional(),
  include_links: z.boolean().optional(),
  limit: z.number().optional(),
});

export type GetChangesInput = z.infer<typeof getChangesInputSchema>;

export interface ChangedRecord extends PropertyRecord {
  stage_label: string;
  key: string;
  change: ChangeLabel | null;
  resolution_status: ResolutionStatus;
  links: RecordLinks | null;
}

export interface GetChangesResult {
  latest_run: RunRecord | null;
  previous_run: RunRecord | null;
  summary: ChangeSummary;
  total_records: number;
  records: ChangedRecord[];
  removed: RemovedEntry[];
  collisions: KeyCollision[];
}

export async function getChanges(context: ToolContext, input: GetChangesInput): Promise<GetChangesResult> {
  const report = getLatestChanges(context.db);
  const limit = normalizeLimit(input.limit);

  const records = report.records
    .map((record) => ({
      ...record,
      stage_label: STAGE_LABELS[record.stage],
      key: deriveKey(record),
      change: report.changes[record.id] ?? null,
      resolution_status: resolutionStatus(record),
      links: input.include_links ? buildRecordLinks(record, context.config.lookupUrlTemplate) : null,
    }))
    .filter((record) => (input.stage ? record.stage === input.stage : true))
    .filter((record) => (input.change ? record.change === input.change : true));

  return {
    latest_run: report.latest_run,
    previous_run: report.previous_run,
    summary: report.summary,
    total_records: records.length,
    records: records.slice(0, limit),
    removed: input.change && input.change !== 'REMOVED' ? [] : report.removed,
    collisions: report.collisions,
  };
}
