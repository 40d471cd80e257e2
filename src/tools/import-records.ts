import type { z } from 'zod';

import { importInputSchema, importRecords, type ImportResult } from '../pipeline/import.js';
import type { ToolContext } from './tracker-utils.js';

export const importRecordsInputSchema = importInputSchema;

export type ImportRecordsInput = z.output<typeof importRecordsInputSchema>;

export async function importRecordsTool(context: ToolContext, input: ImportRecordsInput): Promise<ImportResult> {
  return importRecords(context.db, input);
}
