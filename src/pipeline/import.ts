import type { Database } from 'better-sqlite3';
import { z } from 'zod';

import { insertRecords } from '../db/records.js';
import { coerceStage, type NewPropertyRecord } from '../db/types.js';

export const REQUIRED_HEADERS = ['stage', 'address', 'city', 'state'] as const;

const cell = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

const importRowSchema = z.record(z.string(), cell);

export const importInputSchema = z.object({
  headers: z.array(z.string()).optional(),
  rows: z.array(importRowSchema),
});

export type ImportInput = z.input<typeof importInputSchema>;

export interface ImportResult {
  inserted: number;
  coerced_to_other: number;
  item_ids: number[];
}

export class ImportValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Import rejected: ${issues.slice(0, 5).join('; ')}${issues.length > 5 ? ` (+${issues.length - 5} more)` : ''}`);
    this.name = 'ImportValidationError';
  }
}

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

/**
 * Validates every row before writing any of them. Unknown stages become OTHER;
 * blank optional columns are stored as null.
 */
export function importRecords(db: Database, input: ImportInput): ImportResult {
  const parsed = importInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ImportValidationError(parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const { rows } = parsed.data;
  const headerSource = parsed.data.headers ?? Array.from(new Set(rows.flatMap((row) => Object.keys(row))));
  const headers = new Set(headerSource.map(normalizeHeader));

  if (headerSource.length === 0) {
    throw new ImportValidationError(['no header row']);
  }

  const missingHeaders = REQUIRED_HEADERS.filter((header) => !headers.has(header));
  if (missingHeaders.length > 0) {
    throw new ImportValidationError([`missing required headers: ${missingHeaders.join(',')}`]);
  }

  const issues: string[] = [];
  let coerced = 0;
  const records: NewPropertyRecord[] = rows.map((row, index) => {
    const values = new Map(Object.entries(row).map(([key, value]) => [normalizeHeader(key), value]));
    const read = (field: string): string => values.get(field) ?? '';
    const optional = (field: string): string | null => read(field) || null;

    for (const field of ['address', 'city', 'state'] as const) {
      if (!read(field)) {
        issues.push(`row ${index + 1}: ${field} is empty`);
      }
    }

    const rawStage = read('stage').toUpperCase();
    const stage = coerceStage(rawStage);
    if (stage !== rawStage) {
      coerced += 1;
    }

    return {
      stage,
      apn: optional('apn'),
      address: read('address'),
      city: read('city'),
      state: read('state'),
      zip: optional('zip'),
      record_date: optional('record_date'),
      doc_type: optional('doc_type'),
      source_url: optional('source_url'),
    };
  });

  if (issues.length > 0) {
    throw new ImportValidationError(issues);
  }

  const itemIds = insertRecords(db, records);
  return {
    inserted: itemIds.length,
    coerced_to_other: coerced,
    item_ids: itemIds,
  };
}
