import type { PropertyRecord } from '../db/types.js';

/** Separates fingerprint fields; normalization turns every control character into a space. */
export const FINGERPRINT_DELIMITER = '\u001f';

export type IdentityFields = Pick<PropertyRecord, 'stage' | 'apn' | 'address' | 'city'>;

export type TrackedFields = Pick<
  PropertyRecord,
  | 'stage'
  | 'apn'
  | 'address'
  | 'city'
  | 'state'
  | 'zip'
  | 'record_date'
  | 'doc_type'
  | 'source_url'
  | 'assessor_url'
  | 'resolved_situs'
>;

export const TRACKED_FIELDS = [
  'stage',
  'apn',
  'address',
  'city',
  'state',
  'zip',
  'record_date',
  'doc_type',
  'source_url',
  'assessor_url',
  'resolved_situs',
] as const satisfies ReadonlyArray<keyof TrackedFields>;

export function normalizeText(value: string | null | undefined): string {
  if (!value) {
    return '';
  }

  return value
    .replace(/[\u0000-\u001f\u007f]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/**
 * Stable identity of a record across runs. The parcel number wins when present;
 * otherwise the postal address and city stand in for it.
 */
export function deriveKey(record: IdentityFields): string {
  const stage = normalizeText(record.stage);
  const apn = normalizeText(record.apn);

  if (apn) {
    return `${stage}|apn:${apn}`;
  }

  return `${stage}|addr:${normalizeText(record.address)}|${normalizeText(record.city)}`;
}

export function deriveFingerprint(record: TrackedFields): string {
  return TRACKED_FIELDS.map((field) => normalizeText(record[field])).join(FINGERPRINT_DELIMITER);
}
