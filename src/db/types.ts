export const STAGES = [
  'PRE_FORECLOSURE',
  'FORECLOSURE_SALE',
  'REO',
  'TAX_DELINQUENCY',
  'OTHER',
] as const;

export type Stage = (typeof STAGES)[number];

export const STAGE_LABELS: Record<Stage, string> = {
  PRE_FORECLOSURE: 'Pre-Foreclosure',
  FORECLOSURE_SALE: 'Foreclosure / Sale',
  REO: 'REO / Bank-Owned',
  TAX_DELINQUENCY: 'Tax Delinquency',
  OTHER: 'Other',
};

export const UNKNOWN_ADDRESS = 'Unknown address';

export interface PropertyRecord {
  id: number;
  stage: Stage;
  apn: string | null;
  address: string;
  city: string;
  state: string;
  zip: string | null;
  record_date: string | null;
  doc_type: string | null;
  source_url: string | null;
  assessor_url: string | null;
  resolved_situs: string | null;
  resolved_at: string | null;
}

/** A record before the store has assigned it an id. */
export type NewPropertyRecord = Omit<PropertyRecord, 'id' | 'assessor_url' | 'resolved_situs' | 'resolved_at'> &
  Partial<Pick<PropertyRecord, 'assessor_url' | 'resolved_situs' | 'resolved_at'>>;

export interface RunRecord {
  id: number;
  created_at: string;
}

export interface SnapshotEntry {
  run_id: number;
  item_id: number;
  key: string;
  hash: string;
}

export interface LocationDefaults {
  city: string;
  state: string;
  zip: string;
}

export interface TaxExampleSeed {
  stage?: string;
  apn?: string | null;
  address?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
  record_date?: string | null;
  doc_type?: string | null;
  source_url?: string | null;
}

export function isStage(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

export function coerceStage(value: string | null | undefined): Stage {
  const upper = (value ?? '').trim().toUpperCase();
  return isStage(upper) ? upper : 'OTHER';
}
