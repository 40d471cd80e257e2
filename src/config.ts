import path from 'node:path';

import { z } from 'zod';

import type { LocationDefaults } from './db/types.js';

const positiveInt = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((value) => Math.max(1, Number.parseInt(value, 10) || fallback));

const schema = z.object({
  DISTRESS_TRACKER_DB_PATH: z.string().default('data/tracker.db'),
  DISTRESS_TRACKER_SEED_PATH: z.string().default('data/seed/tax-examples.json'),
  PARCEL_LOOKUP_URL_TEMPLATE: z
    .string()
    .default('https://humboldtcountynv.devnetwedge.com/parcel/view/{apn}')
    .refine((value) => value.includes('{apn}'), 'must contain the {apn} placeholder'),
  TAX_LIST_PAGE_URL: z.string().url().default('https://www.humboldtcountynv.gov/213/Parcel-List'),
  TAX_LIST_FALLBACK_URL: z
    .string()
    .url()
    .default('https://www.humboldtcountynv.gov/DocumentCenter/View/8026/2025-Delinquent-Sale-Parcel-List'),
  DEFAULT_CITY: z.string().min(1).default('Winnemucca'),
  DEFAULT_STATE: z.string().min(2).default('NV'),
  DEFAULT_ZIP: z.string().regex(/^\d{5}$/).default('89445'),
  LOOKUP_TIMEOUT_MS: positiveInt(15_000),
  DOCUMENT_TIMEOUT_MS: positiveInt(30_000),
  RESOLVER_BATCH_SIZE: positiveInt(25),
  RESOLVER_CONCURRENCY: positiveInt(3),
});

export interface TrackerConfig {
  dbPath: string;
  seedPath: string;
  lookupUrlTemplate: string;
  taxListPageUrl: string;
  taxListFallbackUrl: string;
  defaults: LocationDefaults;
  lookupTimeoutMs: number;
  documentTimeoutMs: number;
  resolverBatchSize: number;
  resolverConcurrency: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(', ')}`);
    this.name = 'ConfigError';
  }
}

/** Reads settings from the environment. Messages name the variable, never its value. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  return {
    dbPath:
      values.DISTRESS_TRACKER_DB_PATH === ':memory:'
        ? values.DISTRESS_TRACKER_DB_PATH
        : path.resolve(process.cwd(), values.DISTRESS_TRACKER_DB_PATH),
    seedPath: path.resolve(process.cwd(), values.DISTRESS_TRACKER_SEED_PATH),
    lookupUrlTemplate: values.PARCEL_LOOKUP_URL_TEMPLATE,
    taxListPageUrl: values.TAX_LIST_PAGE_URL,
    taxListFallbackUrl: values.TAX_LIST_FALLBACK_URL,
    defaults: {
      city: values.DEFAULT_CITY,
      state: values.DEFAULT_STATE,
      zip: values.DEFAULT_ZIP,
    },
    lookupTimeoutMs: values.LOOKUP_TIMEOUT_MS,
    documentTimeoutMs: values.DOCUMENT_TIMEOUT_MS,
    resolverBatchSize: values.RESOLVER_BATCH_SIZE,
    resolverConcurrency: values.RESOLVER_CONCURRENCY,
  };
}
