import type { Database } from 'better-sqlite3';
import pLimit from 'p-limit';

import { recordLookupAttempt, recordResolution, selectUnresolved } from '../db/records.js';
import type { LocationDefaults, PropertyRecord } from '../db/types.js';
import type { FetchLike } from '../http/request.js';
import { lookupSitus, type LookupFailureKind } from './parcel-lookup.js';

export type ResolutionStatus = 'UNATTEMPTED' | 'RESOLVED' | 'UNRESOLVED';

export interface ResolveBatchOptions {
  maxItems: number;
  lookupUrlTemplate: string;
  timeoutMs: number;
  defaults: LocationDefaults;
  concurrency?: number;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

export interface ResolveFailure {
  item_id: number;
  apn: string;
  kind: LookupFailureKind | 'missing' | 'internal';
  message: string;
}

export interface ResolveBatchResult {
  processed: number;
  resolvedCount: number;
  unresolvedCount: number;
  failures: ResolveFailure[];
}

type ItemOutcome = { resolved: true } | { resolved: false; failure: ResolveFailure };

export function resolutionStatus(record: Pick<PropertyRecord, 'resolved_situs' | 'resolved_at' | 'assessor_url'>): ResolutionStatus {
  if (record.resolved_situs?.trim()) {
    return 'RESOLVED';
  }
  if (record.resolved_at || record.assessor_url) {
    return 'UNRESOLVED';
  }
  return 'UNATTEMPTED';
}

/**
 * Looks up street addresses for parcel-only records. Only records without a
 * resolved situs are selected, so resolved records are never touched and
 * failed ones are retried on the next batch. A failing item never stops the
 * others.
 */
export async function resolveBatch(db: Database, options: ResolveBatchOptions): Promise<ResolveBatchResult> {
  const maxItems = Math.max(0, Math.floor(options.maxItems));
  const records = maxItems > 0 ? selectUnresolved(db, maxItems) : [];
  const limit = pLimit(Math.max(1, options.concurrency ?? 1));

  const outcomes = await Promise.all(records.map((record) => limit(() => resolveOne(db, record, options))));

  const failures = outcomes.flatMap((outcome) => (outcome.resolved ? [] : [outcome.failure]));
  return {
    processed: records.length,
    resolvedCount: outcomes.length - failures.length,
    unresolvedCount: failures.length,
    failures,
  };
}

async function resolveOne(db: Database, record: PropertyRecord, options: ResolveBatchOptions): Promise<ItemOutcome> {
  const apn = record.apn ?? '';
  const now = () => (options.now ?? (() => new Date()))().toISOString();

  try {
    const result = await lookupSitus(apn, {
      urlTemplate: options.lookupUrlTemplate,
      timeoutMs: options.timeoutMs,
      defaults: options.defaults,
      fetchImpl: options.fetchImpl,
    });

    if (result.ok) {
      const written = recordResolution(db, record.id, result.value.situs, result.value.lookupUrl, now());
      return written ? { resolved: true } : missing(record, apn);
    }

    const written = recordLookupAttempt(db, record.id, result.error.lookupUrl, now());
    if (!written) {
      return missing(record, apn);
    }
    return {
      resolved: false,
      failure: { item_id: record.id, apn, kind: result.error.kind, message: result.error.message },
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`distress-tracker: resolving item ${record.id} (${apn}) failed: ${message}`);
    return { resolved: false, failure: { item_id: record.id, apn, kind: 'internal', message } };
  }
}

function missing(record: PropertyRecord, apn: string): ItemOutcome {
  return {
    resolved: false,
    failure: { item_id: record.id, apn, kind: 'missing', message: 'record was removed before the result was written' },
  };
}
