import type { Database } from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getRecord, recordLookupAttempt, recordResolution } from '../src/db/records.js';
import type { FetchLike } from '../src/http/request.js';
import { resolutionStatus, resolveBatch, type ResolveBatchOptions } from '../src/pipeline/resolver.js';
import {
  closeTrackerTestDatabase,
  createTrackerTestDatabase,
  locationPage,
  makeRecord,
  seedRecords,
  stubFetch,
  TEST_DEFAULTS,
  TEST_LOOKUP_TEMPLATE,
} from './fixtures/tracker-db.js';

const NOW = new Date('2025-04-01T12:00:00Z');

function options(fetchImpl: FetchLike, overrides: Partial<ResolveBatchOptions> = {}): ResolveBatchOptions {
  return {
    maxItems: 25,
    lookupUrlTemplate: TEST_LOOKUP_TEMPLATE,
    timeoutMs: 50,
    defaults: TEST_DEFAULTS,
    concurrency: 2,
    fetchImpl,
    now: () => NOW,
    ...overrides,
  };
}

function taxRecord(apn: string) {
  return makeRecord({ stage: 'TAX_DELINQUENCY', apn, address: 'Unknown address', doc_type: null, record_date: null });
}

describe('address resolver', () => {
  let db: Database;

  beforeEach(() => {
    db = createTrackerTestDatabase();
  });

  afterEach(() => {
    closeTrackerTestDatabase(db);
  });

  it('stores the normalized situs and lookup url on success', async () => {
    const [id] = seedRecords(db, [taxRecord('12-3456-78')]);
    const fetchImpl = stubFetch({
      'https://parcels.example.test/parcel/12345678': { body: locationPage('100 MAIN ST') },
    });

    const result = await resolveBatch(db, options(fetchImpl));

    expect(result).toEqual({ processed: 1, resolvedCount: 1, unresolvedCount: 0, failures: [] });
    expect(getRecord(db, id)).toMatchObject({
      resolved_situs: '100 MAIN ST, Winnemucca, NV 89445',
      assessor_url: 'https://parcels.example.test/parcel/12345678',
      resolved_at: '2025-04-01T12:00:00.000Z',
    });
  });

  it('leaves the situs empty when the location has no street number', async () => {
    const [id] = seedRecords(db, [taxRecord('55-1234-00')]);
    const fetchImpl = stubFetch({
      'https://parcels.example.test/parcel/55123400': { body: locationPage('ANYTOWN') },
    });

    const result = await resolveBatch(db, options(fetchImpl));

    expect(result.processed).toBe(1);
    expect(result.resolvedCount).toBe(0);
    expect(result.unresolvedCount).toBe(1);
    expect(result.failures).toEqual([
      {
        item_id: id,
        apn: '55-1234-00',
        kind: 'no_street_number',
        message: 'location "ANYTOWN" has no street number',
      },
    ]);

    const record = getRecord(db, id);
    expect(record?.resolved_situs).toBeNull();
    expect(record?.assessor_url).toBe('https://parcels.example.test/parcel/55123400');
    expect(record && resolutionStatus(record)).toBe('UNRESOLVED');
  });

  it.each(['WINNEMUCCA, NV 89445', 'PARCEL 55-1234-00', 'SEC 12 T36N R38E', '89445', '55-1234-00 MAIN ST'])(
    'keeps %s unresolved because it does not start with a house number',
    async (location) => {
      const [id] = seedRecords(db, [taxRecord('55-1234-00')]);
      const fetchImpl = stubFetch({
        'https://parcels.example.test/parcel/55123400': { body: locationPage(location) },
      });

      const result = await resolveBatch(db, options(fetchImpl));

      expect(result.resolvedCount).toBe(0);
      expect(result.failures.map((failure) => failure.kind)).toEqual(['no_street_number']);
      expect(getRecord(db, id)?.resolved_situs).toBeNull();
    },
  );

  it('does not read a location sub-label as the address', async () => {
    const [id] = seedRecords(db, [taxRecord('55-1234-00')]);
    const fetchImpl = stubFetch({
      'https://parcels.example.test/parcel/55123400': { body: '<div>Location Code: 0042</div>' },
    });

    const result = await resolveBatch(db, options(fetchImpl));

    expect(result.failures.map((failure) => failure.kind)).toEqual(['no_location']);
    expect(getRecord(db, id)?.resolved_situs).toBeNull();
  });

  it('never selects resolved records again', async () => {
    seedRecords(db, [taxRecord('12-3456-78')]);
    const fetchImpl = stubFetch({
      'https://parcels.example.test/parcel/12345678': { body: locationPage('100 MAIN ST') },
    });

    await resolveBatch(db, options(fetchImpl));
    const second = await resolveBatch(db, options(fetchImpl));

    expect(second).toEqual({ processed: 0, resolvedCount: 0, unresolvedCount: 0, failures: [] });
  });

  it('retries unresolved records on the next batch', async () => {
    const [id] = seedRecords(db, [taxRecord('55-1234-00')]);
    const failing = stubFetch({});
    await resolveBatch(db, options(failing));

    const succeeding = stubFetch({
      'https://parcels.example.test/parcel/55123400': { body: locationPage('7 Bridge St') },
    });
    const result = await resolveBatch(db, options(succeeding));

    expect(result.resolvedCount).toBe(1);
    expect(getRecord(db, id)?.resolved_situs).toBe('7 Bridge St, Winnemucca, NV 89445');
  });

  it('skips records without a parcel number', async () => {
    seedRecords(db, [makeRecord(), makeRecord({ apn: '   ' })]);
    const result = await resolveBatch(db, options(stubFetch({})));

    expect(result.processed).toBe(0);
  });

  it('honors the batch size in id order', async () => {
    const ids = seedRecords(db, [taxRecord('01-0001-01'), taxRecord('01-0002-02'), taxRecord('01-0003-03')]);
    const result = await resolveBatch(db, options(stubFetch({}), { maxItems: 2 }));

    expect(result.processed).toBe(2);
    expect(result.failures.map((failure) => failure.item_id)).toEqual([ids[0], ids[1]]);
    expect(getRecord(db, ids[2])?.resolved_at).toBeNull();
  });

  it('reports http status failures and keeps going', async () => {
    const [missing, found] = seedRecords(db, [taxRecord('01-0001-01'), taxRecord('01-0002-02')]);
    const fetchImpl = stubFetch({
      'https://parcels.example.test/parcel/01000101': { body: 'server error', status: 500 },
      'https://parcels.example.test/parcel/01000202': { body: locationPage('42 Elm St') },
    });

    const result = await resolveBatch(db, options(fetchImpl));

    expect(result.resolvedCount).toBe(1);
    expect(result.failures).toEqual([
      { item_id: missing, apn: '01-0001-01', kind: 'http_status', message: 'HTTP 500' },
    ]);
    expect(getRecord(db, found)?.resolved_situs).toBe('42 Elm St, Winnemucca, NV 89445');
  });

  it('times out slow lookups', async () => {
    const [id] = seedRecords(db, [taxRecord('01-0001-01')]);
    const hanging: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const result = await resolveBatch(db, options(hanging, { timeoutMs: 20 }));

    expect(result.failures).toEqual([
      { item_id: id, apn: '01-0001-01', kind: 'timeout', message: 'timed out after 20ms' },
    ]);
    expect(getRecord(db, id)?.resolved_at).toBe('2025-04-01T12:00:00.000Z');
  });

  it('reports a page without a location line', async () => {
    const [id] = seedRecords(db, [taxRecord('01-0001-01')]);
    const fetchImpl = stubFetch({
      'https://parcels.example.test/parcel/01000101': { body: '<p>Owner: Example Holdings</p>' },
    });

    const result = await resolveBatch(db, options(fetchImpl));

    expect(result.failures.map((failure) => failure.kind)).toEqual(['no_location']);
    expect(getRecord(db, id)?.assessor_url).toBe('https://parcels.example.test/parcel/01000101');
  });

  it('counts a record deleted mid-lookup as missing', async () => {
    const [id] = seedRecords(db, [taxRecord('01-0001-01')]);
    const pages = stubFetch({
      'https://parcels.example.test/parcel/01000101': { body: locationPage('9 Pine St') },
    });
    const fetchImpl: FetchLike = async (url, init) => {
      db.prepare('DELETE FROM items WHERE id = ?').run(id);
      return pages(url, init);
    };

    const result = await resolveBatch(db, options(fetchImpl));

    expect(result.resolvedCount).toBe(0);
    expect(result.failures.map((failure) => failure.kind)).toEqual(['missing']);
  });

  it('limits concurrent lookups', async () => {
    seedRecords(db, ['01', '02', '03', '04', '05'].map((n) => taxRecord(`01-00${n}-01`)));
    let active = 0;
    let peak = 0;
    const fetchImpl: FetchLike = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return new Response(locationPage('1 Main St'), { status: 200 });
    };

    const result = await resolveBatch(db, options(fetchImpl, { concurrency: 2 }));

    expect(result.resolvedCount).toBe(5);
    expect(peak).toBe(2);
  });
});

describe('resolution writes', () => {
  let db: Database;

  beforeEach(() => {
    db = createTrackerTestDatabase();
  });

  afterEach(() => {
    closeTrackerTestDatabase(db);
  });

  it('keeps an earlier situs when a later attempt fails', () => {
    const [id] = seedRecords(db, [taxRecord('01-0001-01')]);
    recordResolution(db, id, '1 Main St, Winnemucca, NV 89445', 'https://parcels.example.test/parcel/01000101', 'a');
    recordLookupAttempt(db, id, 'https://parcels.example.test/parcel/01000101', 'b');

    expect(getRecord(db, id)).toMatchObject({ resolved_situs: '1 Main St, Winnemucca, NV 89445', resolved_at: 'b' });
  });

  it('refuses an empty situs', () => {
    const [id] = seedRecords(db, [taxRecord('01-0001-01')]);
    expect(() => recordResolution(db, id, '  ', 'https://parcels.example.test/parcel/01000101', 'a')).toThrow(
      `refusing to store an empty situs for item ${id}`,
    );
  });

  it('returns false for a missing record', () => {
    expect(recordLookupAttempt(db, 404, 'https://parcels.example.test/parcel/1', 'a')).toBe(false);
  });

  it('derives resolution status', () => {
    const base = { resolved_situs: null, resolved_at: null, assessor_url: null };
    expect(resolutionStatus(base)).toBe('UNATTEMPTED');
    expect(resolutionStatus({ ...base, resolved_at: 'a' })).toBe('UNRESOLVED');
    expect(resolutionStatus({ ...base, resolved_situs: '1 Main St' })).toBe('RESOLVED');
  });
});
