import type { Database } from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getRecord, listRecords } from '../src/db/records.js';
import { importRecords, ImportValidationError } from '../src/pipeline/import.js';
import { closeTrackerTestDatabase, createTrackerTestDatabase } from './fixtures/tracker-db.js';

describe('spreadsheet import', () => {
  let db: Database;

  beforeEach(() => {
    db = createTrackerTestDatabase();
  });

  afterEach(() => {
    closeTrackerTestDatabase(db);
  });

  it('inserts rows with normalized headers and blank optionals as null', () => {
    const result = importRecords(db, {
      rows: [
        { Stage: 'reo', Address: ' 12 Elm St ', City: 'Winnemucca', State: 'NV', Zip: 89445, APN: '' },
        { stage: 'PRE_FORECLOSURE', address: '3 Oak Ave', city: 'Winnemucca', state: 'NV', record_date: '2025-02-01' },
      ],
    });

    expect(result.inserted).toBe(2);
    expect(result.coerced_to_other).toBe(0);
    expect(getRecord(db, result.item_ids[0])).toMatchObject({
      stage: 'REO',
      address: '12 Elm St',
      zip: '89445',
      apn: null,
      record_date: null,
    });
    expect(getRecord(db, result.item_ids[1])).toMatchObject({ stage: 'PRE_FORECLOSURE', record_date: '2025-02-01' });
  });

  it('coerces unknown stages to OTHER', () => {
    const result = importRecords(db, {
      rows: [{ stage: 'auction', address: '1 A St', city: 'Winnemucca', state: 'NV' }],
    });

    expect(result.coerced_to_other).toBe(1);
    expect(getRecord(db, result.item_ids[0])?.stage).toBe('OTHER');
  });

  it('rejects missing required headers', () => {
    expect(() =>
      importRecords(db, { headers: ['stage', 'address'], rows: [{ stage: 'REO', address: '1 A St' }] }),
    ).toThrow('Import rejected: missing required headers: city,state');
  });

  it('rejects an input without headers', () => {
    expect(() => importRecords(db, { rows: [] })).toThrow(ImportValidationError);
  });

  it('validates every row before writing any', () => {
    let caught: unknown;
    try {
      importRecords(db, {
        rows: [
          { stage: 'REO', address: '1 A St', city: 'Winnemucca', state: 'NV' },
          { stage: 'REO', address: '', city: 'Winnemucca', state: '' },
        ],
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ImportValidationError);
    expect(caught instanceof ImportValidationError && caught.issues).toEqual([
      'row 2: address is empty',
      'row 2: state is empty',
    ]);
    expect(listRecords(db)).toEqual([]);
  });
});
