import type { Database } from 'better-sqlite3';

import { coerceStage, type NewPropertyRecord, type PropertyRecord, type Stage } from './types.js';

interface ItemRow {
  id: number;
  stage: string;
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

type InsertParams = [
  Stage,
  string | null,
  string,
  string,
  string,
  string | null,
  string | null,
  string | null,
  string | null,
  string | null,
  string | null,
  string | null,
];

const ITEM_COLUMNS =
  'id, stage, apn, address, city, state, zip, record_date, doc_type, source_url, assessor_url, resolved_situs, resolved_at';

const INSERT_ITEM_SQL = `
  INSERT INTO items (
    stage,
    apn,
    address,
    city,
    state,
    zip,
    record_date,
    doc_type,
    source_url,
    assessor_url,
    resolved_situs,
    resolved_at
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

function toRecord(row: ItemRow): PropertyRecord {
  return {
    ...row,
    stage: coerceStage(row.stage),
  };
}

function insertParams(record: NewPropertyRecord): InsertParams {
  return [
    record.stage,
    record.apn,
    record.address,
    record.city,
    record.state,
    record.zip,
    record.record_date,
    record.doc_type,
    record.source_url,
    record.assessor_url ?? null,
    record.resolved_situs ?? null,
    record.resolved_at ?? null,
  ];
}

/** Current records in presentation order. */
export function listRecords(db: Database): PropertyRecord[] {
  return db
    .prepare<[], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items ORDER BY stage, city, address, id`)
    .all()
    .map(toRecord);
}

export function getRecord(db: Database, id: number): PropertyRecord | null {
  const row = db.prepare<[number], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE id = ?`).get(id);
  return row ? toRecord(row) : null;
}

/** Inserts all records in one transaction and returns their new ids. */
export function insertRecords(db: Database, records: NewPropertyRecord[]): number[] {
  const statement = db.prepare<InsertParams>(INSERT_ITEM_SQL);
  const insertAll = db.transaction((batch: NewPropertyRecord[]) =>
    batch.map((record) => Number(statement.run(...insertParams(record)).lastInsertRowid)),
  );
  return insertAll(records);
}

/**
 * Removes every record of the given stage and inserts the replacements under
 * that stage, as one unit of work.
 */
export function replaceStageRecords(
  db: Database,
  stage: Stage,
  records: NewPropertyRecord[],
): { deleted: number; inserted: number } {
  const remove = db.prepare<[Stage]>('DELETE FROM items WHERE stage = ?');
  const insert = db.prepare<InsertParams>(INSERT_ITEM_SQL);

  const replace = db.transaction(() => {
    const deleted = remove.run(stage).changes;
    for (const record of records) {
      insert.run(...insertParams({ ...record, stage }));
    }
    return { deleted, inserted: records.length };
  });

  return replace();
}

/** Records the resolver should attempt: a parcel number and no resolved situs yet. */
export function selectUnresolved(db: Database, limit: number): PropertyRecord[] {
  return db
    .prepare<[number], ItemRow>(
      `
      SELECT ${ITEM_COLUMNS}
      FROM items
      WHERE COALESCE(TRIM(apn), '') <> ''
        AND COALESCE(TRIM(resolved_situs), '') = ''
      ORDER BY id ASC
      LIMIT ?
    `,
    )
    .all(limit)
    .map(toRecord);
}

/**
 * Stores a lookup attempt that produced no usable address. The resolved situs
 * column is not part of this statement, so an earlier success survives.
 * Returns false when the record no longer exists.
 */
export function recordLookupAttempt(db: Database, id: number, assessorUrl: string, attemptedAt: string): boolean {
  const result = db
    .prepare<[string, string, number]>('UPDATE items SET assessor_url = ?, resolved_at = ? WHERE id = ?')
    .run(assessorUrl, attemptedAt, id);
  return result.changes > 0;
}

export function recordResolution(
  db: Database,
  id: number,
  situs: string,
  assessorUrl: string,
  resolvedAt: string,
): boolean {
  const value = situs.trim();
  if (!value) {
    throw new Error(`refusing to store an empty situs for item ${id}`);
  }

  const result = db
    .prepare<[string, string, string, number]>(
      'UPDATE items SET resolved_situs = ?, assessor_url = ?, resolved_at = ? WHERE id = ?',
    )
    .run(value, assessorUrl, resolvedAt, id);
  return result.changes > 0;
}
