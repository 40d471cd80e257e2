import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';

import { insertRecords } from './records.js';
import {
  coerceStage,
  UNKNOWN_ADDRESS,
  type LocationDefaults,
  type NewPropertyRecord,
  type TaxExampleSeed,
} from './types.js';

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  stage TEXT NOT NULL,
  apn TEXT,
  address TEXT NOT NULL,
  city TEXT NOT NULL,
  state TEXT NOT NULL,
  zip TEXT,
  record_date TEXT,
  doc_type TEXT,
  source_url TEXT,
  assessor_url TEXT,
  resolved_situs TEXT,
  resolved_at TEXT
);

CREATE TABLE IF NOT EXISTS snapshots (
  run_id INTEGER NOT NULL,
  item_id INTEGER NOT NULL,
  key TEXT NOT NULL,
  hash TEXT NOT NULL,
  PRIMARY KEY (run_id, item_id),
  FOREIGN KEY (run_id) REFERENCES runs(id)
);

CREATE INDEX IF NOT EXISTS idx_snapshots_run ON snapshots(run_id);
CREATE INDEX IF NOT EXISTS idx_items_stage ON items(stage);
`;

// Columns added after the first release; older files are upgraded in place.
const LATE_ITEM_COLUMNS = ['assessor_url', 'resolved_situs', 'resolved_at'] as const;

export interface InitializeStoreOptions {
  seedPath?: string;
  defaults: LocationDefaults;
}

export interface InitializeStoreResult {
  migrated_columns: string[];
  seeded: number;
}

export interface StoreSummary {
  items: number;
  runs: number;
  snapshot_entries: number;
  by_stage: Record<string, number>;
  resolved: number;
  awaiting_resolution: number;
}

export function openStore(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

/**
 * Creates the schema, upgrades older item tables and loads the example tax
 * records the first time the store has none. Safe to call on every start.
 */
export function initializeStore(db: SqliteDatabase, options: InitializeStoreOptions): InitializeStoreResult {
  db.exec(SCHEMA_SQL);
  const migrated = migrateItemColumns(db);
  const seeded = options.seedPath ? seedTaxExamplesOnce(db, options.seedPath, options.defaults) : 0;

  return {
    migrated_columns: migrated,
    seeded,
  };
}

function migrateItemColumns(db: SqliteDatabase): string[] {
  const existing = new Set(
    db
      .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('items')`)
      .all()
      .map((column) => column.name),
  );

  const added: string[] = [];
  for (const column of LATE_ITEM_COLUMNS) {
    if (!existing.has(column)) {
      db.exec(`ALTER TABLE items ADD COLUMN ${column} TEXT`);
      added.push(column);
    }
  }
  return added;
}

export function seedTaxExamplesOnce(db: SqliteDatabase, seedPath: string, defaults: LocationDefaults): number {
  const existing = db
    .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM items WHERE stage = 'TAX_DELINQUENCY'`)
    .get();
  if (existing && existing.count > 0) {
    return 0;
  }

  if (!fs.existsSync(seedPath)) {
    return 0;
  }

  const seed = validateSeed(JSON.parse(fs.readFileSync(seedPath, 'utf8')));
  const records = seed.map((entry) => seedToRecord(entry, defaults));
  insertRecords(db, records);
  return records.length;
}

function validateSeed(value: unknown): TaxExampleSeed[] {
  if (!Array.isArray(value)) {
    throw new Error('Seed file must be a JSON array of records');
  }

  const entries: unknown[] = value;
  return entries.map((entry, index) => {
    if (!entry || typeof entry !== 'object' || Array.isArray(entry)) {
      throw new Error(`Seed entry ${index} must be an object`);
    }
    const seed: TaxExampleSeed = {};
    for (const field of ['stage', 'apn', 'address', 'city', 'state', 'zip', 'record_date', 'doc_type', 'source_url'] as const) {
      const fieldValue: unknown = Reflect.get(entry, field);
      if (typeof fieldValue === 'string') {
        seed[field] = fieldValue;
      } else if (fieldValue !== undefined && fieldValue !== null) {
        throw new Error(`Seed entry ${index}: ${field} must be a string`);
      }
    }
    return seed;
  });
}

function seedToRecord(entry: TaxExampleSeed, defaults: LocationDefaults): NewPropertyRecord {
  return {
    stage: entry.stage ? coerceStage(entry.stage) : 'TAX_DELINQUENCY',
    apn: entry.apn || null,
    address: entry.address || UNKNOWN_ADDRESS,
    city: entry.city || defaults.city,
    state: entry.state || defaults.state,
    zip: entry.zip || null,
    record_date: entry.record_date || null,
    doc_type: entry.doc_type || null,
    source_url: entry.source_url || null,
  };
}

/** Wipes items, runs and snapshots, then re-runs initialization (including the seed). */
export function resetStore(db: SqliteDatabase, options: InitializeStoreOptions): InitializeStoreResult {
  const wipe = db.transaction(() => {
    db.exec(`
      DELETE FROM snapshots;
      DELETE FROM runs;
      DELETE FROM items;
    `);
  });
  wipe();
  return initializeStore(db, options);
}

export function summarizeStore(db: SqliteDatabase): StoreSummary {
  const count = (sql: string): number => db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

  const byStage: Record<string, number> = {};
  for (const row of db
    .prepare<[], { stage: string; count: number }>('SELECT stage, COUNT(*) AS count FROM items GROUP BY stage ORDER BY stage')
    .all()) {
    byStage[row.stage] = row.count;
  }

  return {
    items: count('SELECT COUNT(*) AS count FROM items'),
    runs: count('SELECT COUNT(*) AS count FROM runs'),
    snapshot_entries: count('SELECT COUNT(*) AS count FROM snapshots'),
    by_stage: byStage,
    resolved: count(`SELECT COUNT(*) AS count FROM items WHERE COALESCE(TRIM(resolved_situs), '') <> ''`),
    awaiting_resolution: count(
      `SELECT COUNT(*) AS count FROM items WHERE COALESCE(TRIM(apn), '') <> '' AND COALESCE(TRIM(resolved_situs), '') = ''`,
    ),
  };
}
