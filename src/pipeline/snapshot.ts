import type { Database } from 'better-sqlite3';

import { listRecords } from '../db/records.js';
import type { RunRecord, SnapshotEntry } from '../db/types.js';
import { deriveFingerprint, deriveKey } from './identity.js';

export interface CreateRunOptions {
  now?: Date;
}

/**
 * Records a new run and captures the key and fingerprint of every current
 * record under it. The run and its entries commit together; an empty store
 * still yields a run.
 */
export function createRun(db: Database, options: CreateRunOptions = {}): number {
  const insertRun = db.prepare<[string]>('INSERT INTO runs (created_at) VALUES (?)');
  const insertEntry = db.prepare<[number, number, string, string]>(
    'INSERT INTO snapshots (run_id, item_id, key, hash) VALUES (?, ?, ?, ?)',
  );

  const snapshot = db.transaction((createdAt: string) => {
    const runId = Number(insertRun.run(createdAt).lastInsertRowid);
    for (const record of listRecords(db)) {
      insertEntry.run(runId, record.id, deriveKey(record), deriveFingerprint(record));
    }
    return runId;
  });

  return snapshot((options.now ?? new Date()).toISOString());
}

/** Most recent runs first. */
export function listRecentRuns(db: Database, limit = 2): RunRecord[] {
  return db
    .prepare<[number], RunRecord>('SELECT id, created_at FROM runs ORDER BY id DESC LIMIT ?')
    .all(Math.max(1, Math.floor(limit)));
}

export function getRun(db: Database, runId: number): RunRecord | null {
  return db.prepare<[number], RunRecord>('SELECT id, created_at FROM runs WHERE id = ?').get(runId) ?? null;
}

export function readSnapshot(db: Database, runId: number): SnapshotEntry[] {
  return db
    .prepare<[number], SnapshotEntry>(
      'SELECT run_id, item_id, key, hash FROM snapshots WHERE run_id = ? ORDER BY item_id ASC',
    )
    .all(runId);
}

export function countSnapshotEntries(db: Database, runId: number): number {
  return (
    db.prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM snapshots WHERE run_id = ?').get(runId)
      ?.count ?? 0
  );
}
