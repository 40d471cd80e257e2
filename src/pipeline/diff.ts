import type { Database } from 'better-sqlite3';

import { listRecords } from '../db/records.js';
import type { PropertyRecord, RunRecord, SnapshotEntry } from '../db/types.js';
import { getRun, listRecentRuns, readSnapshot } from './snapshot.js';

export const CHANGE_LABELS = ['NEW', 'REMOVED', 'UPDATED', 'UNCHANGED'] as const;

export type ChangeLabel = (typeof CHANGE_LABELS)[number];

export type ChangeSummary = Record<ChangeLabel, number>;

export interface RemovedEntry {
  item_id: number;
  key: string;
}

/**
 * Two or more records of one run that derived the same key. The entry with the
 * highest item id is the one compared; the others are shadowed and receive no
 * classification.
 */
export interface KeyCollision {
  run_id: number;
  key: string;
  kept_item_id: number;
  shadowed_item_ids: number[];
}

export interface ChangeReport {
  latest_run: RunRecord | null;
  previous_run: RunRecord | null;
  records: PropertyRecord[];
  changes: Record<number, ChangeLabel>;
  summary: ChangeSummary;
  removed: RemovedEntry[];
  collisions: KeyCollision[];
}

interface KeyedEntry {
  hash: string;
  item_id: number;
}

export function emptySummary(): ChangeSummary {
  return {
    NEW: 0,
    REMOVED: 0,
    UPDATED: 0,
    UNCHANGED: 0,
  };
}

function indexByKey(entries: SnapshotEntry[], collisions: KeyCollision[]): Map<string, KeyedEntry> {
  const map = new Map<string, KeyedEntry>();
  const shadowed = new Map<string, number[]>();

  for (const entry of entries) {
    const previous = map.get(entry.key);
    if (previous) {
      const list = shadowed.get(entry.key) ?? [];
      list.push(previous.item_id);
      shadowed.set(entry.key, list);
    }
    map.set(entry.key, { hash: entry.hash, item_id: entry.item_id });
  }

  for (const [key, itemIds] of shadowed) {
    const kept = map.get(key);
    if (kept && entries.length > 0) {
      collisions.push({
        run_id: entries[0].run_id,
        key,
        kept_item_id: kept.item_id,
        shadowed_item_ids: itemIds,
      });
    }
  }

  return map;
}

/**
 * Classifies every key of the two runs. Both snapshots and the live records are
 * read in one transaction, so the report reflects a single point in time.
 */
export function diffRuns(db: Database, newRunId: number, oldRunId: number | null): ChangeReport {
  const read = db.transaction(() => ({
    latest: getRun(db, newRunId),
    previous: oldRunId === null ? null : getRun(db, oldRunId),
    newEntries: readSnapshot(db, newRunId),
    oldEntries: oldRunId === null ? [] : readSnapshot(db, oldRunId),
    records: listRecords(db),
  }));
  const { latest, previous, newEntries, oldEntries, records } = read();

  if (!latest) {
    throw new Error(`Run ${newRunId} does not exist`);
  }
  if (oldRunId !== null && !previous) {
    throw new Error(`Run ${oldRunId} does not exist`);
  }

  const collisions: KeyCollision[] = [];
  const newMap = indexByKey(newEntries, collisions);
  const oldMap = indexByKey(oldEntries, collisions);

  const changes: Record<number, ChangeLabel> = {};
  const summary = emptySummary();
  const removed: RemovedEntry[] = [];

  for (const [key, oldEntry] of oldMap) {
    if (!newMap.has(key)) {
      removed.push({ item_id: oldEntry.item_id, key });
      changes[oldEntry.item_id] = 'REMOVED';
      summary.REMOVED += 1;
    }
  }

  // Live classifications take precedence when a record's key moved between runs.
  for (const [key, newEntry] of newMap) {
    const oldEntry = oldMap.get(key);
    let label: ChangeLabel;
    if (!oldEntry) {
      label = 'NEW';
    } else {
      label = oldEntry.hash === newEntry.hash ? 'UNCHANGED' : 'UPDATED';
    }
    changes[newEntry.item_id] = label;
    summary[label] += 1;
  }

  if (collisions.length > 0) {
    console.error(
      `distress-tracker: ${collisions.length} duplicate record key(s) while comparing run ${newRunId} with ${oldRunId ?? 'none'}; later items shadow earlier ones`,
    );
  }

  return {
    latest_run: latest,
    previous_run: previous,
    records,
    changes,
    summary,
    removed,
    collisions,
  };
}

/** Compares the latest run with the one before it. */
export function getLatestChanges(db: Database): ChangeReport {
  const [latest, previous] = listRecentRuns(db, 2);

  if (!latest) {
    return {
      latest_run: null,
      previous_run: null,
      records: listRecords(db),
      changes: {},
      summary: emptySummary(),
      removed: [],
      collisions: [],
    };
  }

  return diffRuns(db, latest.id, previous ? previous.id : null);
}
