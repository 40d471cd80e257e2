#!/usr/bin/env tsx
/**
 * Records a run of the current store and prints what changed since the
 * previous one.
 */
import { loadConfig } from '../src/config.js';
import { initializeStore, openStore } from '../src/db/schema.js';
import { getLatestChanges } from '../src/pipeline/diff.js';
import { createRun } from '../src/pipeline/snapshot.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const db = openStore(config.dbPath);

  try {
    initializeStore(db, { seedPath: config.seedPath, defaults: config.defaults });
    const runId = createRun(db);
    const report = getLatestChanges(db);
    const { summary } = report;

    console.log(`distress-tracker: run ${runId} recorded ${report.records.length} records`);
    console.log(
      `previous=${report.previous_run?.id ?? 'none'} new=${summary.NEW} updated=${summary.UPDATED} unchanged=${summary.UNCHANGED} removed=${summary.REMOVED}`,
    );
    for (const collision of report.collisions) {
      console.log(
        `duplicate key in run ${collision.run_id}: ${collision.key} (kept item ${collision.kept_item_id}, shadowed ${collision.shadowed_item_ids.join(', ')})`,
      );
    }
  } finally {
    db.close();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`distress-tracker: snapshot failed: ${message}`);
  process.exit(1);
});
