#!/usr/bin/env tsx
import { loadConfig } from '../src/config.js';
import { initializeStore, openStore, resetStore, summarizeStore } from '../src/db/schema.js';

const RESET_FLAG = '--reset';

function parseArguments(argv: string[]): { reset: boolean } {
  let reset = false;

  for (const token of argv) {
    if (token === RESET_FLAG) {
      reset = true;
      continue;
    }

    if (token === '--help' || token === '-h') {
      console.log('Usage: npm run init-db -- [--reset]');
      console.log('');
      console.log(`  ${RESET_FLAG}    Delete every record, run and snapshot before reseeding`);
      process.exit(0);
    }

    throw new Error(`Unknown argument: ${token}`);
  }

  return { reset };
}

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  const config = loadConfig();
  const db = openStore(config.dbPath);

  try {
    const options = { seedPath: config.seedPath, defaults: config.defaults };
    const result = args.reset ? resetStore(db, options) : initializeStore(db, options);
    const summary = summarizeStore(db);

    console.log(`distress-tracker: store ready at ${config.dbPath}`);
    if (result.migrated_columns.length > 0) {
      console.log(`distress-tracker: added columns ${result.migrated_columns.join(', ')}`);
    }
    console.log(`distress-tracker: seeded ${result.seeded} example tax records from ${config.seedPath}`);
    console.log(
      `items=${summary.items} runs=${summary.runs} snapshot_entries=${summary.snapshot_entries} resolved=${summary.resolved} awaiting_resolution=${summary.awaiting_resolution}`,
    );
  } finally {
    db.close();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`distress-tracker: init-db failed: ${message}`);
  process.exit(1);
});
