#!/usr/bin/env tsx
import { loadConfig } from '../src/config.js';
import { initializeStore, openStore } from '../src/db/schema.js';
import { resolveBatch } from '../src/pipeline/resolver.js';

const MAX_FLAG = '--max';

function parseArguments(argv: string[]): { maxItems?: number } {
  const result: { maxItems?: number } = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === MAX_FLAG) {
      const value = Number.parseInt(argv[index + 1] ?? '', 10);
      if (!Number.isFinite(value) || value < 1) {
        throw new Error(`Missing or invalid value for ${MAX_FLAG}`);
      }
      result.maxItems = value;
      index += 1;
      continue;
    }

    if (token === '--help' || token === '-h') {
      console.log(`Usage: npm run resolve -- [${MAX_FLAG} <count>]`);
      process.exit(0);
    }

    throw new Error(`Unknown argument: ${token}`);
  }

  return result;
}

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  const config = loadConfig();
  const db = openStore(config.dbPath);

  try {
    initializeStore(db, { seedPath: config.seedPath, defaults: config.defaults });
    const result = await resolveBatch(db, {
      maxItems: args.maxItems ?? config.resolverBatchSize,
      concurrency: config.resolverConcurrency,
      lookupUrlTemplate: config.lookupUrlTemplate,
      timeoutMs: config.lookupTimeoutMs,
      defaults: config.defaults,
    });

    console.log(
      `distress-tracker: processed=${result.processed} resolved=${result.resolvedCount} unresolved=${result.unresolvedCount}`,
    );
    for (const failure of result.failures) {
      console.log(`  item ${failure.item_id} (${failure.apn}): ${failure.kind} ${failure.message}`);
    }
  } finally {
    db.close();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`distress-tracker: resolve failed: ${message}`);
  process.exit(1);
});
