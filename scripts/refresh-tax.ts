#!/usr/bin/env tsx
import fs from 'node:fs/promises';
import path from 'node:path';

import { loadConfig } from '../src/config.js';
import { initializeStore, openStore } from '../src/db/schema.js';
import { refreshTaxList } from '../src/pipeline/tax-list.js';

const DOCUMENT_URL_FLAG = '--document-url';
const TEXT_FILE_FLAG = '--text-file';

interface ParsedArgs {
  documentUrl?: string;
  textFile?: string;
}

function parseArguments(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === DOCUMENT_URL_FLAG || token === TEXT_FILE_FLAG) {
      const value = argv[index + 1];
      if (!value) {
        throw new Error(`Missing value for ${token}`);
      }
      if (token === DOCUMENT_URL_FLAG) {
        result.documentUrl = value;
      } else {
        result.textFile = value;
      }
      index += 1;
      continue;
    }

    if (token === '--help' || token === '-h') {
      printUsage();
      process.exit(0);
    }

    throw new Error(`Unknown argument: ${token}`);
  }

  return result;
}

function printUsage(): void {
  console.log('Usage: npm run refresh-tax -- [options]');
  console.log('');
  console.log('Options:');
  console.log(`  ${DOCUMENT_URL_FLAG} <url>   Fetch this list instead of discovering it`);
  console.log(`  ${TEXT_FILE_FLAG} <path>     Read parcel numbers from text already extracted from the list`);
  console.log('  --help, -h                Show this usage text');
}

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  const config = loadConfig();
  const documentText = args.textFile
    ? await fs.readFile(path.resolve(process.cwd(), args.textFile), 'utf8')
    : undefined;

  const db = openStore(config.dbPath);
  try {
    initializeStore(db, { seedPath: config.seedPath, defaults: config.defaults });
    const result = await refreshTaxList(db, {
      pageUrl: config.taxListPageUrl,
      fallbackUrl: config.taxListFallbackUrl,
      documentUrl: args.documentUrl,
      documentText,
      timeoutMs: config.documentTimeoutMs,
      defaults: config.defaults,
      sourceUrl: args.documentUrl ?? null,
    });

    if (!result.ok) {
      console.error(`distress-tracker: tax list unchanged (${result.error.reason}): ${result.error.message}`);
      process.exitCode = 1;
      return;
    }

    const summary = result.value;
    console.log(
      `distress-tracker: tax list replaced from ${summary.source_url ?? 'supplied text'} parcels=${summary.parcels} deleted=${summary.deleted} inserted=${summary.inserted}`,
    );
  } finally {
    db.close();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`distress-tracker: refresh-tax failed: ${message}`);
  process.exit(1);
});
