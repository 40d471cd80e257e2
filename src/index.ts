#!/usr/bin/env node

import type { Database } from 'better-sqlite3';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig, type TrackerConfig } from './config.js';
import { initializeStore, openStore } from './db/schema.js';
import { callTool, TOOLS } from './tools/shared-tools.js';
import type { ToolContext } from './tools/tracker-utils.js';

const SERVER_NAME = 'property-distress-tracker';
const SERVER_VERSION = '0.1.0';

let dbInstance: Database | null = null;

function openContext(config: TrackerConfig): ToolContext {
  const db = openStore(config.dbPath);
  dbInstance = db;

  const init = initializeStore(db, { seedPath: config.seedPath, defaults: config.defaults });
  if (init.migrated_columns.length > 0) {
    console.error(`[${SERVER_NAME}] Added columns: ${init.migrated_columns.join(', ')}`);
  }
  if (init.seeded > 0) {
    console.error(`[${SERVER_NAME}] Seeded ${init.seeded} example tax records`);
  }

  return { db, config };
}

function closeDb(): void {
  if (!dbInstance) {
    return;
  }
  dbInstance.close();
  dbInstance = null;
}

function createServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = await callTool(context, name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[${SERVER_NAME}] ${name} failed: ${message}`);
      return {
        content: [
          {
            type: 'text',
            text: `Error executing ${name}: ${message}`,
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const context = openContext(config);
  const server = createServer(context);
  const transport = new StdioServerTransport();

  process.on('SIGINT', () => {
    closeDb();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    closeDb();
    process.exit(0);
  });

  await server.connect(transport);
  console.error(`[${SERVER_NAME}] Listening on stdio (store: ${config.dbPath})`);
}

main().catch((error) => {
  console.error(`[${SERVER_NAME}] Fatal error:`, error);
  closeDb();
  process.exit(1);
});
