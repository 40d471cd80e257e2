/**
 * Tool definitions and call dispatcher shared by the stdio server and the
 * contract tests.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';

import { CHANGE_LABELS } from '../pipeline/diff.js';
import { STAGES } from '../db/types.js';
import { about } from './about.js';
import { createRunInputSchema, createRunTool } from './create-run.js';
import { getChanges, getChangesInputSchema } from './get-changes.js';
import { getRecordLinks, getRecordLinksInputSchema } from './get-record-links.js';
import { importRecordsInputSchema, importRecordsTool } from './import-records.js';
import { listRuns, listRunsInputSchema } from './list-runs.js';
import { refreshTaxListInputSchema, refreshTaxListTool } from './refresh-tax-list.js';
import { replaceTaxList, replaceTaxListInputSchema } from './replace-tax-list.js';
import { resetStoreInputSchema, resetStoreTool } from './reset-store.js';
import { resolveAddresses, resolveAddressesInputSchema } from './resolve-addresses.js';
import { parseToolInput, type ToolContext } from './tracker-utils.js';

interface RegisteredTool {
  definition: Tool;
  call: (context: ToolContext, args: unknown) => Promise<unknown>;
}

function register<S extends z.ZodTypeAny>(
  definition: Tool,
  schema: S,
  handler: (context: ToolContext, input: z.output<S>) => Promise<unknown>,
): RegisteredTool {
  return {
    definition,
    call: (context, args) => handler(context, parseToolInput(definition.name, schema, args)),
  };
}

const EMPTY_INPUT: Tool['inputSchema'] = {
  type: 'object',
  properties: {},
  additionalProperties: false,
};

const REGISTRY: RegisteredTool[] = [
  register(
    {
      name: 'create_run',
      description:
        'Snapshot every current record into a new run. Each entry stores the record identity key and a fingerprint of its tracked fields.',
      inputSchema: EMPTY_INPUT,
    },
    createRunInputSchema,
    createRunTool,
  ),
  register(
    {
      name: 'get_changes',
      description:
        'Compare the two most recent runs and label every current record NEW, UPDATED or UNCHANGED. Keys only in the older run are listed as removed.',
      inputSchema: {
        type: 'object',
        properties: {
          stage: { type: 'string', enum: [...STAGES], description: 'Only return records in this stage.' },
          change: { type: 'string', enum: [...CHANGE_LABELS], description: 'Only return records with this label.' },
          include_links: { type: 'boolean', description: 'Attach map and listing links to each record.' },
          limit: { type: 'number', description: 'Maximum records to return. Default 50, max 500.' },
        },
        required: [],
      },
    },
    getChangesInputSchema,
    getChanges,
  ),
  register(
    {
      name: 'list_runs',
      description: 'List the most recent runs, newest first, with their entry counts.',
      inputSchema: {
        type: 'object',
        properties: {
          limit: { type: 'number', description: 'Maximum runs to return. Default 2, max 50.' },
        },
        required: [],
      },
    },
    listRunsInputSchema,
    listRuns,
  ),
  register(
    {
      name: 'resolve_addresses',
      description:
        'Look up street addresses on the county parcel page for records that carry a parcel number but no resolved address yet.',
      inputSchema: {
        type: 'object',
        properties: {
          max_items: { type: 'number', description: 'Records to attempt in this batch. Defaults to the configured batch size, max 200.' },
        },
        required: [],
      },
    },
    resolveAddressesInputSchema,
    resolveAddresses,
  ),
  register(
    {
      name: 'import_records',
      description:
        'Insert spreadsheet rows as records. Requires stage, address, city and state columns; unknown stages are stored as OTHER.',
      inputSchema: {
        type: 'object',
        properties: {
          headers: { type: 'array', items: { type: 'string' }, description: 'Header row, if the rows omit empty columns.' },
          rows: {
            type: 'array',
            items: { type: 'object', additionalProperties: { type: ['string', 'number', 'null'] } },
            description: 'Rows keyed by header name.',
          },
        },
        required: ['rows'],
      },
    },
    importRecordsInputSchema,
    importRecordsTool,
  ),
  register(
    {
      name: 'replace_tax_list',
      description:
        'Replace every tax-delinquency record with one placeholder record per parcel number, from a list or from extracted document text.',
      inputSchema: {
        type: 'object',
        properties: {
          parcel_numbers: { type: 'array', items: { type: 'string' } },
          document_text: { type: 'string', description: 'Text containing NN-NNNN-NN parcel numbers.' },
          source_url: { type: 'string', description: 'Where the list came from.' },
        },
        required: [],
      },
    },
    replaceTaxListInputSchema,
    replaceTaxList,
  ),
  register(
    {
      name: 'refresh_tax_list',
      description:
        'Fetch the county delinquent tax list and replace the tax-delinquency records. The store is left untouched when nothing can be read.',
      inputSchema: {
        type: 'object',
        properties: {
          document_url: { type: 'string', description: 'Fetch this document instead of discovering it from the listing page.' },
        },
        required: [],
      },
    },
    refreshTaxListInputSchema,
    refreshTaxListTool,
  ),
  register(
    {
      name: 'get_record_links',
      description: 'Return the map and listing links for one record, with its address resolution status.',
      inputSchema: {
        type: 'object',
        properties: {
          item_id: { type: 'number' },
        },
        required: ['item_id'],
      },
    },
    getRecordLinksInputSchema,
    async (context, input) => {
      const links = await getRecordLinks(context, input);
      if (!links) {
        throw new Error(`Item ${input.item_id} not found.`);
      }
      return links;
    },
  ),
  register(
    {
      name: 'reset_store',
      description: 'Delete every record, run and snapshot, then reseed the example tax records.',
      inputSchema: {
        type: 'object',
        properties: {
          confirm: { type: 'boolean', description: 'Must be true.' },
        },
        required: ['confirm'],
      },
    },
    resetStoreInputSchema,
    resetStoreTool,
  ),
];

const ABOUT_TOOL: Tool = {
  name: 'about',
  description: 'Return server scope, store totals and the latest run.',
  inputSchema: EMPTY_INPUT,
};

export const TOOLS: Tool[] = [...REGISTRY.map((tool) => tool.definition), ABOUT_TOOL];

export const TOOL_NAMES: string[] = TOOLS.map((tool) => tool.name);

/**
 * Dispatch a tool call to the correct handler function.
 * Throws for unknown tools and invalid arguments.
 */
export async function callTool(context: ToolContext, name: string, args: unknown): Promise<unknown> {
  if (name === ABOUT_TOOL.name) {
    return about(context, TOOL_NAMES);
  }

  const tool = REGISTRY.find((entry) => entry.definition.name === name);
  if (!tool) {
    throw new Error(`Unknown tool "${name}".`);
  }
  return tool.call(context, args);
}
