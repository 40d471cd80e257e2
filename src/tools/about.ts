import { summarizeStore, type StoreSummary } from '../db/schema.js';
import { listRecentRuns } from '../pipeline/snapshot.js';
import type { RunRecord } from '../db/types.js';
import type { ToolContext } from './tracker-utils.js';

export interface AboutResult {
  name: string;
  version: string;
  description: string;
  stats: StoreSummary;
  latest_run: RunRecord | null;
  lookup: {
    url_template: string;
    default_location: string;
  };
  supported_tools: string[];
}

export async function about(context: ToolContext, supportedTools: string[]): Promise<AboutResult> {
  const [latest] = listRecentRuns(context.db, 1);
  const { defaults } = context.config;

  return {
    name: 'Property Distress Tracker',
    version: '0.1.0',
    description:
      'Tracks pre-foreclosure, foreclosure sale, REO and tax-delinquent property records, snapshots them per run and reports what changed between the last two runs.',
    stats: summarizeStore(context.db),
    latest_run: latest ?? null,
    lookup: {
      url_template: context.config.lookupUrlTemplate,
      default_location: `${defaults.city}, ${defaults.state} ${defaults.zip}`,
    },
    supported_tools: supportedTools,
  };
}
