import type { Database } from 'better-sqlite3';
import { z } from 'zod';

import type { TrackerConfig } from '../config.js';
import type { FetchLike } from '../http/request.js';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 500;

export interface ToolContext {
  db: Database;
  config: TrackerConfig;
  fetchImpl?: FetchLike;
}

export function normalizeLimit(limit: number | undefined, defaultValue = DEFAULT_LIMIT, maxValue = MAX_LIMIT): number {
  if (typeof limit !== 'number' || Number.isNaN(limit)) {
    return defaultValue;
  }

  return Math.min(Math.max(Math.floor(limit), 1), maxValue);
}

export class ToolInputError extends Error {
  constructor(toolName: string, readonly issues: string[]) {
    super(`invalid arguments for ${toolName}: ${issues.join('; ')}`);
    this.name = 'ToolInputError';
  }
}

/** Parses tool arguments, reporting every issue with its path. */
export function parseToolInput<T extends z.ZodTypeAny>(toolName: string, schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new ToolInputError(
      toolName,
      parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
