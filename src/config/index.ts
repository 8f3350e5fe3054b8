// Runtime configuration - environment variables with validated numeric defaults

import * as fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ToolInventory } from '../agent/core/types.js';
import { CampaignError, getErrorMessage } from '../agent/core/errors.js';

export interface RuntimeConfig {
  anthropicApiKey?: string;
  model: string;
  oracleMaxTokens: number;
  oracleMaxQueriesPerMinute: number;
  resultsDir: string;
  logFile?: string;
  commandTimeoutSeconds: number;
  exploitTimeoutSeconds: number;
  maxOutputBytes: number;
  workerPoolSize: number;
  consoleLhost: string;
  toolsFile?: string;
  redis: {
    host: string;
    port: number;
    password?: string;
  };
}

export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

type Env = Record<string, string | undefined>;

/**
 * Parses a positive integer env var, falling back (and reporting) on bad input.
 */
function positiveInt(
  env: Env,
  name: string,
  fallback: number,
  warn: (message: string) => void
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    warn(`${name}="${raw}" is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Builds the runtime configuration from an environment map.
 *
 * @param env - Usually `process.env` after `dotenv/config` has run
 * @param warn - Receives one message per rejected value
 */
export function loadRuntimeConfig(
  env: Env = process.env,
  warn: (message: string) => void = (message) => console.warn(`[Config] ${message}`)
): RuntimeConfig {
  return {
    anthropicApiKey: optional(env, 'ANTHROPIC_API_KEY'),
    model: optional(env, 'CLAUDE_MODEL') ?? DEFAULT_MODEL,
    oracleMaxTokens: positiveInt(env, 'ORACLE_MAX_TOKENS', 2000, warn),
    oracleMaxQueriesPerMinute: positiveInt(env, 'ORACLE_MAX_QUERIES_PER_MINUTE', 20, warn),
    resultsDir: path.resolve(optional(env, 'RESULTS_DIR') ?? './results'),
    logFile: optional(env, 'CAMPAIGN_LOG_FILE'),
    commandTimeoutSeconds: positiveInt(env, 'COMMAND_TIMEOUT_SECONDS', 300, warn),
    exploitTimeoutSeconds: positiveInt(env, 'EXPLOIT_TIMEOUT_SECONDS', 600, warn),
    maxOutputBytes: positiveInt(env, 'MAX_OUTPUT_KB', 2048, warn) * 1024,
    workerPoolSize: positiveInt(env, 'WORKER_POOL_SIZE', 5, warn),
    consoleLhost: optional(env, 'CONSOLE_LHOST') ?? '0.0.0.0',
    toolsFile: optional(env, 'TOOLS_FILE'),
    redis: {
      host: optional(env, 'REDIS_HOST') ?? 'localhost',
      port: positiveInt(env, 'REDIS_PORT', 6379, warn),
      password: optional(env, 'REDIS_PASSWORD'),
    },
  };
}

const ToolStatusSchema = z.object({
  available: z.boolean().catch(false),
  path: z.string().nullable().catch(null),
});

/** Tool name → status; entries that are not objects come back null and are skipped */
const ToolInventorySchema = z.record(ToolStatusSchema.nullable().catch(null));

/**
 * Reads the host's tool-availability table.
 *
 * Accepts `{ "nmap": { "available": true, "path": "/usr/bin/nmap" }, ... }`.
 * Malformed entries are skipped; a missing file yields an empty inventory.
 *
 * @throws CampaignError when the file is unreadable or not a JSON object
 */
export function loadToolInventory(filePath?: string): ToolInventory {
  if (!filePath || !fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CampaignError(
      `Cannot read tool inventory at ${filePath}: ${getErrorMessage(error)}`,
      'TOOL_INVENTORY'
    );
  }

  const parsed = ToolInventorySchema.safeParse(raw);
  if (!parsed.success) {
    throw new CampaignError(`Invalid tool inventory in ${filePath}: expected an object`, 'TOOL_INVENTORY');
  }

  const inventory: ToolInventory = {};
  for (const [name, status] of Object.entries(parsed.data)) {
    if (status) inventory[name] = status;
  }
  return inventory;
}
