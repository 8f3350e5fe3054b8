/**
 * Command Rules - deny-lists and allow-lists that sit between oracle text and
 * process execution.
 *
 * Kept as data in config/command-rules.json so the extraction and blocking
 * boundary can be tuned and tested without touching code.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CommandRulesError } from '../agent/core/errors.js';

const CommandRulesSchema = z.object({
  /** Substrings that make the Safe Executor refuse to spawn anything */
  catastrophicPatterns: z.array(z.string().min(1)).min(1),
  /** Extra filter applied to exploitation candidates */
  destructivePatterns: z.array(z.string().min(1)),
  /** Always-accepted leading tokens, on top of the host's installed tools */
  networkUtilities: z.array(z.string().min(1)),
  commentPrefixes: z.array(z.string().min(1)),
  /** Lower-case keywords that count as "access gained" in exploit output */
  exploitSuccessIndicators: z.array(z.string().min(1)),
  maxCommands: z.number().int().positive(),
  maxExploitCommands: z.number().int().positive(),
});

export type CommandRules = z.infer<typeof CommandRulesSchema>;

/** Resolves to <repo>/config/command-rules.json from both src/ and dist/. */
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../config/command-rules.json', import.meta.url)
);

/**
 * Reads and validates a command-rules file.
 *
 * @throws CommandRulesError when the file is unreadable or fails validation
 */
export function loadCommandRules(filePath: string = DEFAULT_RULES_PATH): CommandRules {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CommandRulesError(`Cannot read command rules at ${filePath}: ${reason}`);
  }

  const parsed = CommandRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new CommandRulesError(`Invalid command rules in ${filePath}: ${issues}`);
  }
  return parsed.data;
}

let cachedRules: CommandRules | null = null;

/**
 * Returns the rules shipped with the project, loading them once.
 */
export function getDefaultCommandRules(): CommandRules {
  if (!cachedRules) {
    cachedRules = loadCommandRules();
  }
  return cachedRules;
}
