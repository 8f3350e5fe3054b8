/**
 * Exploit Command Extractor - stricter sibling of the Command Extractor.
 *
 * Only recognizes exploitation-console syntax (module selection, option
 * setting, run), credential-attack tools and remote-shell clients, each
 * anchored at the start of a line. Leading list markers, console prompts
 * and inline backticks are stripped before matching.
 */

import { getDefaultCommandRules, type CommandRules } from '../../config/command-rules.js';
import { dedupeAndCap } from './command-extractor.js';

export const EXPLOIT_PATTERNS: readonly RegExp[] = [
  // console: module selection, option setting, run
  /^use\s+(?:exploit|auxiliary|post|payload)\/\S+$/i,
  /^set\s+(?:[A-Z][A-Z_]*|payload)\s+\S.*$/,
  /^(?:exploit|run)(?:\s+-[a-zA-Z]+)*$/i,
  /^msfconsole\s+\S.*$/,
  /^msfvenom\s+\S.*$/,
  // credential attacks
  /^hydra\s+\S.*$/,
  /^john\s+\S.*$/,
  /^hashcat\s+\S.*$/,
  /^sqlmap\s+\S.*--dump\S*.*$/,
  // remote shells
  /^ssh\s+\S.*$/,
  /^telnet\s+\S.*$/,
];

/**
 * Strips list markers, prompts ("msf6 exploit(x) >", "$") and backticks.
 */
export function normalizeExploitLine(rawLine: string): string {
  return rawLine
    .trim()
    .replace(/^(?:[-*+]|\d+[.)])\s+/, '')
    .replace(/^`+|`+$/g, '')
    .replace(/^(?:msf\d*(?:\s+[^>]*)?>|\$)\s*/, '')
    .trim();
}

/**
 * @returns Candidate exploitation commands, at most `maxExploitCommands`
 */
export function extractExploitCommands(
  text: string,
  rules: Pick<CommandRules, 'maxExploitCommands'> = getDefaultCommandRules()
): string[] {
  const candidates: string[] = [];
  for (const rawLine of text.split('\n')) {
    const line = normalizeExploitLine(rawLine);
    if (line && EXPLOIT_PATTERNS.some((pattern) => pattern.test(line))) {
      candidates.push(line);
    }
  }
  return dedupeAndCap(candidates, rules.maxExploitCommands);
}

/**
 * Call-site filter layered on top of the Safe Executor's deny-list.
 *
 * @returns the first destructive pattern found, or null when the command passes
 */
export function findDestructivePattern(
  command: string,
  patterns: readonly string[] = getDefaultCommandRules().destructivePatterns
): string | null {
  const low = command.toLowerCase();
  return patterns.find((pattern) => low.includes(pattern.toLowerCase())) ?? null;
}
