/**
 * Command Extractor - turns free-form oracle text into candidate shell commands.
 *
 * Two passes, merged in first-seen order:
 * 1. every line inside fenced code blocks (blank and comment lines dropped)
 * 2. any line of the whole text whose first token is a known tool
 *
 * The result is deduplicated and capped so that a verbose oracle cannot
 * widen the execution fan-out. No command is validated or run here.
 */

import { getDefaultCommandRules, type CommandRules } from '../../config/command-rules.js';

export type ExtractionRules = Pick<CommandRules, 'networkUtilities' | 'commentPrefixes' | 'maxCommands'>;

const FENCED_BLOCK_RE = /```[^\n`]*\r?\n([\s\S]*?)```/g;

export function isCommentLine(line: string, commentPrefixes: readonly string[]): boolean {
  return commentPrefixes.some((prefix) => line.startsWith(prefix));
}

/**
 * Lines inside fenced blocks, trimmed, without blanks and comments.
 */
export function extractCodeBlockLines(text: string, commentPrefixes: readonly string[]): string[] {
  const lines: string[] = [];
  for (const block of text.matchAll(FENCED_BLOCK_RE)) {
    for (const rawLine of block[1].split('\n')) {
      const line = rawLine.trim();
      if (!line || isCommentLine(line, commentPrefixes)) continue;
      lines.push(line);
    }
  }
  return lines;
}

/**
 * Order-preserving dedup followed by the cap.
 */
export function dedupeAndCap(commands: readonly string[], cap: number): string[] {
  return [...new Set(commands)].slice(0, cap);
}

/**
 * @param text - Raw oracle response
 * @param knownToolNames - Tools the host reports as installed
 * @param rules - Allow-list, comment prefixes and cap; defaults to config/command-rules.json
 * @returns Candidate commands, at most `rules.maxCommands`
 *
 * @example
 * extractCommands('```bash\n# scan\nnmap -sV 10.0.0.1\n```', ['nmap']);
 * // ['nmap -sV 10.0.0.1']
 */
export function extractCommands(
  text: string,
  knownToolNames: Iterable<string>,
  rules: ExtractionRules = getDefaultCommandRules()
): string[] {
  const candidates = extractCodeBlockLines(text, rules.commentPrefixes);

  const known = new Set<string>([...knownToolNames, ...rules.networkUtilities]);
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line || isCommentLine(line, rules.commentPrefixes)) continue;
    const token = line.split(/\s+/)[0];
    if (known.has(token)) {
      candidates.push(line);
    }
  }

  return dedupeAndCap(candidates, rules.maxCommands);
}
