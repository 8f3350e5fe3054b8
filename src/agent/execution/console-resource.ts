/**
 * ConsoleResourceRunner - non-interactive driver for the exploitation console.
 *
 * Narrow protocol: write a resource script with fixed directives, invoke
 * `msfconsole -r <script> -q` through the Safe Executor, then parse the
 * opened sessions out of stdout.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { CommandRunner, ResultEnvelope } from '../core/types.js';

export interface ConsoleRunOptions {
  /** Directory the resource script is written to; also the working dir */
  workDir: string;
  timeoutSeconds: number;
  maxOutputBytes: number;
  outputPath?: string;
}

export interface ConsoleRunResult {
  envelope: ResultEnvelope;
  resourcePath: string;
  /** Session ids reported as opened ("Command shell session 1 opened") */
  sessions: number[];
}

/**
 * Whether a candidate should go through the console instead of a shell.
 */
export function isConsoleCommand(command: string): boolean {
  return command.startsWith('use ') || command.toLowerCase().includes('metasploit');
}

/**
 * Resource script lines for one candidate.
 *
 * Module selections get target, listener, check and background-run
 * directives; everything ends with `exit` so the console never waits on input.
 */
export function buildResourceScript(command: string, target: string, lhost: string): string[] {
  const lines = [command];
  if (command.includes('use ')) {
    lines.push(`set RHOSTS ${target}`, `set LHOST ${lhost}`, 'check', 'exploit -j');
  }
  lines.push('exit');
  return lines;
}

/**
 * Ids of sessions reported as opened in console output, unique, in order.
 */
export function parseOpenedSessions(output: string): number[] {
  const sessions: number[] = [];
  for (const match of output.matchAll(/session (\d+) opened/gi)) {
    const id = parseInt(match[1], 10);
    if (!sessions.includes(id)) sessions.push(id);
  }
  return sessions;
}

export class ConsoleResourceRunner {
  private runner: CommandRunner;
  private lhost: string;
  private binary: string;
  private sequence = 0;

  constructor(runner: CommandRunner, lhost: string = '0.0.0.0', binary: string = 'msfconsole') {
    this.runner = runner;
    this.lhost = lhost;
    this.binary = binary;
  }

  async run(command: string, target: string, options: ConsoleRunOptions): Promise<ConsoleRunResult> {
    await mkdir(options.workDir, { recursive: true });
    const resourcePath = path.join(
      options.workDir,
      `console_resource_${Date.now()}_${++this.sequence}.rc`
    );
    const script = buildResourceScript(command, target, this.lhost);
    await writeFile(resourcePath, script.join('\n') + '\n', 'utf-8');

    const envelope = await this.runner.execute({
      command: [this.binary, '-r', resourcePath, '-q'],
      workingDir: options.workDir,
      timeoutSeconds: options.timeoutSeconds,
      maxOutputBytes: options.maxOutputBytes,
      outputPath: options.outputPath,
    });

    return {
      envelope,
      resourcePath,
      sessions: parseOpenedSessions(envelope.stdout),
    };
  }
}
