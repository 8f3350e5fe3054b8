/**
 * SafeExecutor - the only component that crosses the OS process boundary.
 *
 * Every command the campaign runs goes through `execute()`, which:
 * - refuses catastrophic commands before anything is spawned
 * - enforces a hard wall-clock timeout
 * - truncates stdout to a byte budget while it streams
 * - optionally persists output to a file
 * - never throws: spawn failures come back as failed envelopes
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { execa, ExecaError } from 'execa';
import type { CommandRunner, ExecutionRequest, ResultEnvelope } from '../core/types.js';
import { getDefaultCommandRules } from '../../config/command-rules.js';
import { getErrorMessage } from '../core/errors.js';

/** Exit code reported when the deny-list rejects a command */
export const BLOCKED_EXIT_CODE = 126;

/** Exit code reported when a command exceeds its timeout */
export const TIMEOUT_EXIT_CODE = 124;

/** Exit code reported when the process could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export const TRUNCATION_MARKER = '\n[...truncated...]\n';

/**
 * Returns true when the command contains any deny-listed substring
 * (case-insensitive).
 */
export function looksCatastrophic(command: string, patterns: readonly string[]): boolean {
  const low = command.toLowerCase();
  return patterns.some((pattern) => low.includes(pattern.toLowerCase()));
}

/**
 * Cuts `text` to at most `maxBytes` UTF-8 bytes.
 */
export function truncateToBytes(
  text: string,
  maxBytes: number
): { text: string; truncated: boolean } {
  const buffer = Buffer.from(text, 'utf-8');
  if (buffer.length <= maxBytes) {
    return { text, truncated: false };
  }
  // A cut inside a multi-byte character decodes to U+FFFD; drop it
  const cut = buffer.subarray(0, maxBytes).toString('utf-8').replace(/\uFFFD$/, '');
  return { text: cut + TRUNCATION_MARKER, truncated: true };
}

function displayCommand(command: string | string[]): string {
  return Array.isArray(command) ? command.join(' ') : command;
}

/**
 * Keeps the first `limit + 1` bytes of a stream; the rest is read and dropped.
 */
class CappedOutput {
  private chunks: Buffer[] = [];
  private stored = 0;

  constructor(private limit: number) {}

  push(chunk: unknown): void {
    const room = this.limit + 1 - this.stored;
    if (room <= 0) return;
    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf-8');
    const kept = data.length > room ? data.subarray(0, room) : data;
    this.chunks.push(kept);
    this.stored += kept.length;
  }

  /** More than `limit` bytes arrived */
  get overflowed(): boolean {
    return this.stored > this.limit;
  }

  /**
   * Decoded output; a complete stream loses its final newline.
   */
  text(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.overflowed ? text : text.replace(/\r?\n$/, '');
  }
}

/**
 * SIGKILL to the whole process group, so grandchildren of `sh -c` die
 * with the shell and release the output pipes.
 */
function killProcessGroup(subprocess: { pid?: number; kill(signal: NodeJS.Signals): boolean }): void {
  const { pid } = subprocess;
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (error) {
    // ESRCH: the group is already gone
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') return;
    subprocess.kill('SIGKILL');
  }
}

export class SafeExecutor implements CommandRunner {
  private catastrophicPatterns: readonly string[];

  /**
   * @param catastrophicPatterns - Deny-list; defaults to config/command-rules.json
   */
  constructor(catastrophicPatterns?: readonly string[]) {
    this.catastrophicPatterns =
      catastrophicPatterns ?? getDefaultCommandRules().catastrophicPatterns;
  }

  async execute(request: ExecutionRequest): Promise<ResultEnvelope> {
    const { command, workingDir, timeoutSeconds, maxOutputBytes, outputPath } = request;
    const commandText = displayCommand(command);

    if (looksCatastrophic(commandText, this.catastrophicPatterns)) {
      return {
        success: false,
        stdout: '',
        stderr: 'Blocked catastrophic pattern in command',
        exitCode: BLOCKED_EXIT_CODE,
        durationSeconds: 0,
        truncated: false,
      };
    }

    const started = performance.now();
    const options = {
      cwd: workingDir,
      reject: false,
      stdin: 'ignore',
      // Streams are read below; a process group lets the timeout kill grandchildren
      buffer: false,
      encoding: 'buffer',
      detached: true,
    } as const;

    try {
      const subprocess = Array.isArray(command)
        ? execa(command[0], command.slice(1), options)
        : execa(command, { ...options, shell: true });

      const stdoutCapture = new CappedOutput(maxOutputBytes);
      const stderrCapture = new CappedOutput(maxOutputBytes);
      subprocess.stdout?.on('data', (chunk: unknown) => stdoutCapture.push(chunk));
      subprocess.stderr?.on('data', (chunk: unknown) => stderrCapture.push(chunk));

      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        killProcessGroup(subprocess);
      }, timeoutSeconds * 1000);

      const result = await subprocess.finally(() => clearTimeout(timer));
      const elapsed = (performance.now() - started) / 1000;

      if (timedOut) {
        return {
          success: false,
          stdout: '',
          stderr: `Command timed out after ${timeoutSeconds}s`,
          exitCode: TIMEOUT_EXIT_CODE,
          durationSeconds: Math.max(elapsed, timeoutSeconds),
          truncated: false,
        };
      }

      if (result.exitCode === undefined) {
        // Never started (ENOENT, EACCES) or killed by a signal
        const reason = result instanceof ExecaError ? result.shortMessage : 'process failed';
        return {
          success: false,
          stdout: '',
          stderr: reason,
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          durationSeconds: elapsed,
          truncated: false,
        };
      }

      const { text: stdout, truncated } = truncateToBytes(stdoutCapture.text(), maxOutputBytes);
      const stderr = truncateToBytes(stderrCapture.text(), maxOutputBytes).text;

      let persistedPath: string | undefined;
      if (outputPath) {
        await mkdir(path.dirname(outputPath), { recursive: true });
        await writeFile(outputPath, stdout + (stderr ? '\n[stderr]\n' + stderr : ''), 'utf-8');
        persistedPath = outputPath;
      }

      return {
        success: result.exitCode === 0,
        stdout,
        stderr,
        exitCode: result.exitCode,
        durationSeconds: elapsed,
        truncated,
        outputPath: persistedPath,
      };
    } catch (error) {
      return {
        success: false,
        stdout: '',
        stderr: `Execution failed: ${getErrorMessage(error)}`,
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        durationSeconds: (performance.now() - started) / 1000,
        truncated: false,
      };
    }
  }
}
