import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import {
  BLOCKED_EXIT_CODE,
  SafeExecutor,
  SPAWN_FAILURE_EXIT_CODE,
  TIMEOUT_EXIT_CODE,
  TRUNCATION_MARKER,
  looksCatastrophic,
  truncateToBytes,
} from '../safe-executor.js';

describe('SafeExecutor', () => {
  let workDir: string;
  const executor = new SafeExecutor(['rm -rf /', 'mkfs', ':(){:|:&};:']);

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'safe-executor-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('runs a shell command and captures stdout', async () => {
    const result = await executor.execute({
      command: 'echo hello',
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
    });

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('hello');
    expect(result.truncated).toBe(false);
    expect(result.outputPath).toBeUndefined();
  });

  it('runs an argument vector without a shell', async () => {
    const result = await executor.execute({
      command: ['echo', '$HOME'],
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
    });

    expect(result.stdout).toBe('$HOME');
  });

  it('reports a non-zero exit as failure with stderr', async () => {
    const result = await executor.execute({
      command: ['sh', '-c', 'echo oops >&2; exit 3'],
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
    });

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('oops');
  });

  it('blocks catastrophic commands without spawning or writing output', async () => {
    const outputPath = path.join(workDir, 'out', 'blocked.txt');

    const result = await executor.execute({
      command: 'rm -rf /',
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
      outputPath,
    });

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(BLOCKED_EXIT_CODE);
    expect(result.durationSeconds).toBe(0);
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(fs.existsSync(path.dirname(outputPath))).toBe(false);
  });

  it('kills commands that exceed the timeout', async () => {
    const result = await executor.execute({
      command: ['sleep', '5'],
      workingDir: workDir,
      timeoutSeconds: 1,
      maxOutputBytes: 1024,
    });

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(result.durationSeconds).toBeGreaterThanOrEqual(1);
    expect(result.stderr).toBe('Command timed out after 1s');
  });

  it('kills the whole shell pipeline at the timeout', async () => {
    const started = Date.now();
    const result = await executor.execute({
      command: 'sleep 5; echo done',
      workingDir: workDir,
      timeoutSeconds: 1,
      maxOutputBytes: 1024,
    });
    const wallSeconds = (Date.now() - started) / 1000;

    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(result.stdout).toBe('');
    expect(wallSeconds).toBeLessThan(3);
    expect(result.durationSeconds).toBeLessThan(3);
  });

  it('does not wait for grandchildren holding the output pipe', async () => {
    const started = Date.now();
    const result = await executor.execute({
      command: 'sleep 5 | cat',
      workingDir: workDir,
      timeoutSeconds: 1,
      maxOutputBytes: 1024,
    });

    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect((Date.now() - started) / 1000).toBeLessThan(3);
  });

  it('treats output far beyond the cap as truncation, not failure', async () => {
    const result = await executor.execute({
      command: "head -c 300000 /dev/zero | tr '\\0' a",
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
    });

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.truncated).toBe(true);
    expect(result.stdout).toBe('a'.repeat(1024) + TRUNCATION_MARKER);
  });

  it('truncates stdout beyond the byte cap', async () => {
    const result = await executor.execute({
      command: ['sh', '-c', 'yes a | head -c 4096'],
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
    });

    expect(result.success).toBe(true);
    expect(result.truncated).toBe(true);
    expect(result.stdout.length).toBeLessThanOrEqual(1024 + TRUNCATION_MARKER.length);
    expect(result.stdout.endsWith(TRUNCATION_MARKER)).toBe(true);
  });

  it('returns a failed envelope when the binary does not exist', async () => {
    const result = await executor.execute({
      command: ['definitely-not-a-real-binary-xyz'],
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
    });

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.stderr).not.toBe('');
  });

  it('persists stdout and stderr, creating parent directories', async () => {
    const outputPath = path.join(workDir, 'nested', 'dir', 'out.txt');

    const result = await executor.execute({
      command: ['sh', '-c', 'echo data; echo warn >&2'],
      workingDir: workDir,
      timeoutSeconds: 10,
      maxOutputBytes: 1024,
      outputPath,
    });

    expect(result.outputPath).toBe(outputPath);
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe('data\n[stderr]\nwarn');
  });
});

describe('looksCatastrophic', () => {
  it('matches deny-listed substrings case-insensitively', () => {
    expect(looksCatastrophic('sudo MKFS.ext4 /dev/sda1', ['mkfs'])).toBe(true);
    expect(looksCatastrophic('nmap -sV 10.0.0.1', ['mkfs'])).toBe(false);
  });
});

describe('truncateToBytes', () => {
  it('leaves short text alone', () => {
    expect(truncateToBytes('abc', 10)).toEqual({ text: 'abc', truncated: false });
  });

  it('never splits a multi-byte character', () => {
    const { text, truncated } = truncateToBytes('aé', 2);

    expect(truncated).toBe(true);
    expect(text).toBe('a' + TRUNCATION_MARKER);
  });
});
