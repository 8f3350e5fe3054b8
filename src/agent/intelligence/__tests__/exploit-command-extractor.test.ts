import { describe, it, expect } from 'vitest';
import {
  extractExploitCommands,
  findDestructivePattern,
  normalizeExploitLine,
} from '../exploit-command-extractor.js';

describe('extractExploitCommands', () => {
  it('recognizes console module selection, options and run', () => {
    const text = [
      'Try the vsftpd backdoor:',
      'use exploit/unix/ftp/vsftpd_234_backdoor',
      'set RHOSTS 10.0.0.5',
      'exploit',
    ].join('\n');

    expect(extractExploitCommands(text, { maxExploitCommands: 5 })).toEqual([
      'use exploit/unix/ftp/vsftpd_234_backdoor',
      'set RHOSTS 10.0.0.5',
      'exploit',
    ]);
  });

  it('strips list markers, backticks and console prompts', () => {
    const text = [
      '1. `hydra -l admin -P pass.txt ssh://10.0.0.5`',
      '- msf6 exploit(multi/handler) > run -j',
      '$ ssh admin@10.0.0.5',
    ].join('\n');

    expect(extractExploitCommands(text, { maxExploitCommands: 5 })).toEqual([
      'hydra -l admin -P pass.txt ssh://10.0.0.5',
      'run -j',
      'ssh admin@10.0.0.5',
    ]);
  });

  it('ignores prose that merely mentions a tool', () => {
    const text = [
      'You could use the ssh service to log in.',
      'Set up a listener first.',
      'sqlmap -u http://10.0.0.5/?id=1',
      'sqlmap -u http://10.0.0.5/?id=1 --dump',
    ].join('\n');

    expect(extractExploitCommands(text, { maxExploitCommands: 5 })).toEqual([
      'sqlmap -u http://10.0.0.5/?id=1 --dump',
    ]);
  });

  it('caps at the exploit maximum', () => {
    const text = Array.from({ length: 8 }, (_, i) => `ssh user${i}@10.0.0.5`).join('\n');

    expect(extractExploitCommands(text, { maxExploitCommands: 5 })).toHaveLength(5);
  });
});

describe('normalizeExploitLine', () => {
  it('removes the msf prompt', () => {
    expect(normalizeExploitLine('msf6 > use auxiliary/scanner/ssh/ssh_login')).toBe(
      'use auxiliary/scanner/ssh/ssh_login'
    );
  });
});

describe('findDestructivePattern', () => {
  it('returns the first matching pattern, case-insensitively', () => {
    expect(findDestructivePattern('ssh root@h "RM -RF /tmp/x"', ['rm -rf', 'delete'])).toBe('rm -rf');
  });

  it('returns null for a clean command', () => {
    expect(findDestructivePattern('hydra -l admin ssh://h', ['rm -rf', 'delete'])).toBeNull();
  });
});
