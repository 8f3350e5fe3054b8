import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import { CampaignLogger } from '../logger.js';
import type { LogEntry } from '../../agent/core/types.js';

describe('CampaignLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'campaign-logger-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('relays entries to the subscriber', () => {
    const entries: LogEntry[] = [];
    const logger = new CampaignLogger({ silent: true, onLog: (entry) => entries.push(entry) });

    logger.step('Orchestrator', 'Starting campaign on: example.com');
    logger.vuln('Exploitation', 'shell', { ip: '10.0.0.5' });

    expect(entries.map(({ level, component, message }) => ({ level, component, message }))).toEqual([
      { level: 'STEP', component: 'Orchestrator', message: 'Starting campaign on: example.com' },
      { level: 'VULN', component: 'Exploitation', message: 'shell' },
    ]);
    expect(entries[1].data).toEqual({ ip: '10.0.0.5' });
  });

  it('appends JSON lines to the log file', () => {
    const logFile = path.join(dir, 'nested', 'campaign.jsonl');
    const logger = new CampaignLogger({ logFile, silent: true });

    logger.info('OSINT', 'first');
    logger.warn('OSINT', 'second');

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'WARN', component: 'OSINT', message: 'second' });
  });

  it('swaps the subscriber', () => {
    const first: string[] = [];
    const second: string[] = [];
    const logger = new CampaignLogger({ silent: true, onLog: (entry) => first.push(entry.message) });

    logger.info('Worker', 'a');
    logger.setOnLog((entry) => second.push(entry.message));
    logger.info('Worker', 'b');
    logger.setOnLog(undefined);
    logger.info('Worker', 'c');

    expect(first).toEqual(['a']);
    expect(second).toEqual(['b']);
  });
});
