import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import { DEFAULT_MODEL, loadRuntimeConfig, loadToolInventory } from '../index.js';
import { getDefaultCommandRules, loadCommandRules } from '../command-rules.js';
import { CampaignError, CommandRulesError } from '../../agent/core/errors.js';

describe('loadRuntimeConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadRuntimeConfig({}, () => {});

    expect(config.anthropicApiKey).toBeUndefined();
    expect(config.model).toBe(DEFAULT_MODEL);
    expect(config.commandTimeoutSeconds).toBe(300);
    expect(config.exploitTimeoutSeconds).toBe(600);
    expect(config.maxOutputBytes).toBe(2048 * 1024);
    expect(config.workerPoolSize).toBe(5);
    expect(config.consoleLhost).toBe('0.0.0.0');
    expect(config.resultsDir).toBe(path.resolve('./results'));
    expect(config.redis).toEqual({ host: 'localhost', port: 6379, password: undefined });
  });

  it('reads overrides and rejects bad numbers', () => {
    const warnings: string[] = [];
    const config = loadRuntimeConfig(
      {
        ANTHROPIC_API_KEY: 'test-secret',
        WORKER_POOL_SIZE: '2',
        COMMAND_TIMEOUT_SECONDS: '-5',
        MAX_OUTPUT_KB: 'lots',
        REDIS_HOST: 'redis.internal',
      },
      (message) => warnings.push(message)
    );

    expect(config.anthropicApiKey).toBe('test-secret');
    expect(config.workerPoolSize).toBe(2);
    expect(config.commandTimeoutSeconds).toBe(300);
    expect(config.maxOutputBytes).toBe(2048 * 1024);
    expect(config.redis.host).toBe('redis.internal');
    expect(warnings).toEqual([
      'COMMAND_TIMEOUT_SECONDS="-5" is not a positive integer, using 300',
      'MAX_OUTPUT_KB="lots" is not a positive integer, using 2048',
    ]);
  });
});

describe('file-backed config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'campaign-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the tool inventory and skips malformed entries', () => {
    const file = path.join(dir, 'tools.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        nmap: { available: true, path: '/usr/bin/nmap' },
        masscan: { available: false },
        broken: 'yes',
      })
    );

    expect(loadToolInventory(file)).toEqual({
      nmap: { available: true, path: '/usr/bin/nmap' },
      masscan: { available: false, path: null },
    });
    expect(loadToolInventory(path.join(dir, 'missing.json'))).toEqual({});
  });

  it('coerces malformed fields of an otherwise valid entry', () => {
    const file = path.join(dir, 'tools.json');
    fs.writeFileSync(file, JSON.stringify({ nikto: { available: 'true', path: 17 } }));

    expect(loadToolInventory(file)).toEqual({ nikto: { available: false, path: null } });
  });

  it('wraps unparsable inventories in CampaignError', () => {
    const file = path.join(dir, 'tools.json');
    fs.writeFileSync(file, '{ "nmap": ');

    expect(() => loadToolInventory(file)).toThrow(CampaignError);
    expect(() => loadToolInventory(file)).toThrow(`Cannot read tool inventory at ${file}:`);
  });

  it('rejects an inventory that is not an object', () => {
    const file = path.join(dir, 'tools.json');
    fs.writeFileSync(file, '["nmap"]');

    expect(() => loadToolInventory(file)).toThrow(
      `Invalid tool inventory in ${file}: expected an object`
    );
  });

  it('ships valid command rules', () => {
    const rules = getDefaultCommandRules();

    expect(rules.catastrophicPatterns).toContain('rm -rf /');
    expect(rules.networkUtilities).toContain('dig');
    expect(rules.maxCommands).toBe(10);
    expect(rules.maxExploitCommands).toBe(5);
  });

  it('rejects rules that fail validation', () => {
    const file = path.join(dir, 'rules.json');
    fs.writeFileSync(file, JSON.stringify({ ...getDefaultCommandRules(), maxCommands: 0 }));

    expect(() => loadCommandRules(file)).toThrow(CommandRulesError);
    expect(() => loadCommandRules(file)).toThrow(
      `Invalid command rules in ${file}: maxCommands: Number must be greater than 0`
    );
  });

  it('rejects unreadable rules files', () => {
    expect(() => loadCommandRules(path.join(dir, 'missing.json'))).toThrow(CommandRulesError);
  });
});
