/**
 * Main Entry Point - Interactive CLI for the campaign orchestrator.
 *
 * Supports:
 * 1. **Campaigns**: `campaign <target> [scope...]` or a bare IP/hostname
 * 2. **Target Registry**: `add`, `remove`, `targets`, `export`, `import`
 * 3. **Operations Log**: `ops`, `summary`
 *
 * Ctrl+C during a campaign stops it before the next phase starts.
 */

import 'dotenv/config';
import * as readline from 'readline';
import { initTracing, shutdownTracing } from './agent/utils/index.js';
import { CampaignAgent } from './agent/index.js';
import type { CampaignResult, OperationsSummary } from './agent/core/types.js';
import { getErrorMessage } from './agent/core/errors.js';
import { loadRuntimeConfig } from './config/index.js';

const COMMANDS = [
  'campaign', 'add', 'remove', 'targets', 'ops', 'summary',
  'export', 'import', 'help', 'exit', 'quit',
];

function displayBanner(): void {
  console.log('\n');
  console.log('  Autonomous Campaign Orchestrator');
  console.log('  PLANNING → OSINT → ENUMERATION → VULNERABILITY → EXPLOITATION');
  console.log('  → POST_EXPLOITATION → REPORTING');
  console.log('');
  console.log('  Only run campaigns against systems you are authorized to test.');
  console.log('');
  console.log('─'.repeat(65));
  displayHelp();
  console.log('─'.repeat(65));
}

function displayHelp(): void {
  console.log('\n  Available Commands:\n');
  console.log('  Campaign:');
  console.log('    campaign <target> [scope...]  - Run all phases against a target');
  console.log('                                    Example: campaign example.com web mail');
  console.log('');
  console.log('  Targets:');
  console.log('    add <ip> [hostname]   - Register a target manually');
  console.log('    remove <ip>           - Remove a target');
  console.log('    targets               - List targets and findings');
  console.log('    export [file]         - Write targets to JSON');
  console.log('    import <file>         - Load targets from JSON');
  console.log('');
  console.log('  Operations:');
  console.log('    ops                   - Show the last 20 operations');
  console.log('    summary               - Show campaign statistics');
  console.log('');
  console.log('  Other:');
  console.log('    help                  - Show this help message');
  console.log('    exit / quit           - Quit the application');
  console.log('');
  console.log('  Quick Input:');
  console.log('    <IP or hostname>      - Runs a campaign on the target');
  console.log('');
}

function isTarget(input: string): boolean {
  if (/^[\d./]+$/.test(input)) return true;
  const firstWord = input.split(' ')[0].toLowerCase();
  return input.includes('.') && !COMMANDS.includes(firstWord);
}

function separator(): void {
  console.log('\n' + '='.repeat(60) + '\n');
}

function printSummary(summary: OperationsSummary): void {
  const rate = summary.successRate === null ? 'n/a' : `${(summary.successRate * 100).toFixed(1)}%`;
  console.log('\n  Campaign Summary:');
  console.log(`    Operations:       ${summary.totalOperations}`);
  console.log(`    Successful:       ${summary.successfulOperations}`);
  console.log(`    Failed:           ${summary.failedOperations}`);
  console.log(`    Success rate:     ${rate}`);
  console.log(`    Phases:           ${summary.phasesCompleted.join(', ') || 'none'}`);
  console.log(`    Targets:          ${summary.targetsIdentified}`);
  console.log(`    Compromised:      ${summary.targetsCompromised}`);
  console.log(`    Vulnerabilities:  ${summary.totalVulnerabilities}`);
  console.log(`    Open ports:       ${summary.totalOpenPorts}`);
  console.log('');
}

// ─── Handlers ────────────────────────────────────────────────

async function handleCampaign(
  agent: CampaignAgent,
  rl: readline.Interface,
  target: string,
  scope: string[]
): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.log('\n  Stop requested, finishing current phase...');
    controller.abort();
  };
  rl.on('SIGINT', onInterrupt);

  let result: CampaignResult;
  try {
    result = await agent.campaign(target, { scope, signal: controller.signal });
  } finally {
    rl.off('SIGINT', onInterrupt);
  }

  separator();
  console.log(`  Session:  ${result.sessionId}`);
  console.log(`  Status:   ${result.status}`);
  console.log(`  Phases:   ${result.phasesVisited.join(' → ')}`);
  printSummary(result.summary);
}

function handleAdd(agent: CampaignAgent, args: string[]): void {
  if (args.length < 1) {
    console.log('\n  Usage: add <ip> [hostname]\n');
    return;
  }
  const [ip, hostname] = args;
  if (agent.context.registry.add(ip, hostname)) {
    console.log(`\n  Added target ${ip}${hostname ? ` (${hostname})` : ''}\n`);
  } else {
    console.log(`\n  Target ${ip} already exists\n`);
  }
}

function handleRemove(agent: CampaignAgent, args: string[]): void {
  if (args.length < 1) {
    console.log('\n  Usage: remove <ip>\n');
    return;
  }
  const removed = agent.context.registry.remove(args[0]);
  console.log(removed ? `\n  Removed ${args[0]}\n` : `\n  No target ${args[0]}\n`);
}

function handleTargets(agent: CampaignAgent): void {
  const targets = agent.context.registry.list();
  if (targets.length === 0) {
    console.log('\n  No targets. Use "add <ip>" or run a campaign.\n');
    return;
  }

  console.log('\n  Targets:');
  console.log('  ' + '─'.repeat(50));
  for (const target of targets) {
    const status = target.exploited ? 'COMPROMISED' : 'active';
    console.log(`\n  ${target.ip}${target.hostname ? ` (${target.hostname})` : ''} [${status}]`);
    console.log(`    Ports: ${target.openPorts.join(', ') || 'none'}`);
    for (const [port, service] of target.services) {
      console.log(`    ${port}: ${service}`);
    }
    target.vulnerabilities.forEach((vuln, index) => {
      console.log(`    ${index}. ${vuln}`);
    });
    for (const shell of target.shells) {
      console.log(`    ${shell}`);
    }
  }
  console.log('');
}

function handleOps(agent: CampaignAgent): void {
  const records = agent.context.operations.recent();
  if (records.length === 0) {
    console.log('\n  No operations recorded yet.\n');
    return;
  }

  console.log('\n  Recent Operations:');
  for (const record of records) {
    const time = new Date(record.timestamp).toISOString().slice(11, 19);
    const outcome = record.success === undefined ? ' ' : record.success ? '✓' : '✗';
    const detail = record.command ?? (record.aiPlan || record.aiAnalysis ? '(oracle)' : '');
    console.log(`    ${time} ${outcome} [${record.phase}] ${detail}`);
  }
  console.log('');
}

// ─── Main ────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  if (!config.anthropicApiKey) {
    console.warn('Warning: ANTHROPIC_API_KEY is not set, strategy queries will be degraded');
  }

  initTracing();
  const agent = new CampaignAgent(config);

  displayBanner();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const prompt = (): void => {
    rl.question('\n> ', async (input: string) => {
      const trimmed = input.trim();
      if (!trimmed) {
        prompt();
        return;
      }

      const [command, ...args] = trimmed.split(/\s+/);
      const lowerCommand = command.toLowerCase();

      try {
        switch (lowerCommand) {
          case 'exit':
          case 'quit':
            console.log('\n  Shutting down...');
            await shutdownTracing();
            rl.close();
            process.exit(0);

          case 'help':
            displayHelp();
            break;

          case 'campaign':
            if (args[0]) {
              await handleCampaign(agent, rl, args[0], args.slice(1));
            } else {
              console.log('\n  Usage: campaign <target> [scope...]\n');
            }
            break;

          case 'add':
            handleAdd(agent, args);
            break;

          case 'remove':
            handleRemove(agent, args);
            break;

          case 'targets':
            handleTargets(agent);
            break;

          case 'ops':
            handleOps(agent);
            break;

          case 'summary':
            printSummary(agent.summary());
            break;

          case 'export': {
            const file = agent.exportTargets(args[0]);
            console.log(`\n  Targets exported to ${file}\n`);
            break;
          }

          case 'import':
            if (args[0]) {
              const count = agent.importTargets(args[0]);
              console.log(`\n  Imported ${count} target(s)\n`);
            } else {
              console.log('\n  Usage: import <file>\n');
            }
            break;

          default:
            if (isTarget(trimmed)) {
              await handleCampaign(agent, rl, command, args);
            } else {
              console.log(`\n  Unknown command: ${command}`);
              console.log('  Type "help" for available commands.\n');
            }
        }
      } catch (error: unknown) {
        console.error(`\n  Error: ${getErrorMessage(error)}\n`);
      }

      prompt();
    });
  };

  prompt();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
