// Campaign Orchestrator - drives the phase sequence for one target

import { mkdir } from 'fs/promises';
import path from 'path';
import { startActiveObservation } from '@langfuse/tracing';
import {
  DEFAULT_CAMPAIGN_LIMITS,
  PHASES,
  type AnalysisTag,
  type CampaignLimits,
  type CampaignResult,
  type CampaignStatus,
  type CommandRunner,
  type Phase,
  type ResultEnvelope,
  type Target,
  type ToolInventory,
} from './types.js';
import { PhaseMachine } from './phase-machine.js';
import { createSessionId, type CampaignContext } from './campaign-context.js';
import { getErrorMessage } from './errors.js';
import { CommandWorkerPool } from '../execution/worker-pool.js';
import { ConsoleResourceRunner, isConsoleCommand } from '../execution/console-resource.js';
import { extractCommands } from '../intelligence/command-extractor.js';
import {
  extractExploitCommands,
  findDestructivePattern,
} from '../intelligence/exploit-command-extractor.js';
import { isOracleError, ORACLE_ERROR_PREFIX, type Oracle } from '../intelligence/oracle.js';
import {
  analysisPrompt,
  enumerationPrompt,
  exploitationPrompt,
  osintPrompt,
  planningPrompt,
  postExploitationPrompt,
  reportingPrompt,
  vulnerabilityPrompt,
  type PhasePrompt,
} from '../intelligence/prompts.js';
import { summarizeOperations } from '../knowledge/operations-log.js';
import { getDefaultCommandRules, type CommandRules } from '../../config/command-rules.js';
import { OutputParser } from '../../utils/parser.js';
import type { CampaignLogger } from '../../utils/logger.js';
import type { ReportSink } from '../../phases/report.js';

export interface OrchestratorConfig {
  oracle: Oracle;
  /** Runs every candidate command; normally a SafeExecutor */
  executor: CommandRunner;
  logger: CampaignLogger;
  /** Defaults to a ConsoleResourceRunner over `executor` */
  consoleRunner?: ConsoleResourceRunner;
  consoleLhost?: string;
  reportSink?: ReportSink;
  rules?: CommandRules;
  limits?: Partial<CampaignLimits>;
  commandTimeoutSeconds?: number;
  exploitTimeoutSeconds?: number;
  maxOutputBytes?: number;
  workerPoolSize?: number;
}

export interface CampaignOptions {
  scope?: string[];
  /** Checked between phases only; in-flight commands finish or time out */
  signal?: AbortSignal;
}

/** State of one `run()` call, passed explicitly to every phase */
interface CampaignRun {
  ctx: CampaignContext;
  sessionId: string;
  target: string;
  scope: string[];
  pool: CommandWorkerPool;
}

function analysisTag(phase: Phase): AnalysisTag {
  return `${phase}_ANALYSIS`;
}

/**
 * Tool names the extractor accepts as a line's first token: inventory keys
 * plus the basename of each known path, for tools marked available.
 */
export function knownToolNames(inventory: ToolInventory): Set<string> {
  const names = new Set<string>();
  for (const [name, status] of Object.entries(inventory)) {
    if (!status.available) continue;
    names.add(name);
    if (status.path) names.add(path.basename(status.path));
  }
  return names;
}

function describeFailure(envelope: ResultEnvelope): string {
  const firstLine = envelope.stderr.trim().split('\n')[0];
  return firstLine ? firstLine.slice(0, 200) : `exit code ${envelope.exitCode}`;
}

/**
 * Waits for every per-target branch, then rethrows the first fault, so no
 * branch is still running commands when the campaign reports failure.
 */
async function settleAll(branches: Promise<void>[]): Promise<void> {
  const results = await Promise.allSettled(branches);
  for (const result of results) {
    if (result.status === 'rejected') throw result.reason;
  }
}

/**
 * CampaignOrchestrator - sequences PLANNING → OSINT → ENUMERATION →
 * VULNERABILITY → EXPLOITATION → POST_EXPLOITATION → REPORTING.
 *
 * Every phase follows the same loop: ask the oracle for strategy text,
 * extract candidate commands, run a bounded prefix of them through the
 * worker pool, record one operation per attempt, then ask for a closing
 * analysis. Commands for one target run in order; different targets
 * interleave through the pool.
 *
 * Failures of a single command or oracle query are logged and skipped.
 * Only bookkeeping errors (phase order, registry access) reach the caller.
 */
export class CampaignOrchestrator {
  private oracle: Oracle;
  private executor: CommandRunner;
  private consoleRunner: ConsoleResourceRunner;
  private logger: CampaignLogger;
  private reportSink?: ReportSink;
  private rules: CommandRules;
  private limits: CampaignLimits;
  private commandTimeoutSeconds: number;
  private exploitTimeoutSeconds: number;
  private maxOutputBytes: number;
  private workerPoolSize: number;

  /** Suffix that keeps output file names unique within a millisecond */
  private outputSequence = 0;

  constructor(config: OrchestratorConfig) {
    this.oracle = config.oracle;
    this.executor = config.executor;
    this.consoleRunner =
      config.consoleRunner ?? new ConsoleResourceRunner(config.executor, config.consoleLhost);
    this.logger = config.logger;
    this.reportSink = config.reportSink;
    this.rules = config.rules ?? getDefaultCommandRules();
    this.limits = { ...DEFAULT_CAMPAIGN_LIMITS, ...config.limits };
    this.commandTimeoutSeconds = config.commandTimeoutSeconds ?? 300;
    this.exploitTimeoutSeconds = config.exploitTimeoutSeconds ?? 600;
    this.maxOutputBytes = config.maxOutputBytes ?? 2 * 1024 * 1024;
    this.workerPoolSize = config.workerPoolSize ?? 5;
  }

  /**
   * Runs a full campaign against `target`.
   *
   * @throws PhaseTransitionError | UnknownTargetError on bookkeeping faults
   */
  async run(
    ctx: CampaignContext,
    target: string,
    options: CampaignOptions = {}
  ): Promise<CampaignResult> {
    const run: CampaignRun = {
      ctx,
      sessionId: createSessionId(),
      target,
      scope: options.scope ?? [],
      pool: new CommandWorkerPool(this.workerPoolSize),
    };
    const machine = new PhaseMachine();
    const startedAt = new Date().toISOString();
    let status: CampaignStatus = 'completed';
    let finalAnalysis: string | undefined;

    await mkdir(ctx.resultsDir, { recursive: true });

    this.logger.step('Orchestrator', `Starting campaign on: ${target}`);
    this.logger.info('Orchestrator', `Session ID: ${run.sessionId}`);

    await startActiveObservation('campaign', async (rootSpan) => {
      rootSpan.update({
        input: { target, scope: run.scope, sessionId: run.sessionId },
      });

      for (const phase of PHASES) {
        if (options.signal?.aborted) {
          status = 'stopped';
          this.logger.warn('Orchestrator', `Campaign stopped before ${phase}`);
          break;
        }

        machine.enter(phase);
        this.logger.step('Orchestrator', `=== Phase: ${phase} ===`);

        await startActiveObservation(`phase-${phase.toLowerCase()}`, async (span) => {
          const before = ctx.operations.length;
          span.update({ input: { targets: ctx.registry.size } });

          const analysis = await this.runPhase(phase, run);
          if (phase === 'REPORTING') finalAnalysis = analysis;

          span.update({
            output: {
              operations: ctx.operations.length - before,
              targets: ctx.registry.size,
            },
          });
        });
      }

      rootSpan.update({ output: { status, phases: machine.history.length } });
    });

    const summary = summarizeOperations(ctx.operations, ctx.registry);
    this.logger.step(
      'Orchestrator',
      `Campaign ${status}: ${summary.targetsIdentified} targets, ` +
        `${summary.totalVulnerabilities} vulnerabilities, ` +
        `${summary.targetsCompromised} compromised, ${summary.totalOperations} operations`
    );

    return {
      sessionId: run.sessionId,
      target,
      status,
      phasesVisited: machine.history,
      summary,
      finalAnalysis,
      startedAt,
      completedAt: new Date().toISOString(),
    };
  }

  /**
   * @returns the final analysis for REPORTING, undefined otherwise
   */
  private async runPhase(phase: Phase, run: CampaignRun): Promise<string | undefined> {
    switch (phase) {
      case 'PLANNING':
        await this.planning(run);
        return undefined;
      case 'OSINT':
        await this.osint(run);
        break;
      case 'ENUMERATION':
        await this.enumeration(run);
        break;
      case 'VULNERABILITY':
        await this.vulnerability(run);
        break;
      case 'EXPLOITATION':
        await this.exploitation(run);
        break;
      case 'POST_EXPLOITATION':
        await this.postExploitation(run);
        break;
      case 'REPORTING':
        return this.reporting(run);
    }
    await this.analyzePhase(phase, run);
    return undefined;
  }

  // ==================== PHASES ====================

  private async planning(run: CampaignRun): Promise<void> {
    const plan = await this.ask('Planning', planningPrompt(run.target, run.scope));
    run.ctx.operations.append({
      phase: 'PLANNING',
      target: run.target,
      timestamp: Date.now(),
      aiPlan: plan,
      scope: run.scope,
    });
    this.logger.result('Planning', this.display(plan));
  }

  private async osint(run: CampaignRun): Promise<void> {
    const { ctx } = run;
    const strategy = await this.ask('OSINT', osintPrompt(run.target, ctx.toolInventory));
    const commands = this.candidates('OSINT', strategy, ctx.toolInventory).slice(
      0,
      this.limits.osintCommands
    );

    let discovered = 0;
    for (const command of commands) {
      const envelope = await this.attempt(run, 'OSINT', command, run.target);
      if (!envelope?.success) continue;

      for (const ip of OutputParser.parseAddresses(envelope.stdout)) {
        if (discovered >= this.limits.discoveredTargetsPerPhase) break;
        if (!ctx.registry.add(ip)) continue;
        ctx.registry.addNote(ip, `Discovered during OSINT via: ${command}`);
        discovered++;
        this.logger.result('OSINT', `New target: ${ip}`);
      }
    }
  }

  private async enumeration(run: CampaignRun): Promise<void> {
    const { ctx } = run;
    if (ctx.registry.isEmpty()) {
      this.logger.warn('Enumeration', 'No targets identified, skipping enumeration');
      return;
    }

    const targets = ctx.registry.ids().slice(0, this.limits.enumerationTargets);
    await settleAll(
      targets.map(async (ip) => {
        const strategy = await this.ask('Enumeration', enumerationPrompt(ip, ctx.toolInventory));
        const commands = this.candidates('Enumeration', strategy, ctx.toolInventory).slice(
          0,
          this.limits.enumerationCommandsPerTarget
        );

        for (const command of commands) {
          const envelope = await this.attempt(run, 'ENUMERATION', command, ip);
          if (envelope?.success) this.ingestHosts(run, ip, envelope.stdout);
        }
      })
    );
  }

  private async vulnerability(run: CampaignRun): Promise<void> {
    const { ctx } = run;
    const targets = ctx.registry.list().filter((target) => target.openPorts.length > 0);
    if (targets.length === 0) {
      this.logger.warn('Vulnerability', 'No open ports identified, skipping vulnerability assessment');
      return;
    }

    await settleAll(
      targets.map(async (target) => {
        const strategy = await this.ask('Vulnerability', vulnerabilityPrompt(target, this.limits));
        const commands = this.candidates('Vulnerability', strategy, ctx.toolInventory).slice(
          0,
          this.limits.vulnerabilityCommandsPerTarget
        );

        for (const command of commands) {
          const envelope = await this.attempt(run, 'VULNERABILITY', command, target.ip);
          if (!envelope?.success) continue;

          for (const finding of OutputParser.parseVulnerabilities(envelope.stdout)) {
            const description = OutputParser.describeVulnerability(finding);
            if (ctx.registry.addVulnerability(target.ip, description)) {
              this.logger.vuln('Vulnerability', `${target.ip}: ${description}`);
            }
          }
        }
      })
    );
  }

  private async exploitation(run: CampaignRun): Promise<void> {
    const targets = run.ctx.registry.list().filter((target) => target.vulnerabilities.length > 0);
    if (targets.length === 0) {
      this.logger.warn('Exploitation', 'No clear vulnerabilities identified for exploitation');
      return;
    }

    await settleAll(
      targets.map(async (target) => {
        const strategy = await this.ask('Exploitation', exploitationPrompt(target, this.limits));
        const commands = extractExploitCommands(strategy, this.rules).slice(
          0,
          this.limits.exploitAttemptsPerTarget
        );
        if (commands.length === 0) {
          this.logger.info('Exploitation', `No actionable exploit commands for ${target.ip}`);
        }

        for (const command of commands) {
          await this.attemptExploit(run, command, target);
        }
      })
    );
  }

  private async postExploitation(run: CampaignRun): Promise<void> {
    const { ctx } = run;
    const targets = ctx.registry.list().filter((target) => target.exploited);
    if (targets.length === 0) {
      this.logger.warn('PostExploitation', 'No targets compromised, skipping post-exploitation');
      return;
    }

    await settleAll(
      targets.map(async (target) => {
        const strategy = await this.ask('PostExploitation', postExploitationPrompt(target));
        const commands = this.candidates('PostExploitation', strategy, ctx.toolInventory).slice(
          0,
          this.limits.postExploitationCommandsPerTarget
        );

        for (const command of commands) {
          await this.attempt(run, 'POST_EXPLOITATION', command, target.ip);
        }
      })
    );
  }

  private async reporting(run: CampaignRun): Promise<string> {
    const { ctx } = run;
    const counts = summarizeOperations(ctx.operations, ctx.registry);
    const analysis = await this.ask(
      'Reporting',
      reportingPrompt({
        targets: counts.targetsIdentified,
        vulnerabilities: counts.totalVulnerabilities,
        compromised: counts.targetsCompromised,
        operations: counts.totalOperations,
      })
    );

    ctx.operations.append({
      phase: 'REPORTING',
      target: run.target,
      timestamp: Date.now(),
      aiAnalysis: analysis,
    });

    const summary = summarizeOperations(ctx.operations, ctx.registry);
    const completedAt = new Date().toISOString();
    ctx.reportContext.aiFinalAnalysis = analysis;
    ctx.reportContext.summary = summary;
    ctx.reportContext.completedAt = completedAt;
    this.logger.result('Reporting', this.display(analysis));

    if (this.reportSink) {
      try {
        const location = await this.reportSink.publish({
          session_id: run.sessionId,
          target: run.target,
          scope: run.scope,
          final_analysis: analysis,
          summary,
          targets: ctx.registry.export(),
          operations: ctx.operations.all(),
          completed_at: completedAt,
        });
        if (location) this.logger.result('Reporting', `Report written to ${location}`);
      } catch (error) {
        this.logger.warn('Reporting', `Report handoff failed: ${getErrorMessage(error)}`);
      }
    }

    return analysis;
  }

  /**
   * Closing oracle analysis of a phase; skipped when the phase recorded nothing.
   */
  private async analyzePhase(phase: Phase, run: CampaignRun): Promise<void> {
    const { ctx } = run;
    const records = ctx.operations.byPhase(phase);
    if (records.length === 0) return;

    const analysis = await this.ask(
      'Analysis',
      analysisPrompt(phase, ctx.operations, ctx.registry, this.limits)
    );
    ctx.operations.append({
      phase: analysisTag(phase),
      timestamp: Date.now(),
      aiAnalysis: analysis,
      operationsAnalyzed: records.length,
    });
    this.logger.result('Analysis', `${phase}: ${this.display(analysis)}`);
  }

  // ==================== EXECUTION ====================

  /**
   * One candidate command: execute through the pool, record the outcome.
   *
   * Execution failures become the record's `error`; nothing is thrown.
   */
  private async attempt(
    run: CampaignRun,
    phase: Phase,
    command: string,
    target: string
  ): Promise<ResultEnvelope | null> {
    const started = Date.now();
    const outputPath = this.outputPath(run, phase);
    let envelope: ResultEnvelope | null = null;
    let error: string | undefined;

    try {
      envelope = await run.pool.run(() =>
        this.executor.execute({
          command,
          workingDir: run.ctx.resultsDir,
          timeoutSeconds: this.commandTimeoutSeconds,
          maxOutputBytes: this.maxOutputBytes,
          outputPath,
        })
      );
      if (!envelope.success) error = describeFailure(envelope);
    } catch (err) {
      error = getErrorMessage(err);
    }

    if (error) {
      this.logger.warn(phase, `${command} failed: ${error}`);
    } else if (envelope) {
      this.logger.result(phase, `${command} (${envelope.durationSeconds.toFixed(1)}s)`);
    }

    run.ctx.operations.append({
      phase,
      command,
      target,
      timestamp: Date.now(),
      durationSeconds: envelope?.durationSeconds ?? (Date.now() - started) / 1000,
      success: envelope?.success ?? false,
      outputLength: envelope?.stdout.length ?? 0,
      error,
      outputPath: envelope?.outputPath,
    });
    return envelope;
  }

  /**
   * Exploitation attempt: destructive-pattern filter, console or shell
   * execution with the exploit timeout, then a keyword scan of stdout.
   *
   * The keyword scan is a best-effort signal, not proof of access.
   */
  private async attemptExploit(run: CampaignRun, command: string, target: Target): Promise<void> {
    const { ctx } = run;
    const destructive = findDestructivePattern(command, this.rules.destructivePatterns);
    if (destructive) {
      this.logger.warn('Exploitation', `Dangerous command blocked: ${command}`);
      ctx.operations.append({
        phase: 'EXPLOITATION',
        command,
        target: target.ip,
        timestamp: Date.now(),
        success: false,
        error: `Blocked destructive pattern: ${destructive}`,
        exploited: ctx.registry.isExploited(target.ip),
      });
      return;
    }

    this.logger.info('Exploitation', `Attempting exploitation: ${command}`);
    const started = Date.now();
    let envelope: ResultEnvelope | null = null;
    let error: string | undefined;

    try {
      envelope = await run.pool.run(() => this.executeExploit(run, command, target.ip));
      if (!envelope.success) error = describeFailure(envelope);
    } catch (err) {
      error = getErrorMessage(err);
      this.logger.warn('Exploitation', `Exploit execution failed: ${error}`);
    }

    if (envelope?.success) {
      const output = envelope.stdout.toLowerCase();
      const indicator = this.rules.exploitSuccessIndicators.find((keyword) =>
        output.includes(keyword.toLowerCase())
      );
      if (indicator) {
        ctx.registry.markExploited(target.ip, `Shell via: ${command}`);
        this.logger.vuln('Exploitation', `EXPLOITATION SUCCESS: ${target.ip} (${indicator})`);
      } else {
        this.logger.info('Exploitation', 'Exploit attempted but no clear success indicator');
      }
    }

    ctx.operations.append({
      phase: 'EXPLOITATION',
      command,
      target: target.ip,
      timestamp: Date.now(),
      durationSeconds: envelope?.durationSeconds ?? (Date.now() - started) / 1000,
      success: envelope?.success ?? false,
      outputLength: envelope?.stdout.length ?? 0,
      error,
      exploited: ctx.registry.isExploited(target.ip),
      outputPath: envelope?.outputPath,
    });
  }

  private async executeExploit(
    run: CampaignRun,
    command: string,
    ip: string
  ): Promise<ResultEnvelope> {
    const outputPath = this.outputPath(run, 'EXPLOITATION');
    if (isConsoleCommand(command)) {
      const { envelope, sessions } = await this.consoleRunner.run(command, ip, {
        workDir: path.dirname(outputPath),
        timeoutSeconds: this.exploitTimeoutSeconds,
        maxOutputBytes: this.maxOutputBytes,
        outputPath,
      });
      if (sessions.length > 0) {
        this.logger.vuln('Exploitation', `Console opened session(s) ${sessions.join(', ')} on ${ip}`);
      }
      return envelope;
    }

    return this.executor.execute({
      command,
      workingDir: run.ctx.resultsDir,
      timeoutSeconds: this.exploitTimeoutSeconds,
      maxOutputBytes: this.maxOutputBytes,
      outputPath,
    });
  }

  // ==================== FINDINGS ====================

  /**
   * Open ports and services from scan output, for hosts already registered.
   * Port lines before any host header belong to `ip`.
   */
  private ingestHosts(run: CampaignRun, ip: string, output: string): void {
    const { registry } = run.ctx;
    for (const host of OutputParser.parseHosts(output, ip)) {
      if (!registry.has(host.ip)) continue;
      if (host.hostname) registry.setHostnameIfMissing(host.ip, host.hostname);

      for (const port of host.ports) {
        if (port.state !== 'open') continue;
        if (registry.addService(host.ip, port.port, OutputParser.describeService(port))) {
          this.logger.result('Enumeration', `${host.ip}:${port.port} ${port.service}`);
        }
      }
    }
  }

  // ==================== HELPERS ====================

  /**
   * Oracle query that always yields text. Thrown errors are folded into an
   * error string so the phase continues with a degraded plan.
   */
  private async ask(component: string, { prompt, systemPrompt }: PhasePrompt): Promise<string> {
    let text: string;
    try {
      text = await this.oracle.query(prompt, systemPrompt);
    } catch (error) {
      text = `${ORACLE_ERROR_PREFIX} ${getErrorMessage(error)}`;
    }
    if (isOracleError(text)) {
      this.logger.warn(component, `Oracle unavailable, continuing with degraded plan: ${text}`);
    }
    return text;
  }

  private candidates(component: string, text: string, inventory: ToolInventory): string[] {
    const commands = extractCommands(text, knownToolNames(inventory), this.rules);
    if (commands.length === 0) {
      this.logger.info(component, 'No actionable commands in strategy');
    }
    return commands;
  }

  private outputPath(run: CampaignRun, phase: Phase): string {
    const name = phase.toLowerCase();
    return path.join(run.ctx.resultsDir, name, `${name}_${Date.now()}_${++this.outputSequence}.txt`);
  }

  private display(text: string): string {
    const max = this.limits.displayChars;
    return text.length > max ? `${text.slice(0, max)}...` : text;
  }
}
