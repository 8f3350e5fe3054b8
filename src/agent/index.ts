// Campaign Agent - wires the orchestrator to its collaborators for the CLI and the worker

import * as fs from 'fs';
import path from 'path';
import { CampaignOrchestrator, type CampaignOptions } from './core/orchestrator.js';
import { createCampaignContext, type CampaignContext } from './core/campaign-context.js';
import type {
  CampaignResult,
  CommandRunner,
  LogEntry,
  OperationsSummary,
} from './core/types.js';
import { CampaignError, getErrorMessage } from './core/errors.js';
import { ConsoleResourceRunner, SafeExecutor } from './execution/index.js';
import { AnthropicOracle, type Oracle } from './intelligence/index.js';
import { parseTargetFile, summarizeOperations } from './knowledge/index.js';
import { loadToolInventory, type RuntimeConfig } from '../config/index.js';
import { getDefaultCommandRules } from '../config/command-rules.js';
import { CampaignLogger } from '../utils/logger.js';
import { JsonReportSink, type ReportSink } from '../phases/report.js';

export interface AgentOptions {
  /** Relay for every log entry (worker mode publishes these to Redis) */
  onLog?: (entry: LogEntry) => void;
  /** Overrides for tests and recorded sessions */
  oracle?: Oracle;
  executor?: CommandRunner;
  reportSink?: ReportSink;
  silent?: boolean;
}

/**
 * CampaignAgent - host-side owner of the campaign context.
 *
 * One agent lives for the whole CLI session (or worker process). Targets
 * added or imported between campaigns stay in the registry and seed the
 * next run.
 */
export class CampaignAgent {
  readonly context: CampaignContext;
  readonly logger: CampaignLogger;
  private orchestrator: CampaignOrchestrator;

  constructor(config: RuntimeConfig, options: AgentOptions = {}) {
    this.logger = new CampaignLogger({
      logFile: config.logFile,
      onLog: options.onLog,
      silent: options.silent,
    });
    this.context = createCampaignContext(config.resultsDir, loadToolInventory(config.toolsFile));

    const rules = getDefaultCommandRules();
    const executor = options.executor ?? new SafeExecutor(rules.catastrophicPatterns);
    const oracle =
      options.oracle ??
      new AnthropicOracle({
        apiKey: config.anthropicApiKey,
        model: config.model,
        maxTokens: config.oracleMaxTokens,
        maxQueriesPerMinute: config.oracleMaxQueriesPerMinute,
      });

    this.orchestrator = new CampaignOrchestrator({
      oracle,
      executor,
      logger: this.logger,
      consoleRunner: new ConsoleResourceRunner(executor, config.consoleLhost),
      reportSink: options.reportSink ?? new JsonReportSink(config.resultsDir),
      rules,
      commandTimeoutSeconds: config.commandTimeoutSeconds,
      exploitTimeoutSeconds: config.exploitTimeoutSeconds,
      maxOutputBytes: config.maxOutputBytes,
      workerPoolSize: config.workerPoolSize,
    });
  }

  campaign(target: string, options: CampaignOptions = {}): Promise<CampaignResult> {
    return this.orchestrator.run(this.context, target, options);
  }

  summary(): OperationsSummary {
    return summarizeOperations(this.context.operations, this.context.registry);
  }

  /**
   * Writes the registry export to `filePath` (default: results dir).
   *
   * @returns the path written
   */
  exportTargets(filePath?: string): string {
    const target = filePath ?? path.join(this.context.resultsDir, `targets_${Date.now()}.json`);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, JSON.stringify(this.context.registry.export(), null, 2));
    return target;
  }

  /**
   * @returns number of new targets
   * @throws CampaignError when the file cannot be read or is not an address-keyed object
   */
  importTargets(filePath: string): number {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new CampaignError(
        `Cannot read targets file at ${filePath}: ${getErrorMessage(error)}`,
        'INVALID_TARGETS_FILE'
      );
    }
    const documents = parseTargetFile(raw);
    if (!documents) {
      throw new CampaignError(`Invalid targets file: ${filePath}`, 'INVALID_TARGETS_FILE');
    }
    return this.context.registry.import(documents);
  }
}

export { CampaignOrchestrator } from './core/orchestrator.js';
export type { CampaignOptions, OrchestratorConfig } from './core/orchestrator.js';
export * from './core/types.js';
