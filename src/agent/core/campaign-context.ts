// Campaign context - explicit state handed to every phase

import { TargetRegistry } from '../knowledge/target-registry.js';
import { OperationsLog } from '../knowledge/operations-log.js';
import type { ToolInventory } from './types.js';
import type { ReportContext } from '../../phases/report.js';

/**
 * Host-owned state for one or more campaigns.
 *
 * The registry and log outlive a single run: the CLI keeps one context for
 * the whole session so manual `add`/`import` targets feed the next campaign.
 */
export interface CampaignContext {
  registry: TargetRegistry;
  operations: OperationsLog;
  /** Command output files and reports are written under this directory */
  resultsDir: string;
  /** Advisory only; never checked before execution */
  toolInventory: ToolInventory;
  reportContext: ReportContext;
}

export function createCampaignContext(
  resultsDir: string,
  toolInventory: ToolInventory = {}
): CampaignContext {
  return {
    registry: new TargetRegistry(),
    operations: new OperationsLog(),
    resultsDir,
    toolInventory,
    reportContext: {},
  };
}

export function createSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}
