/**
 * Report Phase: handoff from the REPORTING phase to the report generator.
 *
 * The orchestrator fills a shared ReportContext and passes a CampaignReport
 * to a ReportSink. Rendering (HTML, Markdown) lives outside this project;
 * the default sink writes the raw report as JSON into the results directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { OperationRecord, OperationsSummary, TargetDocument } from '../agent/core/types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

/**
 * Shared context the REPORTING phase writes into.
 */
export interface ReportContext {
  aiFinalAnalysis?: string;
  summary?: OperationsSummary;
  completedAt?: string;
}

export interface CampaignReport {
  session_id: string;
  target: string;
  scope: string[];
  final_analysis: string;
  summary: OperationsSummary;
  targets: Record<string, TargetDocument>;
  operations: ReadonlyArray<Readonly<OperationRecord>>;
  completed_at: string;
}

export interface ReportSink {
  /**
   * @returns where the report went (a file path, a URL), if anywhere
   */
  publish(report: CampaignReport): Promise<string | undefined>;
}

// ── Default sink ──────────────────────────────────────────────────────────────

export class JsonReportSink implements ReportSink {
  private outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  static fileName(sessionId: string): string {
    return `campaign_${sessionId}.json`;
  }

  async publish(report: CampaignReport): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, JsonReportSink.fileName(report.session_id));
    await writeFile(filePath, JSON.stringify(report, null, 2), 'utf-8');
    return filePath;
  }
}
