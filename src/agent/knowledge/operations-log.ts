/**
 * OperationsLog - append-only audit trail of every attempted action.
 *
 * Records are frozen when appended. Summary statistics are recomputed from
 * the log and the registry on every call so they never drift from state.
 */

import type { OperationRecord, OperationTag, OperationsSummary } from '../core/types.js';
import type { TargetRegistry } from './target-registry.js';

export class OperationsLog {
  private records: OperationRecord[] = [];

  get length(): number {
    return this.records.length;
  }

  append(record: OperationRecord): Readonly<OperationRecord> {
    const frozen = Object.freeze({
      ...record,
      scope: record.scope ? Object.freeze([...record.scope]) : undefined,
    });
    this.records.push(frozen);
    return frozen;
  }

  /** All records, oldest first */
  all(): ReadonlyArray<Readonly<OperationRecord>> {
    return [...this.records];
  }

  byPhase(phase: OperationTag): ReadonlyArray<Readonly<OperationRecord>> {
    return this.records.filter((record) => record.phase === phase);
  }

  /** The last `count` records */
  recent(count: number = 20): ReadonlyArray<Readonly<OperationRecord>> {
    return this.records.slice(-count);
  }

  /**
   * Host-initiated reset. The orchestrator itself only appends.
   */
  clear(): void {
    this.records = [];
  }
}

/**
 * Aggregate statistics over the log and registry.
 */
export function summarizeOperations(
  log: OperationsLog,
  registry: TargetRegistry
): OperationsSummary {
  const records = log.all();
  const declared = records.filter((record) => record.success !== undefined);
  const successful = declared.filter((record) => record.success === true).length;

  const phasesCompleted: OperationTag[] = [];
  for (const record of records) {
    if (!phasesCompleted.includes(record.phase)) phasesCompleted.push(record.phase);
  }

  const targets = registry.list();
  return {
    totalOperations: records.length,
    successfulOperations: successful,
    failedOperations: declared.length - successful,
    successRate: declared.length > 0 ? successful / declared.length : null,
    phasesCompleted,
    targetsIdentified: targets.length,
    targetsCompromised: targets.filter((target) => target.exploited).length,
    totalVulnerabilities: targets.reduce((sum, target) => sum + target.vulnerabilities.length, 0),
    totalOpenPorts: targets.reduce((sum, target) => sum + target.openPorts.length, 0),
  };
}
