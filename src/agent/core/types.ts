// Shared types for the campaign orchestrator

// ==================== PHASES ====================

/**
 * Campaign phases in execution order.
 *
 * The order is fixed and one-directional; REPORTING is terminal.
 */
export const PHASES = [
  'PLANNING',
  'OSINT',
  'ENUMERATION',
  'VULNERABILITY',
  'EXPLOITATION',
  'POST_EXPLOITATION',
  'REPORTING',
] as const;

export type Phase = (typeof PHASES)[number];

/** Tag used for the closing oracle analysis of a phase (e.g. "OSINT_ANALYSIS"). */
export type AnalysisTag = `${Phase}_ANALYSIS`;

export type OperationTag = Phase | AnalysisTag;

// ==================== TARGETS ====================

/**
 * An addressable host under test with its accumulated findings.
 *
 * The registry hands these out as frozen snapshots; findings change only
 * through its insert/append/latch operations.
 */
export interface Target {
  /** Network address, unique within the registry */
  readonly ip: string;
  readonly hostname?: string;
  /** Open port numbers, unique, in discovery order */
  readonly openPorts: readonly number[];
  /** Port → service descriptor (e.g. "ssh OpenSSH 8.2p1") */
  readonly services: ReadonlyMap<number, string>;
  /** Vulnerability descriptions, insertion order, no duplicates */
  readonly vulnerabilities: readonly string[];
  /** Latched: once true it stays true for the rest of the campaign */
  readonly exploited: boolean;
  readonly shells: readonly string[];
  readonly credentials: readonly string[];
  readonly notes: readonly string[];
}

/**
 * JSON-safe form of a target, used for export/import and report handoff.
 */
export interface TargetDocument {
  hostname?: string | null;
  open_ports: number[];
  services: Record<string, string>;
  vulnerabilities: string[];
  exploited?: boolean;
  shells?: string[];
  credentials?: string[];
  notes?: string[];
}

// ==================== EXECUTION ====================

/**
 * Result returned by the Safe Executor for a single process invocation.
 */
export interface ResultEnvelope {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  durationSeconds: number;
  truncated: boolean;
  /** Where stdout/stderr were persisted, when an output path was requested */
  outputPath?: string;
}

/**
 * Input for one Safe Executor call.
 *
 * A string command runs through the shell; an argument vector is spawned directly.
 */
export interface ExecutionRequest {
  command: string | string[];
  workingDir?: string;
  timeoutSeconds: number;
  maxOutputBytes: number;
  outputPath?: string;
}

/** Anything that can run a command and hand back a ResultEnvelope. */
export interface CommandRunner {
  execute(request: ExecutionRequest): Promise<ResultEnvelope>;
}

// ==================== OPERATIONS LOG ====================

/**
 * One audit entry. Records are frozen on append and never mutated.
 */
export interface OperationRecord {
  phase: OperationTag;
  command?: string;
  target?: string;
  /** Epoch milliseconds */
  timestamp: number;
  durationSeconds?: number;
  success?: boolean;
  outputLength?: number;
  error?: string;
  /** Set on EXPLOITATION attempts: the target's flag after the attempt */
  exploited?: boolean;
  /** Strategy text for PLANNING entries */
  aiPlan?: string;
  /** Analysis text for *_ANALYSIS and REPORTING entries */
  aiAnalysis?: string;
  scope?: readonly string[];
  operationsAnalyzed?: number;
  outputPath?: string;
}

/**
 * Aggregate statistics, always computed from the current log and registry.
 */
export interface OperationsSummary {
  totalOperations: number;
  successfulOperations: number;
  failedOperations: number;
  /** successful / records that declare success; null when none declare it */
  successRate: number | null;
  phasesCompleted: OperationTag[];
  targetsIdentified: number;
  targetsCompromised: number;
  totalVulnerabilities: number;
  totalOpenPorts: number;
}

// ==================== HOST COLLABORATORS ====================

/** Advisory tool availability entry supplied by the host. */
export interface ToolStatus {
  available: boolean;
  path: string | null;
}

export type ToolInventory = Record<string, ToolStatus>;

// ==================== LOGGING ====================

export type LogLevel = 'INFO' | 'STEP' | 'RESULT' | 'VULN' | 'WARN' | 'ERROR';

/**
 * Structured log entry relayed to `onLog` subscribers (e.g. the Redis worker).
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  /** Component producing the entry (e.g. "Orchestrator", "SafeExecutor") */
  component: string;
  message: string;
  data?: unknown;
}

// ==================== CAMPAIGN ====================

/**
 * Per-phase fan-out bounds and prompt slice sizes.
 */
export interface CampaignLimits {
  osintCommands: number;
  enumerationTargets: number;
  enumerationCommandsPerTarget: number;
  vulnerabilityCommandsPerTarget: number;
  exploitAttemptsPerTarget: number;
  postExploitationCommandsPerTarget: number;
  discoveredTargetsPerPhase: number;
  promptPorts: number;
  promptServices: number;
  promptVulnerabilities: number;
  promptTargets: number;
  displayChars: number;
}

export const DEFAULT_CAMPAIGN_LIMITS: CampaignLimits = {
  osintCommands: 5,
  enumerationTargets: 3,
  enumerationCommandsPerTarget: 4,
  vulnerabilityCommandsPerTarget: 3,
  exploitAttemptsPerTarget: 2,
  postExploitationCommandsPerTarget: 3,
  discoveredTargetsPerPhase: 10,
  promptPorts: 10,
  promptServices: 5,
  promptVulnerabilities: 5,
  promptTargets: 20,
  displayChars: 500,
};

export type CampaignStatus = 'completed' | 'stopped';

/**
 * What a campaign run hands back to its caller.
 */
export interface CampaignResult {
  sessionId: string;
  target: string;
  status: CampaignStatus;
  /** Phases entered, in order */
  phasesVisited: Phase[];
  summary: OperationsSummary;
  finalAnalysis?: string;
  startedAt: string;
  completedAt: string;
}
