// Knowledge Layer - campaign state (Memory)
export { TargetRegistry, EXPORT_VULNERABILITY_LIMIT } from './target-registry.js';
export { parseTargetFile } from './target-file.js';
export { OperationsLog, summarizeOperations } from './operations-log.js';
export type { OperationRecord, OperationsSummary, Target, TargetDocument } from '../core/types.js';
