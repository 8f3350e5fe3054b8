// Execution Layer - process boundary (Hands)
export * from './safe-executor.js';
export { CommandWorkerPool } from './worker-pool.js';
export * from './console-resource.js';
export type { CommandRunner, ExecutionRequest, ResultEnvelope } from '../core/types.js';
