// Intelligence Layer - oracle and command extraction (Brains)
export * from './oracle.js';
export * from './command-extractor.js';
export * from './exploit-command-extractor.js';
export type { PhasePrompt } from './prompts.js';
