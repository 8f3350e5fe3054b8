// Utility Layer - Support & Infrastructure
export { initTracing, shutdownTracing, tracingConfigured } from './instrumentation.js';
