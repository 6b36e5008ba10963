/**
 * orchestrator/index.ts
 * Barrel export for the build orchestrator.
 */

export { BuildOrchestrator, countFragments } from './build-orchestrator.js';
export type { AstDocument, BuildOrchestratorOptions } from './build-orchestrator.js';
