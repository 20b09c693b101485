export { Orchestrator } from './Orchestrator.js';
export type { OrchestratorDependencies } from './Orchestrator.js';
export * from './gates.js';
export * from './types.js';
