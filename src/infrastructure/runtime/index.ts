export { default as orchestratorPlugin } from './orchestrator-plugin.js';
export type { OrchestratorPluginOptions } from './orchestrator-plugin.js';
