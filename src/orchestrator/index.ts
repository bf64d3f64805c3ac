export * from './errors.js';
export * from './state-machine.js';
export * from './retry-policy.js';
export * from './state-store.js';
export { OrphanCollector } from './orphan-collector.js';
export * from './workflow-orchestrator.js';
export { withOrchestrator } from './scope.js';
