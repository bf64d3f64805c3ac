import {
  WorkflowOrchestrator,
  type WorkflowOrchestratorOptions,
} from './workflow-orchestrator.js';

/**
 * Run `fn` with a fresh orchestrator and dispose it afterwards, also when
 * `fn` rejects or is aborted.
 */
export async function withOrchestrator<T>(
  options: WorkflowOrchestratorOptions,
  fn: (orchestrator: WorkflowOrchestrator) => Promise<T>
): Promise<T> {
  const orchestrator = new WorkflowOrchestrator(options);
  try {
    return await fn(orchestrator);
  } finally {
    await orchestrator.dispose();
  }
}
