import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { isAbortError } from '../../orchestrator/errors.js';
import { withOrchestrator } from '../../orchestrator/scope.js';
import { optionsFromConfig } from '../../orchestrator/workflow-orchestrator.js';
import {
  print,
  printError,
  formatError,
  formatInfo,
  formatSuccess,
  formatWarning,
} from '../formatter.js';
import { loadOperations, withInterrupt } from './operations.js';

interface ResumeOptions {
  operations: string;
}

/**
 * Create the resume command.
 */
export function createResumeCommand(): Command {
  const command = new Command('resume')
    .description('Resume an interrupted workflow from its snapshot file')
    .argument('<state-file>', 'Path to a .workflow_state_*.json file')
    .requiredOption(
      '--operations <module>',
      'Module whose default export provides research() and write()'
    )
    .action(async (stateFile: string, options: ResumeOptions) => {
      try {
        await executeResume(stateFile, options);
      } catch (error) {
        if (isAbortError(error)) {
          printError(formatWarning('Workflow interrupted'));
        } else {
          printError(formatError(error instanceof Error ? error.message : String(error)));
        }
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeResume(stateFile: string, options: ResumeOptions): Promise<void> {
  const operations = await loadOperations(options.operations);

  const indexPath = await withInterrupt((signal) =>
    withOrchestrator(optionsFromConfig(getConfig(), operations), async (orchestrator) => {
      orchestrator.setProgressCallback((phase, message) => {
        print(phase === 'warning' ? formatWarning(message) : formatInfo(`[${phase}] ${message}`));
      });
      return orchestrator.resumeWorkflow(stateFile, { signal });
    })
  );
  print(formatSuccess(`Review page: ${indexPath}`));
}
