import { Command } from 'commander';
import { StateStore, toSnapshotFile } from '../../orchestrator/state-store.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatSnapshotDetail,
} from '../formatter.js';

interface InspectOptions {
  json?: boolean;
}

/**
 * Create the inspect command.
 */
export function createInspectCommand(): Command {
  const command = new Command('inspect')
    .description('Show the state recorded in a workflow snapshot file')
    .argument('<state-file>', 'Path to a .workflow_state_*.json file')
    .option('-j, --json', 'Output the normalized snapshot as JSON', false)
    .action(async (stateFile: string, options: InspectOptions) => {
      try {
        await executeInspect(stateFile, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeInspect(stateFile: string, options: InspectOptions): Promise<void> {
  const loaded = await new StateStore().load(stateFile);
  if (!loaded.ok) {
    printError(formatError(`${loaded.message}: ${stateFile}`));
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    print(formatJson(toSnapshotFile(loaded.snapshot)));
  } else {
    print(formatSnapshotDetail(stateFile, loaded.snapshot));
  }
}
