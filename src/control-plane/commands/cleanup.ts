import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { WorkflowOrchestrator } from '../../orchestrator/workflow-orchestrator.js';
import {
  print,
  printError,
  formatCleanupResult,
  formatError,
  formatJson,
} from '../formatter.js';

interface CleanupOptions {
  outputDir?: string;
  olderThan?: string;
  json?: boolean;
}

/**
 * Create the cleanup command.
 */
export function createCleanupCommand(): Command {
  const command = new Command('cleanup')
    .description('Remove stale workflow snapshots and staging directories')
    .option('-o, --output-dir <dir>', 'Output root to sweep (default: SEO_PIPELINE_OUTPUT_DIR)')
    .option('-t, --older-than <hours>', 'Only remove items older than this many hours')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: CleanupOptions) => {
      try {
        await executeCleanup(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeCleanup(options: CleanupOptions): Promise<void> {
  const config = getConfig();
  const outputDir = options.outputDir ?? config.outputDir;

  let olderThanHours = config.orphanMaxAgeHours;
  if (options.olderThan !== undefined) {
    olderThanHours = Number(options.olderThan);
    if (!Number.isFinite(olderThanHours) || olderThanHours < 0) {
      printError(formatError(`Invalid age in hours: ${options.olderThan}`));
      process.exitCode = 1;
      return;
    }
  }

  const result = await WorkflowOrchestrator.cleanupOrphanedFiles(outputDir, olderThanHours);

  print(options.json ? formatJson(result) : formatCleanupResult(result));
  if (result.failures.length > 0) {
    process.exitCode = 1;
  }
}
