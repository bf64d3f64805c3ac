import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { isAbortError } from '../../orchestrator/errors.js';
import { withOrchestrator } from '../../orchestrator/scope.js';
import { optionsFromConfig, validateKeyword } from '../../orchestrator/workflow-orchestrator.js';
import {
  print,
  printError,
  formatError,
  formatInfo,
  formatSuccess,
  formatWarning,
} from '../formatter.js';
import { loadOperations, withInterrupt } from './operations.js';

interface GenerateOptions {
  operations: string;
  outputDir?: string;
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  const command = new Command('generate')
    .description('Research, write and save an article for a keyword')
    .argument('<keyword>', 'Focus keyword for the article')
    .requiredOption(
      '--operations <module>',
      'Module whose default export provides research() and write()'
    )
    .option('-o, --output-dir <dir>', 'Output root (default: SEO_PIPELINE_OUTPUT_DIR)')
    .action(async (keyword: string, options: GenerateOptions) => {
      try {
        await executeGenerate(keyword, options);
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

async function executeGenerate(keyword: string, options: GenerateOptions): Promise<void> {
  const normalized = validateKeyword(keyword);
  const operations = await loadOperations(options.operations);

  const orchestratorOptions = optionsFromConfig(getConfig(), operations);
  if (options.outputDir !== undefined) {
    orchestratorOptions.outputDir = options.outputDir;
  }

  const indexPath = await withInterrupt((signal) =>
    withOrchestrator(orchestratorOptions, async (orchestrator) => {
      orchestrator.setProgressCallback((phase, message) => {
        print(phase === 'warning' ? formatWarning(message) : formatInfo(`[${phase}] ${message}`));
      });
      return orchestrator.runFullWorkflow(normalized, { signal });
    })
  );
  print(formatSuccess(`Review page: ${indexPath}`));
}
