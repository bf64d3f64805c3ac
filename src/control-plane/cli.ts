import { Command } from 'commander';
import { createCleanupCommand } from './commands/cleanup.js';
import { createGenerateCommand } from './commands/generate.js';
import { createInspectCommand } from './commands/inspect.js';
import { createResumeCommand } from './commands/resume.js';

const VERSION = '0.3.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('seo-pipeline')
    .description('Crash-recoverable coordinator for research, writing and publishing SEO articles')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createGenerateCommand());
  program.addCommand(createCleanupCommand());
  program.addCommand(createInspectCommand());
  program.addCommand(createResumeCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createCleanupCommand } from './commands/cleanup.js';
export { createGenerateCommand } from './commands/generate.js';
export { createInspectCommand } from './commands/inspect.js';
export { createResumeCommand } from './commands/resume.js';
export { loadOperations, resolveOperations } from './commands/operations.js';
