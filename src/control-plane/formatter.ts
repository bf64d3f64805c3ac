import {
  WorkflowState,
  type OrphanCleanupResult,
  type WorkflowSnapshot,
} from '../types/index.js';
import { describeState } from '../orchestrator/state-machine.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a workflow state with appropriate color.
 */
export function formatState(state: WorkflowState): string {
  const stateColors: Record<WorkflowState, keyof typeof colors> = {
    [WorkflowState.INITIALIZED]: 'gray',
    [WorkflowState.RESEARCHING]: 'blue',
    [WorkflowState.RESEARCH_COMPLETE]: 'cyan',
    [WorkflowState.WRITING]: 'blue',
    [WorkflowState.WRITING_COMPLETE]: 'cyan',
    [WorkflowState.SAVING]: 'blue',
    [WorkflowState.COMPLETE]: 'green',
    [WorkflowState.FAILED]: 'red',
    [WorkflowState.ROLLED_BACK]: 'yellow',
  };

  return colorize(state.toUpperCase(), stateColors[state]);
}

/**
 * Format a relative time (e.g., "2 hours ago").
 */
export function formatRelativeTime(date: Date, now: number = Date.now()): string {
  const diff = now - date.getTime();

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Format a workflow snapshot for detailed display.
 */
export function formatSnapshotDetail(path: string, snapshot: WorkflowSnapshot): string {
  const { data } = snapshot;
  const lines: string[] = [];

  lines.push(bold('Workflow State'));
  lines.push('');
  lines.push(`${bold('File:')}         ${path}`);
  lines.push(`${bold('Session:')}      ${data.sessionId}`);
  lines.push(`${bold('Keyword:')}      ${data.keyword}`);
  lines.push(`${bold('State:')}        ${formatState(snapshot.state)} ${dim(`(${describeState(snapshot.state)})`)}`);
  lines.push(`${bold('Updated:')}      ${snapshot.timestamp} (${dim(formatRelativeTime(new Date(snapshot.timestamp)))})`);
  lines.push(`${bold('Started:')}      ${data.startedAt}`);

  if (data.resumed) {
    lines.push(`${bold('Resumed:')}      yes`);
  }
  if (snapshot.stagingDir) {
    lines.push(`${bold('Staging:')}      ${snapshot.stagingDir}`);
  }

  switch (snapshot.state) {
    case WorkflowState.RESEARCH_COMPLETE:
    case WorkflowState.WRITING:
    case WorkflowState.WRITING_COMPLETE:
    case WorkflowState.SAVING:
    case WorkflowState.COMPLETE:
      lines.push('');
      lines.push(bold('Research:'));
      lines.push(`  ${dim('Sources:')}      ${snapshot.data.research.sourceCount}`);
      lines.push(`  ${dim('Completed:')}    ${snapshot.data.research.completedAt}`);
      break;
    case WorkflowState.FAILED:
    case WorkflowState.ROLLED_BACK:
      lines.push('');
      lines.push(`${bold(red('Failure:'))}`);
      lines.push(`  ${red(`${snapshot.data.failure.name}: ${snapshot.data.failure.message}`)}`);
      lines.push(`  ${dim('While:')}        ${snapshot.data.failure.failedState}`);
      break;
    default:
      break;
  }

  if (data.warnings.length > 0) {
    lines.push('');
    lines.push(bold('Warnings:'));
    for (const warning of data.warnings) {
      lines.push(`  ${yellow('!')} ${truncate(warning.message, 100)} ${dim(`[${warning.type}]`)}`);
    }
  }

  return lines.join('\n');
}

export function formatCleanupResult(result: OrphanCleanupResult): string {
  const lines = [
    formatSuccess(
      `Removed ${result.snapshotsRemoved} snapshot file(s) and ${result.dirsRemoved} staging director${result.dirsRemoved === 1 ? 'y' : 'ies'}`
    ),
  ];
  for (const failure of result.failures) {
    lines.push(formatWarning(`Could not remove ${failure.path}: ${failure.error}`));
  }
  return lines.join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
