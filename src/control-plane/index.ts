export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  formatState,
  formatRelativeTime,
  truncate,
  formatSnapshotDetail,
  formatCleanupResult,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  formatJson,
  print,
  printError,
} from './formatter.js';

export {
  createProgram,
  runCli,
  createCleanupCommand,
  createGenerateCommand,
  createInspectCommand,
  createResumeCommand,
  loadOperations,
  resolveOperations,
} from './cli.js';
