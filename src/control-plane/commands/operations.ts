import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  articleOutputSchema,
  researchFindingsSchema,
  type ContentOperations,
} from '../../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Adapt a loaded module to ContentOperations. Results are validated, since
 * nothing types the module at compile time.
 */
export function resolveOperations(loaded: unknown): ContentOperations | null {
  const candidate = isRecord(loaded) && isRecord(loaded['default']) ? loaded['default'] : loaded;
  if (!isRecord(candidate)) {
    return null;
  }

  const research = candidate['research'];
  const write = candidate['write'];
  if (typeof research !== 'function' || typeof write !== 'function') {
    return null;
  }

  return {
    research: async (keyword, context) => {
      const result: unknown = await research.call(candidate, keyword, context);
      return researchFindingsSchema.parse(result);
    },
    write: async (keyword, findings, context) => {
      const result: unknown = await write.call(candidate, keyword, findings, context);
      return articleOutputSchema.parse(result);
    },
  };
}

/**
 * Import the module named by `--operations`.
 */
export async function loadOperations(modulePath: string): Promise<ContentOperations> {
  const loaded: unknown = await import(pathToFileURL(resolve(modulePath)).href);
  const operations = resolveOperations(loaded);
  if (!operations) {
    throw new Error(`${modulePath} does not export research() and write() operations`);
  }
  return operations;
}

/**
 * Run `fn` with a signal that aborts on Ctrl-C.
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSignal = (): void => controller.abort();
  process.once('SIGINT', onSignal);

  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSignal);
  }
}
