import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readdir, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { withOrchestrator } from '../src/orchestrator/scope.js';
import { TransientOperationError } from '../src/orchestrator/errors.js';
import { WorkflowState, type OperationContext } from '../src/types/index.js';
import { fixedClock, makeOperations, makeResearch } from './helpers/content.js';

describe('withOrchestrator', () => {
  let root: string;

  beforeEach(async () => {
    root = join(tmpdir(), `seo-pipeline-scope-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(root, { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should return the result of a completed run', async () => {
    const indexPath = await withOrchestrator(
      { outputDir: root, operations: makeOperations(), now: fixedClock },
      (orchestrator) => orchestrator.runFullWorkflow('diabetes management')
    );

    expect(indexPath).toBe(join(root, 'diabetes_management_20240115_103000', 'index.html'));
    expect(await readdir(root)).toEqual(['diabetes_management_20240115_103000']);
  });

  it('should clean up an unfinished run when the caller throws', async () => {
    let snapshotPath: string | null = null;

    await expect(
      withOrchestrator({ outputDir: root, operations: makeOperations() }, async (orchestrator) => {
        await orchestrator.runResearch('diabetes management');
        snapshotPath = orchestrator.snapshotPath;
        expect(orchestrator.currentState).toBe(WorkflowState.RESEARCH_COMPLETE);
        throw new Error('caller gave up');
      })
    ).rejects.toThrow('caller gave up');

    expect(snapshotPath).not.toBeNull();
    expect(await readdir(root)).toEqual([]);
  });

  it('should roll back and clean up when the run is aborted mid-phase', async () => {
    const controller = new AbortController();
    const research = vi.fn(async (keyword: string, context: OperationContext) => {
      controller.abort();
      context.signal?.throwIfAborted();
      return makeResearch(keyword);
    });

    const error = await withOrchestrator(
      { outputDir: root, operations: { research, write: makeOperations().write } },
      (orchestrator) =>
        orchestrator.runFullWorkflow('diabetes management', { signal: controller.signal })
    ).catch((e: unknown) => e);

    expect(error instanceof Error ? error.name : error).toBe('AbortError');

    expect(research).toHaveBeenCalledTimes(1);
    expect(await readdir(root)).toEqual([]);
  });

  it('should cut a retry delay short when aborted', async () => {
    const controller = new AbortController();
    const research = vi.fn(async (): Promise<never> => {
      throw new TransientOperationError('search timeout');
    });
    const started = Date.now();

    const error = await withOrchestrator(
      {
        outputDir: root,
        operations: { research, write: makeOperations().write },
        retryPolicy: { backoffMs: 60000, jitter: false },
      },
      (orchestrator) => {
        orchestrator.setProgressCallback((_, message) => {
          if (message.startsWith('Research attempt 1 failed')) {
            controller.abort();
          }
        });
        return orchestrator.runFullWorkflow('diabetes management', { signal: controller.signal });
      }
    ).catch((e: unknown) => e);

    expect(error instanceof Error ? error.name : error).toBe('AbortError');

    expect(Date.now() - started).toBeLessThan(5000);
    expect(research).toHaveBeenCalledTimes(1);
    expect(existsSync(root)).toBe(true);
    expect(await readdir(root)).toEqual([]);
  });
});
