/**
 * Workflow Orchestrator
 *
 * Drives one article run through research, writing and saving. Every
 * transition is persisted as a snapshot so an interrupted run can be resumed
 * from its last completed phase; outputs are published with a single rename
 * and a failed run is rolled back.
 *
 * One instance owns one run. Concurrent runs use separate instances, each
 * with its own session id, snapshot file and staging directory.
 */

import { basename, dirname, resolve } from 'node:path';
import {
  WorkflowState,
  WorkflowWarningType,
  getUsableSources,
  type ArticleOutput,
  type CommittedOutput,
  type ContentOperations,
  type FailedData,
  type OperationContext,
  type OrphanCleanupResult,
  type OutputSink,
  type ProgressCallback,
  type ProgressPhase,
  type ResearchFindings,
  type ResearchPhaseData,
  type SavingPhaseData,
  type WorkflowBaseData,
  type WorkflowSnapshot,
  type WorkflowWarning,
  type WritingPhaseData,
} from '../types/index.js';
import {
  MAX_KEYWORD_LENGTH,
  createSessionId,
  getFinalDir,
  getSnapshotPath,
  getStagingDir,
  isStagingDirName,
} from '../artifacts/paths.js';
import { AtomicOutputCommitter, writeArtifacts, type ArtifactPaths } from '../artifacts/committer.js';
import { ProgressReporter } from '../observability/progress-reporter.js';
import type { PipelineConfig } from '../config/index.js';
import {
  CommitError,
  InvalidTransitionError,
  SnapshotLoadError,
  ValidationError,
  toError,
} from './errors.js';
import { OrphanCollector } from './orphan-collector.js';
import {
  createRetryPolicyEngine,
  type RetryExecuteOptions,
  type RetryPolicy,
  type RetryPolicyEngine,
} from './retry-policy.js';
import { assertTransition, getPhaseIndex, isActiveState } from './state-machine.js';
import { StateStore, type PersistenceWarning } from './state-store.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workflow-orchestrator');

/** Below this many usable sources a run continues with a warning. */
export const MIN_RECOMMENDED_SOURCES = 3;

export interface WorkflowOrchestratorOptions {
  /** Root holding snapshots, staging directories and committed outputs */
  outputDir: string;
  operations: ContentOperations;
  /** Research retry policy, merged over the default */
  retryPolicy?: Partial<RetryPolicy>;
  /** Keep FAILED snapshots on disk instead of rolling back */
  retainFailedSnapshots?: boolean;
  sinks?: OutputSink[];
  /** Clock used for session ids, directory names and timestamps */
  now?: () => Date;
  stateStore?: StateStore;
  committer?: AtomicOutputCommitter;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Trimmed keyword, or ValidationError when it is empty or too long.
 */
export function validateKeyword(keyword: string): string {
  const trimmed = keyword.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Keyword cannot be empty');
  }
  if (trimmed.length > MAX_KEYWORD_LENGTH) {
    throw new ValidationError('Keyword too long');
  }
  return trimmed;
}

interface PhaseDataView {
  research: ResearchPhaseData | undefined;
  writing: WritingPhaseData | undefined;
  saving: SavingPhaseData | undefined;
}

function phasesOf(snapshot: WorkflowSnapshot): PhaseDataView {
  switch (snapshot.state) {
    case WorkflowState.INITIALIZED:
    case WorkflowState.RESEARCHING:
      return { research: undefined, writing: undefined, saving: undefined };
    case WorkflowState.RESEARCH_COMPLETE:
    case WorkflowState.WRITING:
      return { research: snapshot.data.research, writing: undefined, saving: undefined };
    case WorkflowState.WRITING_COMPLETE:
      return { research: snapshot.data.research, writing: snapshot.data.writing, saving: undefined };
    case WorkflowState.SAVING:
    case WorkflowState.COMPLETE:
    case WorkflowState.FAILED:
    case WorkflowState.ROLLED_BACK:
      return {
        research: snapshot.data.research,
        writing: snapshot.data.writing,
        saving: snapshot.data.saving,
      };
  }
}

function baseData(data: WorkflowBaseData): WorkflowBaseData {
  return {
    keyword: data.keyword,
    sessionId: data.sessionId,
    startedAt: data.startedAt,
    resumed: data.resumed,
    warnings: data.warnings,
  };
}

/**
 * Roll a loaded snapshot back to the last state whose work is complete.
 * In-flight phases are redone; a failed run re-enters where it failed.
 */
export function restoreSnapshot(snapshot: WorkflowSnapshot, timestamp: string): WorkflowSnapshot {
  const base: WorkflowBaseData = { ...baseData(snapshot.data), resumed: true };
  const resumeFrom =
    snapshot.state === WorkflowState.FAILED ? snapshot.data.failure.failedState : snapshot.state;
  const phase = getPhaseIndex(resumeFrom);
  const { research, writing } = phasesOf(snapshot);

  if (research && writing && phase >= getPhaseIndex(WorkflowState.WRITING_COMPLETE)) {
    return {
      state: WorkflowState.WRITING_COMPLETE,
      timestamp,
      stagingDir: null,
      data: { ...base, research, writing },
    };
  }
  if (research && phase >= getPhaseIndex(WorkflowState.RESEARCH_COMPLETE)) {
    return {
      state: WorkflowState.RESEARCH_COMPLETE,
      timestamp,
      stagingDir: null,
      data: { ...base, research },
    };
  }
  return { state: WorkflowState.INITIALIZED, timestamp, stagingDir: null, data: base };
}

export function optionsFromConfig(
  config: PipelineConfig,
  operations: ContentOperations
): WorkflowOrchestratorOptions {
  return {
    outputDir: config.outputDir,
    operations,
    retryPolicy: {
      maxAttempts: config.retry.maxAttempts,
      backoffMs: config.retry.backoffMs,
      maxBackoffMs: config.retry.maxBackoffMs,
    },
    retainFailedSnapshots: config.retainFailedSnapshots,
  };
}

export class WorkflowOrchestrator {
  private readonly outputRoot: string;
  private readonly operations: ContentOperations;
  private readonly retryEngine: RetryPolicyEngine;
  private readonly store: StateStore;
  private readonly committer: AtomicOutputCommitter;
  private readonly progress = new ProgressReporter();
  private readonly sinks: readonly OutputSink[];
  private readonly now: () => Date;
  private readonly retainFailedSnapshots: boolean;

  private current: WorkflowSnapshot | null = null;
  private statePath: string | null = null;
  private activeStagingDir: string | null = null;
  // Set after a commit failure; the staging directory is left for inspection
  private preserveStaging = false;
  private signal: AbortSignal | undefined;
  private readonly persistenceIssues: PersistenceWarning[] = [];

  constructor(options: WorkflowOrchestratorOptions) {
    this.outputRoot = options.outputDir;
    this.operations = options.operations;
    this.retryEngine = createRetryPolicyEngine(options.retryPolicy);
    this.store = options.stateStore ?? new StateStore();
    this.committer = options.committer ?? new AtomicOutputCommitter(options.outputDir);
    this.sinks = options.sinks ?? [];
    this.now = options.now ?? ((): Date => new Date());
    this.retainFailedSnapshots = options.retainFailedSnapshots ?? false;
  }

  /**
   * Build an orchestrator from environment configuration.
   */
  static fromConfig(
    config: PipelineConfig,
    operations: ContentOperations,
    extra: Pick<WorkflowOrchestratorOptions, 'sinks' | 'now'> = {}
  ): WorkflowOrchestrator {
    return new WorkflowOrchestrator({ ...extra, ...optionsFromConfig(config, operations) });
  }

  /**
   * Sweep stale snapshots and staging directories under `outputRoot`.
   * Never throws.
   */
  static cleanupOrphanedFiles(
    outputRoot: string,
    olderThanHours: number
  ): Promise<OrphanCleanupResult> {
    return new OrphanCollector(outputRoot).collect(olderThanHours);
  }

  get currentState(): WorkflowState {
    return this.current?.state ?? WorkflowState.INITIALIZED;
  }

  get snapshot(): WorkflowSnapshot | null {
    return this.current;
  }

  get snapshotPath(): string | null {
    return this.statePath;
  }

  get stagingDir(): string | null {
    return this.activeStagingDir;
  }

  get sessionId(): string | null {
    return this.current?.data.sessionId ?? null;
  }

  get warnings(): readonly WorkflowWarning[] {
    return this.current?.data.warnings ?? [];
  }

  get persistenceWarnings(): readonly PersistenceWarning[] {
    return this.persistenceIssues;
  }

  setProgressCallback(callback: ProgressCallback | null): void {
    this.progress.setCallback(callback);
  }

  reportProgress(phase: ProgressPhase, message: string): void {
    this.progress.report(phase, message, { sessionId: this.sessionId });
  }

  /**
   * Run research, writing and saving for `keyword` and return the path of
   * the committed review page. On failure the run is rolled back and the
   * original error is re-thrown.
   */
  async runFullWorkflow(keyword: string, options: RunOptions = {}): Promise<string> {
    const normalized = validateKeyword(keyword);
    this.signal = options.signal;
    await this.begin(normalized);
    log.info({ sessionId: this.sessionId, keyword: normalized }, 'Starting workflow');
    return this.drive();
  }

  /**
   * Continue a run from a snapshot file written by an earlier process.
   */
  async resumeWorkflow(stateFile: string, options: RunOptions = {}): Promise<string> {
    this.assertFresh();

    const loaded = await this.store.load(stateFile);
    if (!loaded.ok) {
      if (loaded.reason === 'not_found' || loaded.reason === 'unreadable') {
        throw new SnapshotLoadError(stateFile, loaded.message, loaded.cause);
      }
      throw new ValidationError(`Cannot resume from ${stateFile}: ${loaded.message}`);
    }

    const { snapshot } = loaded;
    if (snapshot.state === WorkflowState.COMPLETE || snapshot.state === WorkflowState.ROLLED_BACK) {
      throw new ValidationError(
        `Workflow ${snapshot.data.sessionId} is already ${snapshot.state}; nothing to resume`
      );
    }

    try {
      validateKeyword(snapshot.data.keyword);
    } catch (error) {
      throw new ValidationError(`Cannot resume from ${stateFile}: ${toError(error).message}`);
    }

    this.signal = options.signal;
    this.statePath = stateFile;
    await this.discardStaleStaging(snapshot.stagingDir);

    const restored = restoreSnapshot(snapshot, this.timestamp());
    this.current = restored;
    await this.persist();

    log.info(
      {
        sessionId: restored.data.sessionId,
        savedState: snapshot.state,
        resumeState: restored.state,
      },
      'Resuming workflow'
    );
    return this.drive();
  }

  /**
   * Research phase with bounded retry on transient failures.
   */
  async runResearch(keyword: string): Promise<ResearchFindings> {
    const normalized = validateKeyword(keyword);
    if (!this.current) {
      await this.begin(normalized);
    }

    const start = this.requireSnapshot();
    this.throwIfAborted();
    await this.transition({
      state: WorkflowState.RESEARCHING,
      timestamp: this.timestamp(),
      stagingDir: null,
      data: baseData(start.data),
    });
    this.reportProgress('research', `Researching "${normalized}"...`);

    const retryOptions: RetryExecuteOptions<ResearchFindings> = {
      onAttempt: (attempt) => {
        if (attempt.willRetry && attempt.error) {
          this.reportProgress(
            'research',
            `Research attempt ${attempt.attempt + 1} failed (${attempt.error.message}), ` +
              `retrying in ${attempt.nextRetryMs ?? 0}ms`
          );
        }
      },
    };
    if (this.signal) {
      retryOptions.signal = this.signal;
    }

    const outcome = await this.retryEngine.execute(async () => {
      const findings = await this.operations.research(normalized, this.context());
      this.throwIfAborted();
      if (getUsableSources(findings).length === 0) {
        throw new ValidationError('No academic sources found in research results');
      }
      return findings;
    }, retryOptions);

    if (!outcome.success || outcome.result === null) {
      throw outcome.finalError ?? new Error('Research failed');
    }

    const findings = outcome.result;
    const sourceCount = getUsableSources(findings).length;
    if (sourceCount < MIN_RECOMMENDED_SOURCES) {
      this.addWarning(
        WorkflowWarningType.LOW_SOURCE_COUNT,
        `Only found ${sourceCount} usable sources (recommended minimum is ${MIN_RECOMMENDED_SOURCES})`
      );
    }

    const researching = this.requireSnapshot();
    const completedAt = this.timestamp();
    await this.transition({
      state: WorkflowState.RESEARCH_COMPLETE,
      timestamp: completedAt,
      stagingDir: null,
      data: { ...baseData(researching.data), research: { findings, sourceCount, completedAt } },
    });
    this.reportProgress('research_complete', `Research complete: ${sourceCount} sources found`);

    return findings;
  }

  /**
   * Writing phase. Called once, without retry.
   */
  async runWriting(keyword: string, research: ResearchFindings): Promise<ArticleOutput> {
    const start = this.requireSnapshot();
    if (start.state !== WorkflowState.RESEARCH_COMPLETE) {
      throw new InvalidTransitionError(start.state, WorkflowState.WRITING);
    }
    this.throwIfAborted();

    await this.transition({
      state: WorkflowState.WRITING,
      timestamp: this.timestamp(),
      stagingDir: null,
      data: start.data,
    });
    this.reportProgress('writing', `Writing article for "${keyword}"...`);

    const article = await this.operations.write(keyword, research, this.context());
    this.throwIfAborted();

    const cited = article.sourcesUsed.filter((url) => url.trim().length > 0);
    if (cited.length === 0) {
      throw new ValidationError('Article does not cite any sources');
    }

    const completedAt = this.timestamp();
    await this.transition({
      state: WorkflowState.WRITING_COMPLETE,
      timestamp: completedAt,
      stagingDir: null,
      data: { ...start.data, writing: { article, completedAt } },
    });
    this.reportProgress(
      'writing_complete',
      `Article written: "${article.title}" (${article.wordCount} words)`
    );

    return article;
  }

  /**
   * Write the artifact set straight into a new output directory, without
   * staging or state tracking.
   */
  async saveOutputs(
    keyword: string,
    research: ResearchFindings,
    article: ArticleOutput
  ): Promise<string> {
    const normalized = validateKeyword(keyword);
    const savedAt = this.now();
    const finalDir = getFinalDir(this.outputRoot, normalized, savedAt);
    const paths = await writeArtifacts(finalDir, normalized, research, article, savedAt);

    log.info({ outputDir: finalDir }, 'Outputs saved');
    return paths.indexPath;
  }

  /**
   * Stage the artifact set and publish it with one rename. Completes the run
   * and removes its snapshot.
   */
  async saveOutputsAtomic(
    keyword: string,
    research: ResearchFindings,
    article: ArticleOutput
  ): Promise<string> {
    const start = this.requireSnapshot();
    if (start.state !== WorkflowState.WRITING_COMPLETE) {
      throw new InvalidTransitionError(start.state, WorkflowState.SAVING);
    }
    this.throwIfAborted();

    const { sessionId } = start.data;
    const committedAt = this.now();
    const stagingDir = getStagingDir(this.outputRoot, sessionId);
    const finalDir = getFinalDir(this.outputRoot, keyword, committedAt);
    const saving: SavingPhaseData = { stagingDir, finalDir, completedAt: null };

    await this.transition({
      state: WorkflowState.SAVING,
      timestamp: this.timestamp(),
      stagingDir,
      data: { ...start.data, saving },
    });
    this.reportProgress('saving', 'Saving outputs...');

    this.activeStagingDir = stagingDir;
    await this.committer.stage(sessionId);
    await this.committer.writeArtifacts(stagingDir, keyword, research, article, committedAt);
    this.throwIfAborted();

    const paths: ArtifactPaths = await this.committer.commit(stagingDir, finalDir);
    this.activeStagingDir = null;

    const completedAt = this.timestamp();
    await this.transition(
      {
        state: WorkflowState.COMPLETE,
        timestamp: completedAt,
        stagingDir: null,
        data: { ...start.data, saving: { ...saving, completedAt } },
      },
      false
    );
    await this.removeSnapshot();

    this.reportProgress('complete', `Outputs saved to ${finalDir}`);
    log.info({ sessionId, outputDir: finalDir }, 'Workflow complete');

    await this.publish({
      keyword,
      sessionId,
      outputDir: finalDir,
      indexPath: paths.indexPath,
      articlePath: paths.articlePath,
      researchPath: paths.researchPath,
    });

    return paths.indexPath;
  }

  /**
   * Scope exit. An unfinished run loses its staging directory and snapshot;
   * a FAILED run kept for inspection and staging preserved after a commit
   * failure stay. Never throws.
   */
  async dispose(): Promise<void> {
    const current = this.current;
    if (!current || current.state === WorkflowState.COMPLETE) {
      return;
    }
    if (current.state === WorkflowState.FAILED && this.retainFailedSnapshots) {
      return;
    }

    try {
      if (this.activeStagingDir && !this.preserveStaging) {
        const result = await this.committer.discard(this.activeStagingDir);
        if (result.ok) {
          this.activeStagingDir = null;
        } else {
          this.persistenceIssues.push(result.warning);
        }
      }

      if (this.statePath) {
        const result = await this.store.delete(this.statePath);
        if (!result.ok) {
          this.persistenceIssues.push(result.warning);
        }
      }
    } catch (error) {
      log.error({ sessionId: current.data.sessionId, error }, 'Workflow cleanup failed');
    }

    log.debug({ sessionId: current.data.sessionId, state: current.state }, 'Workflow scope closed');
  }

  private async begin(keyword: string): Promise<void> {
    this.assertFresh();

    const startedAt = this.now();
    const sessionId = createSessionId(keyword, startedAt);
    this.statePath = getSnapshotPath(this.outputRoot, sessionId);
    this.current = {
      state: WorkflowState.INITIALIZED,
      timestamp: startedAt.toISOString(),
      stagingDir: null,
      data: {
        keyword,
        sessionId,
        startedAt: startedAt.toISOString(),
        resumed: false,
        warnings: [],
      },
    };
    await this.persist();
  }

  private async drive(): Promise<string> {
    try {
      const start = this.requireSnapshot();
      const { keyword } = start.data;

      if (start.state === WorkflowState.INITIALIZED) {
        await this.runResearch(keyword);
      }

      const researched = this.requireSnapshot();
      if (researched.state === WorkflowState.RESEARCH_COMPLETE) {
        await this.runWriting(keyword, researched.data.research.findings);
      }

      const written = this.requireSnapshot();
      if (written.state !== WorkflowState.WRITING_COMPLETE) {
        throw new InvalidTransitionError(written.state, WorkflowState.SAVING);
      }
      return await this.saveOutputsAtomic(
        keyword,
        written.data.research.findings,
        written.data.writing.article
      );
    } catch (error) {
      await this.handleFailure(error);
      throw error;
    }
  }

  private async handleFailure(error: unknown): Promise<void> {
    const current = this.current;
    if (!current || !isActiveState(current.state)) {
      return;
    }

    const err = toError(error);
    if (err instanceof CommitError) {
      this.preserveStaging = true;
    }

    const failedAt = this.timestamp();
    const { research, writing, saving } = phasesOf(current);
    const failedData: FailedData = {
      ...baseData(current.data),
      failure: { name: err.name, message: err.message, failedState: current.state, failedAt },
    };
    if (research) failedData.research = research;
    if (writing) failedData.writing = writing;
    if (saving) failedData.saving = saving;

    log.error(
      { sessionId: current.data.sessionId, state: current.state, error: err.message },
      'Workflow failed'
    );

    await this.transition({
      state: WorkflowState.FAILED,
      timestamp: failedAt,
      stagingDir: current.stagingDir,
      data: failedData,
    });
    this.reportProgress('failed', err.message);

    if (this.retainFailedSnapshots) {
      log.info(
        { sessionId: current.data.sessionId, snapshotPath: this.statePath },
        'Keeping failed workflow state'
      );
      return;
    }

    await this.rollback();
  }

  private async rollback(): Promise<void> {
    const failed = this.requireSnapshot();
    if (failed.state !== WorkflowState.FAILED) {
      return;
    }

    if (this.activeStagingDir && !this.preserveStaging) {
      const result = await this.committer.discard(this.activeStagingDir);
      if (result.ok) {
        this.activeStagingDir = null;
      } else {
        this.recordPersistenceWarning(result.warning);
      }
    }

    await this.removeSnapshot();
    await this.transition(
      {
        state: WorkflowState.ROLLED_BACK,
        timestamp: this.timestamp(),
        stagingDir: this.activeStagingDir,
        data: failed.data,
      },
      false
    );

    log.info(
      { sessionId: failed.data.sessionId, preservedStagingDir: this.activeStagingDir },
      'Workflow rolled back'
    );
  }

  private async transition(next: WorkflowSnapshot, persist = true): Promise<void> {
    const from = this.requireSnapshot();
    assertTransition(next.data.sessionId, from.state, next.state);
    this.current = next;
    if (persist) {
      await this.persist();
    }
  }

  private async persist(): Promise<void> {
    if (!this.current || !this.statePath) {
      return;
    }
    const result = await this.store.save(this.statePath, this.current);
    if (!result.ok) {
      this.recordPersistenceWarning(result.warning);
    }
  }

  private async removeSnapshot(): Promise<void> {
    if (!this.statePath) {
      return;
    }
    const result = await this.store.delete(this.statePath);
    if (!result.ok) {
      this.recordPersistenceWarning(result.warning);
    }
  }

  /**
   * Remove a staging directory recorded by an earlier process, but only one
   * that sits directly under this orchestrator's output root.
   */
  private async discardStaleStaging(stagingDir: string | null): Promise<void> {
    if (!stagingDir) {
      return;
    }

    const withinRoot = dirname(resolve(stagingDir)) === resolve(this.outputRoot);
    if (!withinRoot || !isStagingDirName(basename(stagingDir))) {
      log.warn({ stagingDir }, 'Ignoring staging directory outside the output root');
      return;
    }

    const result = await this.committer.discard(stagingDir);
    if (!result.ok) {
      this.recordPersistenceWarning(result.warning);
    }
  }

  private async publish(output: CommittedOutput): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.publish(output, this.context());
        log.debug({ sink: sink.name, outputDir: output.outputDir }, 'Published outputs');
      } catch (error) {
        this.addWarning(
          WorkflowWarningType.SINK_FAILED,
          `Output sink ${sink.name} failed: ${toError(error).message}`
        );
      }
    }
  }

  private addWarning(type: WorkflowWarning['type'], message: string): void {
    const current = this.current;
    if (!current) {
      return;
    }
    current.data.warnings.push({ type, message, state: current.state, timestamp: this.timestamp() });
    log.warn({ sessionId: current.data.sessionId, type }, message);
    this.reportProgress('warning', message);
  }

  private recordPersistenceWarning(warning: PersistenceWarning): void {
    this.persistenceIssues.push(warning);
    this.addWarning(
      WorkflowWarningType.PERSISTENCE,
      `Could not ${warning.operation} ${warning.path}: ${warning.message}`
    );
  }

  private requireSnapshot(): WorkflowSnapshot {
    if (!this.current) {
      throw new Error('No workflow in progress');
    }
    return this.current;
  }

  private assertFresh(): void {
    if (this.current) {
      throw new Error('Orchestrator already owns a workflow; use a new instance per run');
    }
  }

  private context(): OperationContext {
    return this.signal ? { signal: this.signal } : {};
  }

  private throwIfAborted(): void {
    this.signal?.throwIfAborted();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
