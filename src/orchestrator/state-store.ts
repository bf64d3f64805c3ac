/**
 * Workflow snapshot persistence.
 *
 * Snapshots are best-effort: a failed write or delete is reported as a
 * PersistenceWarning in the returned result and logged, never thrown, so a
 * disk hiccup cannot abort an otherwise healthy phase. Loading returns a
 * typed failure instead of throwing and leaves fatality to the caller.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import {
  WorkflowState,
  WorkflowWarningType,
  articleOutputSchema,
  isWorkflowState,
  researchFindingsSchema,
  type FailedData,
  type FailureData,
  type ResearchPhaseData,
  type SavingPhaseData,
  type SnapshotFile,
  type WorkflowBaseData,
  type WorkflowSnapshot,
  type WritingPhaseData,
} from '../types/index.js';
import { sessionIdFromSnapshotPath } from '../artifacts/paths.js';
import { getPhaseIndex } from './state-machine.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('state-store');

/**
 * A snapshot read or write that did not happen. The run continues, but may
 * no longer be resumable.
 */
export interface PersistenceWarning {
  operation: 'save' | 'delete' | 'discard';
  path: string;
  message: string;
  timestamp: string;
}

export type PersistResult = { ok: true } | { ok: false; warning: PersistenceWarning };

export type LoadFailureReason =
  | 'not_found'
  | 'unreadable'
  | 'malformed'
  | 'unknown_state'
  | 'missing_keyword';

export type LoadResult =
  | { ok: true; snapshot: WorkflowSnapshot }
  | { ok: false; reason: LoadFailureReason; message: string; cause?: unknown };

const snapshotEnvelopeSchema = z.object({
  state: z.string(),
  timestamp: z.string(),
  data: z.record(z.unknown()),
  temp_dir: z.string().nullable().optional(),
});

const researchPhaseSchema = z.object({
  findings: researchFindingsSchema,
  sourceCount: z.number().int().nonnegative(),
  completedAt: z.string(),
});

const writingPhaseSchema = z.object({
  article: articleOutputSchema,
  completedAt: z.string(),
});

const savingPhaseSchema = z.object({
  stagingDir: z.string(),
  finalDir: z.string(),
  completedAt: z.string().nullable(),
});

const failureSchema = z.object({
  name: z.string(),
  message: z.string(),
  failedState: z.nativeEnum(WorkflowState),
  failedAt: z.string(),
});

const warningSchema = z.object({
  type: z.nativeEnum(WorkflowWarningType),
  message: z.string(),
  state: z.nativeEnum(WorkflowState),
  timestamp: z.string(),
});

export interface PhasePayloads {
  research: ResearchPhaseData | null;
  writing: WritingPhaseData | null;
  saving: SavingPhaseData | null;
}

export function persistenceWarning(
  operation: PersistenceWarning['operation'],
  path: string,
  error: unknown
): PersistenceWarning {
  return {
    operation,
    path,
    message: error instanceof Error ? error.message : String(error),
    timestamp: new Date().toISOString(),
  };
}

export function toSnapshotFile(snapshot: WorkflowSnapshot): SnapshotFile {
  return {
    state: snapshot.state,
    timestamp: snapshot.timestamp,
    data: snapshot.data,
    temp_dir: snapshot.stagingDir,
  };
}

export class StateStore {
  /**
   * Write a snapshot as `{state, timestamp, data, temp_dir}`.
   */
  async save(path: string, snapshot: WorkflowSnapshot): Promise<PersistResult> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(toSnapshotFile(snapshot), null, 2), 'utf-8');
      log.debug({ path, state: snapshot.state }, 'Workflow state saved');
      return { ok: true };
    } catch (error) {
      const warning = persistenceWarning('save', path, error);
      log.warn({ path, state: snapshot.state, error: warning.message }, 'Failed to save workflow state');
      return { ok: false, warning };
    }
  }

  async load(path: string): Promise<LoadResult> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      const reason: LoadFailureReason = code === 'ENOENT' ? 'not_found' : 'unreadable';
      log.debug({ path, code }, 'Workflow state not readable');
      return {
        ok: false,
        reason,
        message: reason === 'not_found' ? 'State file not found' : 'State file could not be read',
        cause: error,
      };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      return { ok: false, reason: 'malformed', message: 'State file is not valid JSON', cause: error };
    }

    const envelope = snapshotEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return {
        ok: false,
        reason: 'malformed',
        message: `State file has an invalid structure: ${envelope.error.message}`,
        cause: envelope.error,
      };
    }

    const { state, timestamp, data } = envelope.data;
    if (!isWorkflowState(state)) {
      return { ok: false, reason: 'unknown_state', message: `Unknown workflow state: ${state}` };
    }

    const keyword = typeof data['keyword'] === 'string' ? data['keyword'].trim() : '';
    if (keyword.length === 0) {
      return { ok: false, reason: 'missing_keyword', message: 'State file has no keyword' };
    }

    const snapshot = decodeSnapshot(path, state, timestamp, envelope.data.temp_dir ?? null, keyword, data);
    log.debug({ path, declaredState: state, state: snapshot.state }, 'Workflow state loaded');
    return { ok: true, snapshot };
  }

  /**
   * Remove a snapshot file. A file that is already gone counts as success.
   */
  async delete(path: string): Promise<PersistResult> {
    try {
      await rm(path, { force: true });
      log.debug({ path }, 'Workflow state deleted');
      return { ok: true };
    } catch (error) {
      const warning = persistenceWarning('delete', path, error);
      log.warn({ path, error: warning.message }, 'Failed to delete workflow state');
      return { ok: false, warning };
    }
  }
}

function decodeSnapshot(
  path: string,
  declared: WorkflowState,
  timestamp: string,
  stagingDir: string | null,
  keyword: string,
  data: Record<string, unknown>
): WorkflowSnapshot {
  const base: WorkflowBaseData = {
    keyword,
    sessionId:
      typeof data['sessionId'] === 'string' && data['sessionId'].length > 0
        ? data['sessionId']
        : sessionIdFromSnapshotPath(path) ?? keyword,
    startedAt: typeof data['startedAt'] === 'string' ? data['startedAt'] : timestamp,
    resumed: data['resumed'] === true,
    warnings: z.array(warningSchema).catch([]).parse(data['warnings']),
  };

  const payloads: PhasePayloads = {
    research: parseOrNull(researchPhaseSchema, data['research']),
    writing: parseOrNull(writingPhaseSchema, data['writing']),
    saving: parseOrNull(savingPhaseSchema, data['saving']),
  };

  if (declared === WorkflowState.FAILED || declared === WorkflowState.ROLLED_BACK) {
    const failure: FailureData = parseOrNull(failureSchema, data['failure']) ?? {
      name: 'Error',
      message: 'No failure details recorded',
      failedState: WorkflowState.RESEARCHING,
      failedAt: timestamp,
    };
    const failedData: FailedData = {
      ...base,
      failure: { ...failure, failedState: supportedState(failure.failedState, payloads) },
    };
    if (payloads.research) failedData.research = payloads.research;
    if (payloads.writing) failedData.writing = payloads.writing;
    if (payloads.saving) failedData.saving = payloads.saving;

    return { state: declared, timestamp, stagingDir, data: failedData };
  }

  return buildSnapshot(supportedState(declared, payloads), timestamp, stagingDir, base, payloads);
}

/**
 * The latest state at or before `declared` whose phase data is present.
 * A research_complete snapshot without readable research is treated as
 * researching, so resume only ever branches on the state.
 */
export function supportedState(declared: WorkflowState, payloads: PhasePayloads): WorkflowState {
  const index = getPhaseIndex(declared);
  if (index < 0) {
    return declared;
  }

  const candidates: WorkflowState[] = [
    WorkflowState.COMPLETE,
    WorkflowState.SAVING,
    WorkflowState.WRITING_COMPLETE,
    WorkflowState.WRITING,
    WorkflowState.RESEARCH_COMPLETE,
    WorkflowState.RESEARCHING,
    WorkflowState.INITIALIZED,
  ];

  for (const candidate of candidates) {
    if (getPhaseIndex(candidate) <= index && hasPayloadFor(candidate, payloads)) {
      return candidate;
    }
  }
  return WorkflowState.INITIALIZED;
}

function hasPayloadFor(state: WorkflowState, payloads: PhasePayloads): boolean {
  switch (state) {
    case WorkflowState.RESEARCH_COMPLETE:
    case WorkflowState.WRITING:
      return payloads.research !== null;
    case WorkflowState.WRITING_COMPLETE:
      return payloads.research !== null && payloads.writing !== null;
    case WorkflowState.SAVING:
    case WorkflowState.COMPLETE:
      return payloads.research !== null && payloads.writing !== null && payloads.saving !== null;
    default:
      return true;
  }
}

function buildSnapshot(
  state: WorkflowState,
  timestamp: string,
  stagingDir: string | null,
  base: WorkflowBaseData,
  payloads: PhasePayloads
): WorkflowSnapshot {
  const { research, writing, saving } = payloads;

  switch (state) {
    case WorkflowState.SAVING:
    case WorkflowState.COMPLETE:
      if (research && writing && saving) {
        return { state, timestamp, stagingDir, data: { ...base, research, writing, saving } };
      }
      break;
    case WorkflowState.WRITING_COMPLETE:
      if (research && writing) {
        return { state, timestamp, stagingDir: null, data: { ...base, research, writing } };
      }
      break;
    case WorkflowState.RESEARCH_COMPLETE:
    case WorkflowState.WRITING:
      if (research) {
        return { state, timestamp, stagingDir: null, data: { ...base, research } };
      }
      break;
    case WorkflowState.INITIALIZED:
    case WorkflowState.RESEARCHING:
      return { state, timestamp, stagingDir: null, data: base };
    default:
      break;
  }

  return { state: WorkflowState.RESEARCHING, timestamp, stagingDir: null, data: base };
}

function parseOrNull<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> | null {
  const result = schema.safeParse(value);
  return result.success ? result.data : null;
}
