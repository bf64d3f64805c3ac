import type { ArticleOutput, ResearchFindings } from './content.js';

// Workflow State (State Machine States)
export const WorkflowState = {
  INITIALIZED: 'initialized',
  RESEARCHING: 'researching',
  RESEARCH_COMPLETE: 'research_complete',
  WRITING: 'writing',
  WRITING_COMPLETE: 'writing_complete',
  SAVING: 'saving',
  COMPLETE: 'complete',
  FAILED: 'failed',
  ROLLED_BACK: 'rolled_back',
} as const;

export type WorkflowState = (typeof WorkflowState)[keyof typeof WorkflowState];

export const WORKFLOW_STATES: readonly WorkflowState[] = Object.values(WorkflowState);

export function isWorkflowState(value: unknown): value is WorkflowState {
  return typeof value === 'string' && WORKFLOW_STATES.some((state) => state === value);
}

// Phase names delivered to progress callbacks
export type ProgressPhase =
  | 'research'
  | 'research_complete'
  | 'writing'
  | 'writing_complete'
  | 'saving'
  | 'complete'
  | 'warning'
  | 'failed';

export type ProgressCallback = (phase: ProgressPhase, message: string) => void;

// Workflow Warning
export const WorkflowWarningType = {
  LOW_SOURCE_COUNT: 'low_source_count',
  PERSISTENCE: 'persistence',
  SINK_FAILED: 'sink_failed',
} as const;

export type WorkflowWarningType = (typeof WorkflowWarningType)[keyof typeof WorkflowWarningType];

export interface WorkflowWarning {
  type: WorkflowWarningType;
  message: string;
  state: WorkflowState;
  timestamp: string;
}

// Per-phase payloads
export interface ResearchPhaseData {
  findings: ResearchFindings;
  sourceCount: number;
  completedAt: string;
}

export interface WritingPhaseData {
  article: ArticleOutput;
  completedAt: string;
}

export interface SavingPhaseData {
  stagingDir: string;
  finalDir: string;
  completedAt: string | null;
}

export interface FailureData {
  name: string;
  message: string;
  /** State the run was in when the error surfaced */
  failedState: WorkflowState;
  failedAt: string;
}

/**
 * Fields present in every state.
 */
export interface WorkflowBaseData {
  keyword: string;
  sessionId: string;
  startedAt: string;
  resumed: boolean;
  warnings: WorkflowWarning[];
}

export type ResearchedData = WorkflowBaseData & { research: ResearchPhaseData };
export type WrittenData = ResearchedData & { writing: WritingPhaseData };
export type SavingData = WrittenData & { saving: SavingPhaseData };
export type FailedData = WorkflowBaseData & {
  research?: ResearchPhaseData;
  writing?: WritingPhaseData;
  saving?: SavingPhaseData;
  failure: FailureData;
};

/**
 * Persisted progress of one run. Each state carries exactly the phase data
 * that has to exist once the run reaches it.
 */
export type WorkflowSnapshot =
  | {
      state: typeof WorkflowState.INITIALIZED | typeof WorkflowState.RESEARCHING;
      timestamp: string;
      stagingDir: null;
      data: WorkflowBaseData;
    }
  | {
      state: typeof WorkflowState.RESEARCH_COMPLETE | typeof WorkflowState.WRITING;
      timestamp: string;
      stagingDir: null;
      data: ResearchedData;
    }
  | {
      state: typeof WorkflowState.WRITING_COMPLETE;
      timestamp: string;
      stagingDir: null;
      data: WrittenData;
    }
  | {
      state: typeof WorkflowState.SAVING | typeof WorkflowState.COMPLETE;
      timestamp: string;
      stagingDir: string | null;
      data: SavingData;
    }
  | {
      state: typeof WorkflowState.FAILED | typeof WorkflowState.ROLLED_BACK;
      timestamp: string;
      stagingDir: string | null;
      data: FailedData;
    };

/**
 * On-disk JSON shape of a snapshot.
 */
export interface SnapshotFile {
  state: WorkflowState;
  timestamp: string;
  data: WorkflowSnapshot['data'];
  temp_dir: string | null;
}

// Collaborator contracts
export interface OperationContext {
  signal?: AbortSignal;
}

export type ResearchOperation = (
  keyword: string,
  context: OperationContext
) => Promise<ResearchFindings>;

export type WritingOperation = (
  keyword: string,
  research: ResearchFindings,
  context: OperationContext
) => Promise<ArticleOutput>;

export interface ContentOperations {
  research: ResearchOperation;
  write: WritingOperation;
}

/**
 * Result of a committed run handed to output sinks.
 */
export interface CommittedOutput {
  keyword: string;
  sessionId: string;
  outputDir: string;
  indexPath: string;
  articlePath: string;
  researchPath: string;
}

export interface OutputSink {
  name: string;
  publish(output: CommittedOutput, context: OperationContext): Promise<void>;
}

export interface OrphanCleanupResult {
  snapshotsRemoved: number;
  dirsRemoved: number;
  failures: Array<{ path: string; error: string }>;
}
