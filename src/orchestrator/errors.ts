/**
 * Error types for the article pipeline.
 *
 * Every thrown pipeline error carries a stable `code` so callers (and the CLI)
 * can branch without string matching on messages.
 */

import type { WorkflowState } from '../types/index.js';

export const PipelineErrorCode = {
  VALIDATION: 'validation_error',
  TRANSIENT: 'transient_operation_error',
  COMMIT: 'commit_error',
  SNAPSHOT_LOAD: 'snapshot_load_error',
  INVALID_TRANSITION: 'invalid_transition',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Bad input or a result that can never succeed. Never retried.
 */
export class ValidationError extends PipelineError {
  override readonly name = 'ValidationError';
  override readonly code = PipelineErrorCode.VALIDATION;
}

/**
 * Network or API failure in an external operation that may succeed on retry.
 */
export class TransientOperationError extends PipelineError {
  override readonly name = 'TransientOperationError';
  override readonly code = PipelineErrorCode.TRANSIENT;
}

/**
 * Filesystem failure while publishing a staging directory.
 * The staging directory is left in place for inspection.
 */
export class CommitError extends PipelineError {
  override readonly name = 'CommitError';
  override readonly code = PipelineErrorCode.COMMIT;
  readonly stagingDir: string;
  readonly finalDir: string;

  constructor(stagingDir: string, finalDir: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to commit ${stagingDir} to ${finalDir}: ${reason}`, { cause });
    this.stagingDir = stagingDir;
    this.finalDir = finalDir;
  }
}

/**
 * A snapshot file that could not be read at all.
 */
export class SnapshotLoadError extends PipelineError {
  override readonly name = 'SnapshotLoadError';
  override readonly code = PipelineErrorCode.SNAPSHOT_LOAD;
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`Failed to load workflow state from ${path}: ${message}`, { cause });
    this.path = path;
  }
}

export class InvalidTransitionError extends PipelineError {
  override readonly name = 'InvalidTransitionError';
  override readonly code = PipelineErrorCode.INVALID_TRANSITION;
  readonly from: WorkflowState;
  readonly to: WorkflowState;

  constructor(from: WorkflowState, to: WorkflowState) {
    super(`Invalid transition: ${from} -> ${to}`);
    this.from = from;
    this.to = to;
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof TransientOperationError;
}

/**
 * Aborts surface as DOMException('AbortError') or whatever reason the caller passed.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
