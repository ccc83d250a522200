export type StageName = 'transcribe' | 'refine' | 'run-tool' | 'summarize' | 'synthesize';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Malformed task or project input. Raised before anything is persisted.
 */
export class ValidationError extends Error {
  readonly type = 'validation_error';

  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  readonly type = 'not_found';

  constructor(readonly entity: 'project' | 'task' | 'tool_run', readonly id: string) {
    super(`${entity.replace('_', ' ')} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

/**
 * A status change outside the declared edge set, or one that lost a race
 * against another writer of the same row.
 */
export class IllegalTransitionError extends Error {
  readonly type = 'illegal_transition';

  constructor(
    readonly entityId: string,
    readonly from: string | null,
    readonly to: string,
    detail?: string
  ) {
    super(`Illegal transition ${from ?? 'null'} -> ${to} for ${entityId}${detail ? `: ${detail}` : ''}`);
    this.name = 'IllegalTransitionError';
  }
}

export class StorageUnavailableError extends Error {
  readonly type = 'storage_unavailable';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageUnavailableError';
  }
}

export type StageErrorType = 'stage_timeout' | 'stage_rejected' | 'stage_unavailable';

export abstract class StageError extends Error {
  abstract readonly type: StageErrorType;

  constructor(
    readonly stage: StageName,
    detail: string,
    readonly status?: number
  ) {
    super(`${stage}: ${detail}`);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return this.type !== 'stage_rejected';
  }
}

export class StageTimeoutError extends StageError {
  readonly type = 'stage_timeout';

  constructor(stage: StageName, readonly timeoutMs: number) {
    super(stage, `timed out after ${timeoutMs}ms`);
  }
}

export class StageRejectedError extends StageError {
  readonly type = 'stage_rejected';
}

export class StageUnavailableError extends StageError {
  readonly type = 'stage_unavailable';
}

export class NotifyFailureError extends Error {
  readonly type = 'notify_failure';

  constructor(readonly taskId: string, detail: string) {
    super(`Result notification failed for ${taskId}: ${detail}`);
    this.name = 'NotifyFailureError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
