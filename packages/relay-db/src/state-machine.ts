import { withStorage, type Db, type Queryable } from './db.js';
import { IllegalTransitionError, NotFoundError, errorMessage } from './errors.js';
import { appendStatusHistory, patchAssignments, requireTask, getTask } from './store.tasks.js';
import { createToolRun, listToolRuns, updateToolRun, type CreateToolRunInput } from './store.tool-runs.js';
import { canTransition, isTerminalStatus, isTerminalToolRunStatus } from './transitions.js';
import { TaskSchema, type Task, type TaskFieldsPatch, type TaskStatus, type ToolRun } from './types.js';

/** Statuses the pipeline moves a task into; FAILED goes through failTask. */
export type ForwardStatus = Exclude<TaskStatus, 'RECEIVED' | 'FAILED'>;

export const MAX_FAILURE_REASON_LENGTH = 500;
const FAIL_ATTEMPTS = 3;

export function assertTransition(taskId: string, from: TaskStatus, to: TaskStatus): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(taskId, from, to);
  }
}

export function formatFailureReason(reason: unknown): string {
  const text = errorMessage(reason).trim();
  if (!text) {
    return 'Unknown pipeline error';
  }
  return text.slice(0, MAX_FAILURE_REASON_LENGTH);
}

/**
 * Compare-and-set on the task's status plus the history append. Must run
 * inside a transaction so both land or neither does.
 */
async function applyTransition(
  t: Queryable,
  task: Task,
  to: TaskStatus,
  patch: TaskFieldsPatch,
  failureReason?: string
): Promise<Task> {
  assertTransition(task.id, task.status, to);

  const { sets, values } = patchAssignments(patch, 4);
  if (failureReason !== undefined) {
    values.push(failureReason);
    sets.push(`failure_reason = $${3 + values.length}`);
  }
  sets.push('updated_at = now()');

  const row = await withStorage(() =>
    t.oneOrNone(
      `UPDATE tasks
       SET status = $3, ${sets.join(', ')}
       WHERE id = $1 AND status = $2
       RETURNING *`,
      [task.id, task.status, to, ...values]
    )
  );
  if (!row) {
    const current = await getTask(t, task.id);
    if (!current) {
      throw new NotFoundError('task', task.id);
    }
    throw new IllegalTransitionError(task.id, current.status, to, `expected status ${task.status}`);
  }

  await appendStatusHistory(t, task.id, task.status, to);
  return TaskSchema.parse(row);
}

/**
 * Validates the edge against the task's status, then writes the status, the
 * given fields and a history entry in one transaction. Rejects with
 * IllegalTransitionError when the edge is undeclared or the stored status no
 * longer matches `task.status`.
 */
export async function transitionTask(db: Db, task: Task, to: ForwardStatus, patch: TaskFieldsPatch = {}): Promise<Task> {
  return withStorage(() => db.tx(t => applyTransition(t, task, to, patch)));
}

async function failWithin(t: Queryable, taskId: string, reason: string): Promise<Task> {
  const current = await requireTask(t, taskId);
  if (isTerminalStatus(current.status)) {
    return current;
  }
  for (const run of await listToolRuns(t, taskId)) {
    if (!isTerminalToolRunStatus(run.status)) {
      await updateToolRun(t, run.id, { status: 'FAILED', error: reason });
    }
  }
  return applyTransition(t, current, 'FAILED', {}, reason);
}

/**
 * Moves a task to FAILED from whatever non-terminal status it is in, recording
 * the reason and failing any tool run still open. Already-terminal tasks are
 * returned unchanged. Derived fields persisted earlier are kept.
 */
export async function failTask(db: Db, taskId: string, reason: unknown): Promise<Task> {
  const message = formatFailureReason(reason);
  let lastError: unknown;
  for (let attempt = 0; attempt < FAIL_ATTEMPTS; attempt++) {
    try {
      return await withStorage(() => db.tx(t => failWithin(t, taskId, message)));
    } catch (error) {
      // Lost a race with another writer; re-read and try again.
      if (!(error instanceof IllegalTransitionError)) {
        throw error;
      }
      lastError = error;
    }
  }
  throw lastError;
}

export interface TaskWithToolRun {
  task: Task;
  toolRun: ToolRun;
}

/** REFINING -> TOOL_QUEUED together with the QUEUED tool run. */
export async function queueToolRun(
  db: Db,
  task: Task,
  run: Omit<CreateToolRunInput, 'task_id'>,
  patch: TaskFieldsPatch = {}
): Promise<TaskWithToolRun> {
  return withStorage(() =>
    db.tx(async t => {
      const queued = await applyTransition(t, task, 'TOOL_QUEUED', patch);
      const toolRun = await createToolRun(t, { ...run, task_id: task.id });
      return { task: queued, toolRun };
    })
  );
}

/** TOOL_QUEUED -> TOOL_RUNNING with the run QUEUED -> RUNNING. */
export async function startToolRun(db: Db, task: Task, toolRun: ToolRun): Promise<TaskWithToolRun> {
  return withStorage(() =>
    db.tx(async t => {
      const running = await applyTransition(t, task, 'TOOL_RUNNING', {});
      const started = await updateToolRun(t, toolRun.id, { status: 'RUNNING' });
      return { task: running, toolRun: started };
    })
  );
}

/** Run SUCCEEDED with its output, then TOOL_RUNNING -> SUMMARIZING. */
export async function completeToolRun(
  db: Db,
  task: Task,
  toolRun: ToolRun,
  output: Record<string, unknown>
): Promise<TaskWithToolRun> {
  return withStorage(() =>
    db.tx(async t => {
      const succeeded = await updateToolRun(t, toolRun.id, { status: 'SUCCEEDED', output });
      const summarizing = await applyTransition(t, task, 'SUMMARIZING', {});
      return { task: summarizing, toolRun: succeeded };
    })
  );
}

/** Run FAILED, then the task FAILED with the tool's error as the reason. */
export async function failToolRun(
  db: Db,
  task: Task,
  toolRun: ToolRun,
  reason: unknown,
  output?: Record<string, unknown>
): Promise<TaskWithToolRun> {
  const message = formatFailureReason(reason);
  return withStorage(() =>
    db.tx(async t => {
      const failedRun = await updateToolRun(t, toolRun.id, { status: 'FAILED', error: message, output });
      const failed = await applyTransition(t, task, 'FAILED', {}, message);
      return { task: failed, toolRun: failedRun };
    })
  );
}
