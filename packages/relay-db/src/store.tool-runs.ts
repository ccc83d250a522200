import { withStorage, type Queryable } from './db.js';
import { ulid } from './ulid.js';
import { IllegalTransitionError, NotFoundError, errorMessage } from './errors.js';
import { ACTIVE_TOOL_RUN_STATUSES, isTerminalToolRunStatus, toolRunPredecessors } from './transitions.js';
import { ToolRunSchema, type ToolRun, type ToolRunStatus } from './types.js';

export interface CreateToolRunInput {
  task_id: string;
  tool_name: string;
  input?: Record<string, unknown> | null;
}

/**
 * Inserts a QUEUED tool run. A task holds at most one non-terminal run at a
 * time, so this refuses while another one is QUEUED or RUNNING.
 */
export async function createToolRun(db: Queryable, input: CreateToolRunInput): Promise<ToolRun> {
  const active = await withStorage(() =>
    db.manyOrNone(`SELECT id FROM tool_runs WHERE task_id = $1 AND status IN ($2:csv)`, [
      input.task_id,
      ACTIVE_TOOL_RUN_STATUSES
    ])
  );
  if (active.length > 0) {
    throw new IllegalTransitionError(input.task_id, null, 'QUEUED', 'task already has an active tool run');
  }

  let row: unknown;
  try {
    row = await withStorage(() =>
      db.one(
        `INSERT INTO tool_runs(id, task_id, tool_name, status, input)
         VALUES($1, $2, $3, 'QUEUED', $4::jsonb)
         RETURNING *`,
        [ulid(), input.task_id, input.tool_name, input.input == null ? null : JSON.stringify(input.input)]
      )
    );
  } catch (error) {
    // uq_tool_runs_active_task: another run was inserted since the check above
    if (isUniqueViolation(error)) {
      throw new IllegalTransitionError(input.task_id, null, 'QUEUED', 'task already has an active tool run');
    }
    throw error;
  }
  return ToolRunSchema.parse(row);
}

function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && error.code === '23505') {
    return true;
  }
  return /duplicate key value violates unique constraint/i.test(errorMessage(error));
}

export async function getToolRun(db: Queryable, toolRunId: string): Promise<ToolRun | null> {
  const row = await withStorage(() => db.oneOrNone(`SELECT * FROM tool_runs WHERE id = $1`, [toolRunId]));
  return row ? ToolRunSchema.parse(row) : null;
}

export async function listToolRuns(db: Queryable, taskId: string): Promise<ToolRun[]> {
  const rows = await withStorage(() =>
    db.manyOrNone(`SELECT * FROM tool_runs WHERE task_id = $1 ORDER BY created_at ASC, id ASC`, [taskId])
  );
  return rows.map(row => ToolRunSchema.parse(row));
}

export interface UpdateToolRunInput {
  status: ToolRunStatus;
  output?: Record<string, unknown> | null;
  error?: string | null;
}

/**
 * Moves a tool run along QUEUED -> RUNNING -> SUCCEEDED | FAILED, stamping
 * started_at / finished_at. The status check and the write are one statement.
 */
export async function updateToolRun(db: Queryable, toolRunId: string, update: UpdateToolRunInput): Promise<ToolRun> {
  const predecessors = toolRunPredecessors(update.status);
  if (predecessors.length === 0) {
    throw new IllegalTransitionError(toolRunId, null, update.status, 'no edge leads to this status');
  }

  const sets = ['status = $2', 'updated_at = now()'];
  const params: unknown[] = [toolRunId, update.status, predecessors];

  if (update.status === 'RUNNING') {
    sets.push('started_at = now()');
  }
  if (isTerminalToolRunStatus(update.status)) {
    sets.push('finished_at = now()');
  }
  if (update.output !== undefined) {
    params.push(update.output === null ? null : JSON.stringify(update.output));
    sets.push(`output = $${params.length}::jsonb`);
  }
  if (update.error !== undefined) {
    params.push(update.error);
    sets.push(`error = $${params.length}`);
  }

  const row = await withStorage(() =>
    db.oneOrNone(
      `UPDATE tool_runs
       SET ${sets.join(', ')}
       WHERE id = $1 AND status IN ($3:csv)
       RETURNING *`,
      params
    )
  );
  if (row) {
    return ToolRunSchema.parse(row);
  }

  const current = await getToolRun(db, toolRunId);
  if (!current) {
    throw new NotFoundError('tool_run', toolRunId);
  }
  throw new IllegalTransitionError(toolRunId, current.status, update.status);
}
