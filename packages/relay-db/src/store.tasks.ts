import { z } from 'zod';
import { withStorage, type Db, type Queryable } from './db.js';
import { ulid } from './ulid.js';
import { getProject } from './store.projects.js';
import { IllegalTransitionError, NotFoundError, ValidationError } from './errors.js';
import { TERMINAL_TASK_STATUSES } from './transitions.js';
import {
  TASK_STATUSES,
  TaskSchema,
  TaskStatusHistorySchema,
  type Task,
  type TaskFieldsPatch,
  type TaskStatus,
  type TaskStatusHistory
} from './types.js';

const NonBlank = z.string().refine(value => value.trim().length > 0, { message: 'must not be blank' });
const ChatId = z
  .union([z.string().min(1), z.number().int()])
  .transform(value => String(value))
  .nullish();

export const CreateTaskInputSchema = z.discriminatedUnion('input_type', [
  z.object({
    project_id: NonBlank,
    input_type: z.literal('text'),
    raw_text: NonBlank,
    raw_audio_uri: z.null().optional(),
    origin_chat_id: ChatId
  }),
  z.object({
    project_id: NonBlank,
    input_type: z.literal('voice'),
    raw_text: z.null().optional(),
    raw_audio_uri: NonBlank,
    origin_chat_id: ChatId
  })
]);

export type CreateTaskInput = z.input<typeof CreateTaskInputSchema>;
type ParsedCreateTaskInput = z.output<typeof CreateTaskInputSchema>;

/**
 * Validates raw ingress input. Throws ValidationError listing every issue.
 */
export function parseCreateTaskInput(input: unknown): ParsedCreateTaskInput {
  const parsed = CreateTaskInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message }));
    throw new ValidationError(issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; '), issues);
  }
  return parsed.data;
}

/**
 * Creates a task in RECEIVED together with its initial history entry.
 */
export async function createTask(db: Db, input: CreateTaskInput): Promise<Task> {
  const data = parseCreateTaskInput(input);
  const taskId = ulid();

  return withStorage(() =>
    db.tx(async t => {
      const project = await getProject(t, data.project_id);
      if (!project) {
        throw new NotFoundError('project', data.project_id);
      }

      const row = await t.one(
        `INSERT INTO tasks(id, project_id, input_type, raw_text, raw_audio_uri, origin_chat_id, status)
         VALUES($1, $2, $3, $4, $5, $6, 'RECEIVED')
         RETURNING *`,
        [
          taskId,
          data.project_id,
          data.input_type,
          data.input_type === 'text' ? data.raw_text : null,
          data.input_type === 'voice' ? data.raw_audio_uri : null,
          data.origin_chat_id ?? null
        ]
      );
      await appendStatusHistory(t, taskId, null, 'RECEIVED');

      return TaskSchema.parse(row);
    })
  );
}

export async function getTask(db: Queryable, taskId: string): Promise<Task | null> {
  const row = await withStorage(() => db.oneOrNone(`SELECT * FROM tasks WHERE id = $1`, [taskId]));
  return row ? TaskSchema.parse(row) : null;
}

export async function requireTask(db: Queryable, taskId: string): Promise<Task> {
  const task = await getTask(db, taskId);
  if (!task) {
    throw new NotFoundError('task', taskId);
  }
  return task;
}

export interface ListTasksOptions {
  projectId?: string;
  statuses?: TaskStatus[];
  updatedBefore?: Date;
  limit?: number;
  offset?: number;
  /** Oldest first instead of the default newest first. */
  oldestFirst?: boolean;
}

export async function listTasks(db: Queryable, options: ListTasksOptions = {}): Promise<Task[]> {
  const { projectId, statuses, updatedBefore, limit = 50, offset = 0, oldestFirst = false } = options;
  const where: string[] = [];
  const params: unknown[] = [];

  if (projectId) {
    params.push(projectId);
    where.push(`project_id = $${params.length}`);
  }
  if (statuses && statuses.length > 0) {
    params.push(statuses);
    where.push(`status IN ($${params.length}:csv)`);
  }
  if (updatedBefore) {
    params.push(updatedBefore.toISOString());
    where.push(`updated_at < $${params.length}::timestamptz`);
  }
  params.push(limit, offset);
  const direction = oldestFirst ? 'ASC' : 'DESC';

  const rows = await withStorage(() =>
    db.manyOrNone(
      `SELECT * FROM tasks
       ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
       ORDER BY created_at ${direction}, id ${direction}
       LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    )
  );
  return rows.map(row => TaskSchema.parse(row));
}

const PATCH_COLUMNS = [
  'transcript',
  'refined_text',
  'project_slug_hint',
  'final_summary',
  'final_audio_uri'
] as const satisfies readonly (keyof TaskFieldsPatch)[];

/**
 * SET clauses for the defined keys of a patch. Placeholders are numbered from
 * `firstParam`; column names only ever come from PATCH_COLUMNS.
 */
export function patchAssignments(patch: TaskFieldsPatch, firstParam: number): { sets: string[]; values: unknown[] } {
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const column of PATCH_COLUMNS) {
    const value = patch[column];
    if (value !== undefined) {
      values.push(value);
      sets.push(`${column} = $${firstParam + values.length - 1}`);
    }
  }
  return { sets, values };
}

/**
 * Atomically writes derived fields of a non-terminal task. DELIVERED and
 * FAILED tasks are immutable.
 */
export async function updateTaskFields(db: Queryable, taskId: string, patch: TaskFieldsPatch): Promise<Task> {
  const { sets, values } = patchAssignments(patch, 3);
  if (sets.length === 0) {
    return requireTask(db, taskId);
  }

  const row = await withStorage(() =>
    db.oneOrNone(
      `UPDATE tasks
       SET ${sets.join(', ')}, updated_at = now()
       WHERE id = $1 AND status NOT IN ($2:csv)
       RETURNING *`,
      [taskId, TERMINAL_TASK_STATUSES, ...values]
    )
  );
  if (row) {
    return TaskSchema.parse(row);
  }

  const current = await requireTask(db, taskId);
  throw new IllegalTransitionError(taskId, current.status, current.status, 'terminal tasks are immutable');
}

export async function appendStatusHistory(
  db: Queryable,
  taskId: string,
  from: TaskStatus | null,
  to: TaskStatus
): Promise<TaskStatusHistory> {
  const row = await withStorage(() =>
    db.one(
      `INSERT INTO task_status_history(id, task_id, from_status, to_status)
       VALUES($1, $2, $3, $4)
       RETURNING *`,
      [ulid(), taskId, from, to]
    )
  );
  return TaskStatusHistorySchema.parse(row);
}

export async function getTaskHistory(db: Queryable, taskId: string): Promise<TaskStatusHistory[]> {
  const rows = await withStorage(() =>
    db.manyOrNone(`SELECT * FROM task_status_history WHERE task_id = $1 ORDER BY seq ASC`, [taskId])
  );
  return rows.map(row => TaskStatusHistorySchema.parse(row));
}

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some(status => status === value);
}
