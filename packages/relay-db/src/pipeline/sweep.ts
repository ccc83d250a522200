import type { Db } from '../db.js';
import { failTask } from '../state-machine.js';
import { listTasks, type ListTasksOptions } from '../store.tasks.js';
import { TASK_STATUSES, type Task, type TaskStatus } from '../types.js';
import { isTerminalStatus } from '../transitions.js';

export interface SweepOptions {
  /** Non-terminal tasks untouched for longer than this are force-failed. */
  staleMs: number;
  now?: Date;
  dryRun?: boolean;
  /** Rows read per query; every matching task is visited regardless. */
  pageSize?: number;
}

export interface SweepResult {
  /** RECEIVED tasks that never started; hand these back to the queue. */
  requeue: string[];
  failed: Array<{ taskId: string; status: TaskStatus }>;
}

const IN_PROGRESS_STATUSES = TASK_STATUSES.filter(status => status !== 'RECEIVED' && !isTerminalStatus(status));

async function listAllTasks(db: Db, options: ListTasksOptions, pageSize: number): Promise<Task[]> {
  const tasks: Task[] = [];
  for (let offset = 0; ; offset += pageSize) {
    const page = await listTasks(db, { ...options, oldestFirst: true, limit: pageSize, offset });
    tasks.push(...page);
    if (page.length < pageSize) {
      return tasks;
    }
  }
}

/**
 * Finds tasks a previous process left behind. Only a single orchestrator
 * instance may run against the database while this executes.
 */
export async function sweepStuckTasks(db: Db, options: SweepOptions): Promise<SweepResult> {
  const now = options.now ?? new Date();
  const pageSize = Math.max(1, options.pageSize ?? 500);

  // read both lists in full before failing anything; failing shifts the pages
  const received = await listAllTasks(db, { statuses: ['RECEIVED'] }, pageSize);
  const stale = await listAllTasks(
    db,
    { statuses: IN_PROGRESS_STATUSES, updatedBefore: new Date(now.getTime() - options.staleMs) },
    pageSize
  );

  // oldest first, so they re-enter the queue in arrival order
  const result: SweepResult = { requeue: received.map(task => task.id), failed: [] };

  for (const task of stale) {
    if (!options.dryRun) {
      await failTask(db, task.id, `Interrupted before completion (was ${task.status})`);
    }
    result.failed.push({ taskId: task.id, status: task.status });
  }
  return result;
}
