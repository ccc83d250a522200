import { describe, it, expect, beforeEach } from 'vitest';
import {
  IllegalTransitionError,
  MAX_FAILURE_REASON_LENGTH,
  completeToolRun,
  createToolRun,
  failTask,
  failToolRun,
  formatFailureReason,
  getTask,
  getTaskHistory,
  getToolRun,
  isValidHistoryPath,
  listToolRuns,
  queueToolRun,
  startToolRun,
  transitionTask,
  updateToolRun,
  type Db,
  type Project,
  type Task
} from '@taskrelay/relay-db';
import { createTestDb, seedProject, seedTextTask } from './helpers.js';

async function toRefining(db: Db, task: Task): Promise<Task> {
  const routed = await transitionTask(db, task, 'ROUTED');
  return transitionTask(db, routed, 'REFINING', {});
}

describe('State machine', () => {
  let db: Db;
  let project: Project;

  beforeEach(async () => {
    db = await createTestDb();
    project = await seedProject(db);
  });

  it('records every transition in order', async () => {
    const task = await seedTextTask(db, project.id);
    const refining = await toRefining(db, task);

    expect(refining.status).toBe('REFINING');
    const history = await getTaskHistory(db, task.id);
    expect(history.map(h => h.to_status)).toEqual(['RECEIVED', 'ROUTED', 'REFINING']);
    expect(isValidHistoryPath(history)).toBe(true);
  });

  it('writes the patch together with the status', async () => {
    const task = await seedTextTask(db, project.id);
    const routed = await transitionTask(db, task, 'ROUTED');
    const refining = await transitionTask(db, routed, 'REFINING', { transcript: 'spoken' });

    expect((await getTask(db, task.id))?.transcript).toBe('spoken');
    expect(refining.transcript).toBe('spoken');
  });

  it('rejects an undeclared edge without writing anything', async () => {
    const task = await seedTextTask(db, project.id);

    await expect(transitionTask(db, task, 'SUMMARIZING')).rejects.toThrow(
      `Illegal transition RECEIVED -> SUMMARIZING for ${task.id}`
    );
    expect((await getTask(db, task.id))?.status).toBe('RECEIVED');
    expect(await getTaskHistory(db, task.id)).toHaveLength(1);
  });

  it('rejects a transition from a stale snapshot', async () => {
    const task = await seedTextTask(db, project.id);
    await transitionTask(db, task, 'ROUTED');

    // `task` still says RECEIVED; the row has moved on
    const error = await transitionTask(db, task, 'ROUTED').catch(e => e);
    expect(error).toBeInstanceOf(IllegalTransitionError);
    expect(error.message).toBe(`Illegal transition ROUTED -> ROUTED for ${task.id}: expected status RECEIVED`);
  });

  describe('failTask', () => {
    it('keeps derived fields and records the reason', async () => {
      const task = await seedTextTask(db, project.id);
      const routed = await transitionTask(db, task, 'ROUTED');
      await transitionTask(db, routed, 'REFINING', { transcript: 'kept' });

      const failed = await failTask(db, task.id, new Error('refine: HTTP 422: nope'));

      expect(failed.status).toBe('FAILED');
      expect(failed.failure_reason).toBe('refine: HTTP 422: nope');
      expect(failed.transcript).toBe('kept');
      expect((await getTaskHistory(db, task.id)).map(h => h.to_status)).toEqual(['RECEIVED', 'ROUTED', 'REFINING', 'FAILED']);
    });

    it('leaves a terminal task as it is', async () => {
      const task = await seedTextTask(db, project.id);
      await failTask(db, task.id, 'first');
      const again = await failTask(db, task.id, 'second');

      expect(again.failure_reason).toBe('first');
      expect(await getTaskHistory(db, task.id)).toHaveLength(2);
    });

    it('fails tool runs that are still open', async () => {
      const task = await seedTextTask(db, project.id);
      const refining = await toRefining(db, task);
      const { toolRun } = await queueToolRun(db, refining, { tool_name: 'dummy', input: { text: 'x' } });

      await failTask(db, task.id, 'Interrupted');

      const run = await getToolRun(db, toolRun.id);
      expect(run?.status).toBe('FAILED');
      expect(run?.error).toBe('Interrupted');
      expect(run?.finished_at).toBeInstanceOf(Date);
    });
  });

  describe('formatFailureReason', () => {
    it('truncates long messages and fills in blank ones', () => {
      expect(formatFailureReason(new Error('x'.repeat(600)))).toHaveLength(MAX_FAILURE_REASON_LENGTH);
      expect(formatFailureReason(new Error('   '))).toBe('Unknown pipeline error');
      expect(formatFailureReason('  plain text  ')).toBe('plain text');
    });
  });

  describe('tool runs', () => {
    it('walks QUEUED -> RUNNING -> SUCCEEDED alongside the task', async () => {
      const task = await seedTextTask(db, project.id);
      const refining = await toRefining(db, task);

      const queued = await queueToolRun(db, refining, { tool_name: 'dummy', input: { text: 'go' } }, { refined_text: 'go' });
      expect(queued.task.status).toBe('TOOL_QUEUED');
      expect(queued.task.refined_text).toBe('go');
      expect(queued.toolRun.status).toBe('QUEUED');
      expect(queued.toolRun.input).toEqual({ text: 'go' });

      const started = await startToolRun(db, queued.task, queued.toolRun);
      expect(started.task.status).toBe('TOOL_RUNNING');
      expect(started.toolRun.started_at).toBeInstanceOf(Date);

      const done = await completeToolRun(db, started.task, started.toolRun, { exit_code: 0 });
      expect(done.task.status).toBe('SUMMARIZING');
      expect(done.toolRun.status).toBe('SUCCEEDED');
      expect(done.toolRun.output).toEqual({ exit_code: 0 });
      expect(done.toolRun.finished_at).toBeInstanceOf(Date);
    });

    it('fails the task with the tool error', async () => {
      const task = await seedTextTask(db, project.id);
      const queued = await queueToolRun(db, await toRefining(db, task), { tool_name: 'dummy' });
      const started = await startToolRun(db, queued.task, queued.toolRun);

      const failed = await failToolRun(db, started.task, started.toolRun, new Error('run-tool: exit code 1: boom'));

      expect(failed.task.status).toBe('FAILED');
      expect(failed.task.failure_reason).toBe('run-tool: exit code 1: boom');
      expect(failed.toolRun.status).toBe('FAILED');
      expect(failed.toolRun.error).toBe('run-tool: exit code 1: boom');
    });

    it('allows only one open run per task', async () => {
      const task = await seedTextTask(db, project.id);
      await createToolRun(db, { task_id: task.id, tool_name: 'dummy' });

      await expect(createToolRun(db, { task_id: task.id, tool_name: 'dummy' })).rejects.toThrow(
        'task already has an active tool run'
      );
      expect(await listToolRuns(db, task.id)).toHaveLength(1);
    });

    it('refuses a second open run even when both callers pass the check', async () => {
      const task = await seedTextTask(db, project.id);

      const results = await Promise.allSettled([
        createToolRun(db, { task_id: task.id, tool_name: 'dummy' }),
        createToolRun(db, { task_id: task.id, tool_name: 'dummy' })
      ]);

      expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find(result => result.status === 'rejected');
      expect(rejected?.status === 'rejected' ? rejected.reason : null).toBeInstanceOf(IllegalTransitionError);
      expect(await listToolRuns(db, task.id)).toHaveLength(1);
    });

    it('enforces one open run per task in the schema', async () => {
      const task = await seedTextTask(db, project.id);
      const insert = (id: string, status: string) =>
        db.none(`INSERT INTO tool_runs(id, task_id, tool_name, status) VALUES($1, $2, 'dummy', $3)`, [id, task.id, status]);

      await insert('run-a', 'RUNNING');
      await expect(insert('run-b', 'QUEUED')).rejects.toThrow();

      await db.none(`UPDATE tool_runs SET status = 'SUCCEEDED' WHERE id = 'run-a'`);
      await insert('run-c', 'QUEUED');
      await insert('run-d', 'FAILED');
      expect((await listToolRuns(db, task.id)).map(run => run.id).sort()).toEqual(['run-a', 'run-c', 'run-d']);
    });

    it('refuses to move a finished run', async () => {
      const task = await seedTextTask(db, project.id);
      const run = await createToolRun(db, { task_id: task.id, tool_name: 'dummy' });
      await updateToolRun(db, run.id, { status: 'FAILED', error: 'x' });

      await expect(updateToolRun(db, run.id, { status: 'RUNNING' })).rejects.toThrow(
        `Illegal transition FAILED -> RUNNING for ${run.id}`
      );
      await expect(updateToolRun(db, run.id, { status: 'QUEUED' })).rejects.toThrow('no edge leads to this status');
    });
  });
});
