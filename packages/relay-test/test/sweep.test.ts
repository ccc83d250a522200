import { describe, it, expect, beforeEach } from 'vitest';
import {
  getTask,
  getToolRun,
  queueToolRun,
  sweepStuckTasks,
  transitionTask,
  type Db,
  type Project,
  type Task
} from '@taskrelay/relay-db';
import { createTestDb, seedProject, seedTextTask } from './helpers.js';

describe('sweepStuckTasks', () => {
  let db: Db;
  let project: Project;

  beforeEach(async () => {
    db = await createTestDb();
    project = await seedProject(db);
  });

  it('hands back RECEIVED tasks and fails stale in-progress ones', async () => {
    const waiting = await seedTextTask(db, project.id, 'waiting');
    const stuck = await seedTextTask(db, project.id, 'stuck');
    const routed = await transitionTask(db, stuck, 'ROUTED');
    const refining = await transitionTask(db, routed, 'REFINING');
    const { toolRun } = await queueToolRun(db, refining, { tool_name: 'dummy' });

    const result = await sweepStuckTasks(db, { staleMs: 0, now: new Date(Date.now() + 60_000) });

    expect(result.requeue).toEqual([waiting.id]);
    expect(result.failed).toEqual([{ taskId: stuck.id, status: 'TOOL_QUEUED' }]);

    const swept = await getTask(db, stuck.id);
    expect(swept?.status).toBe('FAILED');
    expect(swept?.failure_reason).toBe('Interrupted before completion (was TOOL_QUEUED)');
    expect((await getToolRun(db, toolRun.id))?.status).toBe('FAILED');
    expect((await getTask(db, waiting.id))?.status).toBe('RECEIVED');
  });

  it('reads every page of waiting and stale tasks', async () => {
    const waiting: Task[] = [];
    for (const text of ['one', 'two', 'three']) {
      waiting.push(await seedTextTask(db, project.id, text));
    }
    const stuck: Task[] = [];
    for (const text of ['four', 'five', 'six']) {
      stuck.push(await transitionTask(db, await seedTextTask(db, project.id, text), 'ROUTED'));
    }

    const result = await sweepStuckTasks(db, { staleMs: 0, now: new Date(Date.now() + 60_000), pageSize: 2 });

    expect([...result.requeue].sort()).toEqual(waiting.map(task => task.id).sort());
    expect(result.failed.map(entry => entry.taskId).sort()).toEqual(stuck.map(task => task.id).sort());
    for (const task of stuck) {
      expect((await getTask(db, task.id))?.status).toBe('FAILED');
    }
  });

  it('leaves recently updated tasks alone', async () => {
    const task = await seedTextTask(db, project.id);
    await transitionTask(db, task, 'ROUTED');

    const result = await sweepStuckTasks(db, { staleMs: 10 * 60 * 1000 });

    expect(result).toEqual({ requeue: [], failed: [] });
    expect((await getTask(db, task.id))?.status).toBe('ROUTED');
  });

  it('only reports in a dry run', async () => {
    const task = await seedTextTask(db, project.id);
    await transitionTask(db, task, 'ROUTED');

    const result = await sweepStuckTasks(db, { staleMs: 0, now: new Date(Date.now() + 60_000), dryRun: true });

    expect(result.failed).toEqual([{ taskId: task.id, status: 'ROUTED' }]);
    expect((await getTask(db, task.id))?.status).toBe('ROUTED');
  });
});
