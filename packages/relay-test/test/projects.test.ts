import { describe, it, expect, beforeEach } from 'vitest';
import {
  NotFoundError,
  createToolRun,
  deleteProject,
  getProject,
  getTask,
  getTaskHistory,
  getToolRun,
  listProjects,
  projectSlug,
  type Db
} from '@taskrelay/relay-db';
import { createTestDb, seedProject, seedTextTask } from './helpers.js';

describe('Projects', () => {
  let db: Db;

  beforeEach(async () => {
    db = await createTestDb();
  });

  it('creates and reads back a project with its metadata', async () => {
    const project = await seedProject(db, 'Garden', { slug: 'garden-v2', owner: 'ops' });

    const stored = await getProject(db, project.id);
    expect(stored?.name).toBe('Garden');
    expect(stored?.metadata).toEqual({ slug: 'garden-v2', owner: 'ops' });
    expect(await listProjects(db)).toHaveLength(1);
  });

  it('derives a slug from metadata or the name', async () => {
    const named = await seedProject(db, '  Home Automation!  ');
    const slugged = await seedProject(db, 'Other', { slug: ' custom ' });

    expect(projectSlug(named)).toBe('home-automation');
    expect(projectSlug(slugged)).toBe('custom');
  });

  it('deletes a project together with its tasks, history and tool runs', async () => {
    const project = await seedProject(db);
    const task = await seedTextTask(db, project.id);
    const run = await createToolRun(db, { task_id: task.id, tool_name: 'dummy' });

    await deleteProject(db, project.id);

    expect(await getProject(db, project.id)).toBeNull();
    expect(await getTask(db, task.id)).toBeNull();
    expect(await getTaskHistory(db, task.id)).toEqual([]);
    expect(await getToolRun(db, run.id)).toBeNull();
  });

  it('reports a missing project on delete', async () => {
    await expect(deleteProject(db, 'nope')).rejects.toBeInstanceOf(NotFoundError);
    await expect(deleteProject(db, 'nope')).rejects.toThrow('project not found: nope');
  });
});
