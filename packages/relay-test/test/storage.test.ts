import { describe, it, expect, beforeEach } from 'vitest';
import {
  StorageUnavailableError,
  createProject,
  getTask,
  isConnectionError,
  withStorage,
  type Db
} from '@taskrelay/relay-db';
import { connectionRefused, createTestDb, seedProject, seedTextTask, withOutage } from './helpers.js';

describe('isConnectionError', () => {
  it('recognises driver and SQLSTATE connection failures', () => {
    expect(isConnectionError(connectionRefused())).toBe(true);
    expect(isConnectionError(Object.assign(new Error('server closed'), { code: '08006' }))).toBe(true);
    expect(isConnectionError(Object.assign(new Error('too many clients'), { code: '53300' }))).toBe(true);
    expect(isConnectionError(new Error('Connection terminated unexpectedly'))).toBe(true);
  });

  it('leaves query errors alone', () => {
    expect(isConnectionError(Object.assign(new Error('duplicate key'), { code: '23505' }))).toBe(false);
    expect(isConnectionError(new Error('syntax error at or near "SELEC"'))).toBe(false);
    expect(isConnectionError('ECONNREFUSED')).toBe(false);
  });
});

describe('withStorage', () => {
  it('turns a refused connection into StorageUnavailableError', async () => {
    const cause = connectionRefused();
    const error = await withStorage(() => Promise.reject(cause)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageUnavailableError);
    if (!(error instanceof StorageUnavailableError)) {
      throw error;
    }
    expect(error.type).toBe('storage_unavailable');
    expect(error.message).toBe('Storage unavailable: connect ECONNREFUSED 127.0.0.1:5432');
    expect(error.cause).toBe(cause);
  });

  it('passes other failures through unchanged', async () => {
    const cause = Object.assign(new Error('duplicate key'), { code: '23505' });
    await expect(withStorage(() => Promise.reject(cause))).rejects.toBe(cause);
  });
});

describe('stores during an outage', () => {
  let db: Db;

  beforeEach(async () => {
    db = await createTestDb();
  });

  it('reject reads and writes with StorageUnavailableError', async () => {
    const project = await seedProject(db);
    const task = await seedTextTask(db, project.id);
    const outage = withOutage(db);
    outage.goDown();

    await expect(createProject(outage.db, { name: 'Garden' })).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(getTask(outage.db, task.id)).rejects.toBeInstanceOf(StorageUnavailableError);

    outage.restore();
    expect((await getTask(outage.db, task.id))?.status).toBe('RECEIVED');
  });
});
