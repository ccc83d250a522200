import { newDb } from 'pg-mem';
import { pino } from 'pino';
import {
  createProject,
  createTask,
  defaultMigrationsDir,
  migrate,
  type CreateTaskInput,
  type Db,
  type FetchFn,
  type HttpRequest,
  type HttpResponse,
  type Project,
  type StageEndpoints,
  type Task
} from '@taskrelay/relay-db';

export const silentLogger = pino({ level: 'silent' });

export const ENDPOINTS: StageEndpoints = {
  asrUrl: 'http://asr.test',
  refineUrl: 'http://refine.test',
  toolerUrl: 'http://tooler.test',
  summarizerUrl: 'http://summarizer.test',
  ttsUrl: 'http://tts.test'
};

export const CALLBACK_URL = 'http://bot.test/callback';

export const noSleep = async (_ms: number) => {};

/**
 * pg-mem keeps one transaction state for the whole database, so two open
 * transactions cannot interleave. Queue `tx` calls; plain queries still run
 * freely.
 */
function serializeTransactions(db: Db): Db {
  let tail: Promise<unknown> = Promise.resolve();
  return new Proxy(db, {
    get(target, prop, receiver) {
      const value: unknown = Reflect.get(target, prop, receiver);
      if (prop !== 'tx' || typeof value !== 'function') {
        return value;
      }
      return (...args: unknown[]) => {
        const run = tail.then(() => value.apply(target, args));
        tail = run.catch(() => undefined);
        return run;
      };
    }
  });
}

/** A refused connection the way the pg driver reports it. */
export function connectionRefused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
}

const QUERY_METHODS = new Set<string | symbol>(['tx', 'task', 'none', 'one', 'oneOrNone', 'many', 'manyOrNone', 'any', 'result', 'query']);

/**
 * Wraps a database so it can be switched off: while down, every query and
 * transaction rejects with a refused connection.
 */
export function withOutage(db: Db) {
  let down = false;
  const wrapped: Db = new Proxy(db, {
    get(target, prop, receiver) {
      const value: unknown = Reflect.get(target, prop, receiver);
      if (!QUERY_METHODS.has(prop) || typeof value !== 'function') {
        return value;
      }
      return (...args: unknown[]) => (down ? Promise.reject(connectionRefused()) : value.apply(target, args));
    }
  });
  return {
    db: wrapped,
    goDown: () => {
      down = true;
    },
    restore: () => {
      down = false;
    }
  };
}

/** Fresh in-memory PostgreSQL with the real migrations applied. */
export async function createTestDb(): Promise<Db> {
  const mem = newDb();
  const db = serializeTransactions(mem.adapters.createPgPromise());
  await migrate(db, defaultMigrationsDir());
  return db;
}

export async function seedProject(db: Db, name = 'Home Automation', metadata: Record<string, unknown> | null = null): Promise<Project> {
  return createProject(db, { name, metadata });
}

export async function seedTextTask(db: Db, projectId: string, rawText = 'turn on the porch light'): Promise<Task> {
  const input: CreateTaskInput = { project_id: projectId, input_type: 'text', raw_text: rawText, origin_chat_id: 'chat-1' };
  return createTask(db, input);
}

export async function seedVoiceTask(db: Db, projectId: string, audioUri = 'file:///tmp/voice/note-1.ogg'): Promise<Task> {
  return createTask(db, { project_id: projectId, input_type: 'voice', raw_audio_uri: audioUri, origin_chat_id: 42 });
}

export function json(status: number, body: unknown): HttpResponse {
  return { status, body: JSON.stringify(body) };
}

export interface RecordedCall {
  path: string;
  body: Record<string, unknown>;
}

export type RouteHandler = (body: Record<string, unknown>, request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/** Never settles on its own; rejects once the caller's deadline aborts it. */
export function hangUntilAborted(_body: Record<string, unknown>, request: HttpRequest): Promise<HttpResponse> {
  return new Promise((_resolve, reject) => {
    request.signal.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

export const happyStages: Record<string, RouteHandler> = {
  '/asr/transcribe': () => json(200, { transcript_text: 'turn on the porch light' }),
  '/refine': body => json(200, { refined_text: `Refined: ${String(body.text)}`, inferred_project_slug: 'home-automation' }),
  '/tooler/run': () => json(200, { exit_code: 0, result_text: 'light switched on', stderr: '', artifacts: [] }),
  '/summarize': () => json(200, { summary_text: 'The porch light is on.' }),
  '/tts/synthesize': () => json(200, { audio_uri: 'file:///tmp/tts/summary.ogg' })
};

/**
 * Routes requests by path to the given handlers and records every call.
 * Unrouted paths answer 404.
 */
export function createFakeFetch(routes: Record<string, RouteHandler>) {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async request => {
    const url = new URL(request.url);
    const body: Record<string, unknown> = JSON.parse(request.body);
    const path = url.host === new URL(CALLBACK_URL).host ? 'callback' : url.pathname;
    calls.push({ path, body });
    const handler = routes[path];
    if (!handler) {
      return json(404, { detail: 'not found' });
    }
    return handler(body, request);
  };
  return { fetchFn, calls, paths: () => calls.map(call => call.path) };
}
