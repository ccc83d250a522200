import { NotifyFailureError, errorMessage } from '../errors.js';
import type { Task } from '../types.js';
import { defaultFetch, postJson, type FetchFn } from './http.js';

export interface TaskResultPayload {
  task_id: string;
  chat_id: string | null;
  status: 'DELIVERED' | 'FAILED';
  summary: string | null;
  audio_uri: string | null;
  failure_reason: string | null;
}

export interface ResultNotifierOptions {
  /** Origin callback; notification is disabled when empty. */
  callbackUrl?: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

export function resultPayload(task: Task): TaskResultPayload {
  if (task.status !== 'DELIVERED' && task.status !== 'FAILED') {
    throw new Error(`Task ${task.id} is not terminal (${task.status})`);
  }
  return {
    task_id: task.id,
    chat_id: task.origin_chat_id,
    status: task.status,
    summary: task.final_summary,
    audio_uri: task.final_audio_uri,
    failure_reason: task.failure_reason
  };
}

/**
 * Posts a terminal task outcome back to the origin collaborator. Best effort:
 * one attempt, failures surface as NotifyFailureError and never touch the
 * task itself.
 */
export class ResultNotifier {
  private readonly callbackUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: ResultNotifierOptions) {
    this.callbackUrl = options.callbackUrl?.trim() ?? '';
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  get enabled(): boolean {
    return this.callbackUrl.length > 0;
  }

  /** Resolves false when notification is disabled, true once delivered. */
  async notify(task: Task): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }
    const payload = resultPayload(task);

    let response: Awaited<ReturnType<typeof postJson>>;
    try {
      response = await postJson(this.fetchFn, this.callbackUrl, payload, this.timeoutMs);
    } catch (error) {
      throw new NotifyFailureError(task.id, errorMessage(error));
    }
    if (response.timedOut) {
      throw new NotifyFailureError(task.id, `timed out after ${this.timeoutMs}ms`);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new NotifyFailureError(task.id, `HTTP ${response.status}`);
    }
    return true;
  }
}
