import { z } from 'zod';
import { StageRejectedError, StageTimeoutError, StageUnavailableError, errorMessage, type StageName } from '../errors.js';

export interface HttpRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Transport seam for every outbound call. Production uses the global fetch;
 * tests hand in their own.
 */
export type FetchFn = (request: HttpRequest) => Promise<HttpResponse>;

export const defaultFetch: FetchFn = async request => {
  const response = await fetch(request.url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
    signal: request.signal
  });
  return { status: response.status, body: await response.text() };
};

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path}`;
}

/**
 * POSTs JSON with a hard deadline. The deadline covers reading the body too,
 * since the default fetch reads it before resolving.
 */
export async function postJson(
  fetchFn: FetchFn,
  url: string,
  payload: unknown,
  timeoutMs: number
): Promise<{ status: number; body: string; timedOut: false } | { timedOut: true }> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetchFn({
      url,
      method: 'POST',
      headers: { 'content-type': 'application/json', accept: 'application/json' },
      body: JSON.stringify(payload),
      signal: controller.signal
    });
    return { ...response, timedOut: false };
  } catch (error) {
    if (timedOut) {
      return { timedOut: true };
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

const JsonObject = z.record(z.unknown());

function remoteMessage(body: string): string {
  try {
    const parsed = JsonObject.safeParse(JSON.parse(body));
    if (parsed.success) {
      for (const key of ['message', 'error', 'detail']) {
        const value = parsed.data[key];
        if (typeof value === 'string' && value.trim()) {
          return value.trim();
        }
      }
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return body.trim().slice(0, 200) || 'empty response';
}

/**
 * One stage round trip with failures classified: deadline -> StageTimeoutError,
 * transport failure or 5xx -> StageUnavailableError, any other non-2xx or an
 * undecodable body -> StageRejectedError.
 */
export async function callStage(
  stage: StageName,
  fetchFn: FetchFn,
  url: string,
  payload: unknown,
  timeoutMs: number
): Promise<Record<string, unknown>> {
  let response: Awaited<ReturnType<typeof postJson>>;
  try {
    response = await postJson(fetchFn, url, payload, timeoutMs);
  } catch (error) {
    throw new StageUnavailableError(stage, errorMessage(error));
  }
  if (response.timedOut) {
    throw new StageTimeoutError(stage, timeoutMs);
  }

  const { status, body } = response;
  if (status >= 500) {
    throw new StageUnavailableError(stage, `HTTP ${status}: ${remoteMessage(body)}`, status);
  }
  if (status < 200 || status >= 300) {
    throw new StageRejectedError(stage, `HTTP ${status}: ${remoteMessage(body)}`, status);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new StageRejectedError(stage, 'response is not valid JSON', status);
  }
  const object = JsonObject.safeParse(parsed);
  if (!object.success) {
    throw new StageRejectedError(stage, 'expected a JSON object', status);
  }
  return object.data;
}
