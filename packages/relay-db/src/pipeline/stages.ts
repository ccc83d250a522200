import { z } from 'zod';
import type { Logger } from '../logger.js';
import { StageError, StageRejectedError, errorMessage, type StageName } from '../errors.js';
import { callStage, defaultFetch, joinUrl, type FetchFn } from './http.js';
import { DEFAULT_RETRY_POLICY, NO_RETRY, withRetry, type RetryPolicy } from './retry.js';

export interface StageEndpoints {
  asrUrl: string;
  refineUrl: string;
  toolerUrl: string;
  summarizerUrl: string;
  ttsUrl: string;
}

export interface StageClientOptions {
  endpoints: StageEndpoints;
  timeoutMs: number;
  retry?: RetryPolicy;
  fetchFn?: FetchFn;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface KnownProject {
  name: string;
  slug: string;
}

export interface RefineResult {
  refinedText: string;
  projectSlugHint: string | null;
}

export interface ToolInput {
  taskId: string;
  message: string;
  workdir?: string;
  subject?: string;
}

export interface ToolResult {
  /** The tool service's response, stored as the tool run's output. */
  output: Record<string, unknown>;
  resultText: string;
  stderr: string;
  artifacts: unknown[];
  branch: string | null;
  commitHash: string | null;
}

export type SummaryMode = 'text' | 'audio';

export interface SummarizeInput {
  taskId: string;
  refinedText: string;
  toolStdout: string;
  toolStderr: string;
  mode: SummaryMode;
}

const TranscribeResponse = z.object({
  transcript_text: z.string().nullish(),
  transcript: z.string().nullish()
});

const RefineResponse = z.object({
  refined_text: z.string().nullish(),
  inferred_project_slug: z.string().nullish()
});

const ToolResponse = z.object({
  exit_code: z.number().int().nullish(),
  result_text: z.string().nullish(),
  stderr: z.string().nullish(),
  artifacts: z.array(z.unknown()).nullish(),
  branch: z.string().nullish(),
  commit_hash: z.string().nullish()
});

const SummarizeResponse = z.object({
  summary_text: z.string().nullish(),
  summary: z.string().nullish()
});

const SynthesizeResponse = z.object({
  audio_uri: z.string().nullish()
});

function decode<T>(stage: StageName, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: Record<string, unknown>): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new StageRejectedError(stage, `unexpected response (${detail})`);
  }
  return parsed.data;
}

function required(stage: StageName, field: string, value: string | null | undefined): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new StageRejectedError(stage, `returned empty ${field}`);
  }
  return trimmed;
}

/**
 * Synchronous request/response wrapper around the downstream stage services.
 * Each call has a deadline; timeouts and unavailability are retried within the
 * configured budget, rejections never are. run-tool is never retried because
 * tools may have side effects.
 */
export class StageClient {
  private readonly endpoints: StageEndpoints;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchFn: FetchFn;
  private readonly logger?: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: StageClientOptions) {
    this.endpoints = options.endpoints;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.logger = options.logger;
    this.sleep = options.sleep;
  }

  private call(stage: StageName, url: string, payload: unknown, policy: RetryPolicy = this.retry) {
    return withRetry(() => callStage(stage, this.fetchFn, url, payload, this.timeoutMs), policy, {
      shouldRetry: error => error instanceof StageError && error.retryable,
      onRetry: (error, attempt, delayMs) => {
        this.logger?.warn({ stage, attempt, delayMs, err: errorMessage(error) }, 'stage_retry');
      },
      sleep: this.sleep
    });
  }

  async transcribe(audioUri: string): Promise<string> {
    const body = await this.call('transcribe', joinUrl(this.endpoints.asrUrl, '/asr/transcribe'), {
      audio_uri: audioUri
    });
    const decoded = decode('transcribe', TranscribeResponse, body);
    return required('transcribe', 'transcript', decoded.transcript_text ?? decoded.transcript);
  }

  async refine(text: string, projects: KnownProject[] = []): Promise<RefineResult> {
    const body = await this.call('refine', joinUrl(this.endpoints.refineUrl, '/refine'), { text, projects });
    const decoded = decode('refine', RefineResponse, body);
    return {
      refinedText: required('refine', 'refined_text', decoded.refined_text),
      projectSlugHint: decoded.inferred_project_slug?.trim() || null
    };
  }

  /**
   * Runs a tool to completion. A non-zero exit code is reported as a
   * rejection carrying the tool's stderr (or stdout when stderr is empty).
   */
  async runTool(toolName: string, input: ToolInput): Promise<ToolResult> {
    const toolInput: Record<string, string> = { message: input.message };
    if (input.workdir) toolInput.workdir = input.workdir;
    if (input.subject) toolInput.subject = input.subject;

    const body = await this.call(
      'run-tool',
      joinUrl(this.endpoints.toolerUrl, '/tooler/run'),
      { task_id: input.taskId, tool_name: toolName, input: toolInput, text: input.message },
      NO_RETRY
    );
    const decoded = decode('run-tool', ToolResponse, body);
    const resultText = decoded.result_text?.trim() ?? '';
    const stderr = decoded.stderr?.trim() ?? '';

    if (decoded.exit_code != null && decoded.exit_code !== 0) {
      throw new StageRejectedError('run-tool', `exit code ${decoded.exit_code}: ${stderr || resultText || 'no output'}`);
    }
    return {
      output: body,
      resultText,
      stderr,
      artifacts: decoded.artifacts ?? [],
      branch: decoded.branch ?? null,
      commitHash: decoded.commit_hash ?? null
    };
  }

  async summarize(input: SummarizeInput): Promise<string> {
    const body = await this.call('summarize', joinUrl(this.endpoints.summarizerUrl, '/summarize'), {
      task_id: input.taskId,
      refined_text: input.refinedText,
      tool_stdout: input.toolStdout,
      tool_stderr: input.toolStderr,
      mode: input.mode
    });
    const decoded = decode('summarize', SummarizeResponse, body);
    return required('summarize', 'summary', decoded.summary_text || decoded.summary);
  }

  async synthesize(text: string, taskId: string): Promise<string> {
    const body = await this.call('synthesize', joinUrl(this.endpoints.ttsUrl, '/tts/synthesize'), {
      text,
      task_id: taskId
    });
    const decoded = decode('synthesize', SynthesizeResponse, body);
    return required('synthesize', 'audio_uri', decoded.audio_uri);
  }
}
