import crypto from "node:crypto";
import { z } from "zod";
import type { Env } from "./env.js";

export const GatewayConfigSchema = z.object({
  http: z.object({
    port: z.number().int().positive()
  }),
  stages: z.object({
    asrUrl: z.string().url(),
    refineUrl: z.string().url(),
    toolerUrl: z.string().url(),
    summarizerUrl: z.string().url(),
    ttsUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    retry: z.object({
      maxRetries: z.number().int().min(0),
      baseDelayMs: z.number().int().min(0),
      maxDelayMs: z.number().int().min(0)
    })
  }),
  worker: z.object({
    concurrency: z.number().int().positive(),
    toolName: z.string().min(1),
    toolWorkdir: z.string().optional(),
    toolSubject: z.string().optional(),
    projectHintLimit: z.number().int().min(0)
  }),
  notify: z.object({
    callbackUrl: z.string().url().optional()
  }),
  sweep: z.object({
    onStart: z.boolean(),
    staleMs: z.number().int().min(0)
  })
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export function configFromEnv(env: Env): GatewayConfig {
  return GatewayConfigSchema.parse({
    http: { port: env.GATEWAY_PORT },
    stages: {
      asrUrl: env.ASR_URL,
      refineUrl: env.REFINE_URL,
      toolerUrl: env.TOOLER_URL,
      summarizerUrl: env.SUMMARIZER_URL,
      ttsUrl: env.TTS_URL,
      timeoutMs: env.UPSTREAM_TIMEOUT_MS,
      retry: {
        maxRetries: env.STAGE_MAX_RETRIES,
        baseDelayMs: env.STAGE_RETRY_BASE_MS,
        maxDelayMs: env.STAGE_RETRY_MAX_MS
      }
    },
    worker: {
      concurrency: env.WORKER_CONCURRENCY,
      toolName: env.TOOL_NAME,
      toolWorkdir: env.TOOL_WORKDIR,
      toolSubject: env.TOOL_COMMIT_SUBJECT,
      projectHintLimit: env.PROJECT_HINT_LIMIT
    },
    notify: { callbackUrl: env.BOT_CALLBACK_URL },
    sweep: { onStart: env.SWEEP_ON_START, staleMs: env.SWEEP_STALE_MS }
  });
}

export function configHash(cfg: GatewayConfig) {
  return crypto.createHash("sha256").update(JSON.stringify(cfg)).digest("hex").slice(0, 12);
}
