import "dotenv/config";
import { z } from "zod";

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === "true" ? true : v === "false" ? false : fallback));

const serviceUrl = (host: string) => z.string().url().default(`http://${host}:8000`);

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),

  GATEWAY_PORT: z.coerce.number().int().positive().default(8787),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  ASR_URL: serviceUrl("asr"),
  REFINE_URL: serviceUrl("refine"),
  TOOLER_URL: serviceUrl("tooler"),
  SUMMARIZER_URL: serviceUrl("summarizer"),
  TTS_URL: serviceUrl("tts"),
  // empty disables result notification
  BOT_CALLBACK_URL: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined))
    .pipe(z.string().url().optional()),

  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  STAGE_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  STAGE_RETRY_BASE_MS: z.coerce.number().int().min(0).default(250),
  STAGE_RETRY_MAX_MS: z.coerce.number().int().min(0).default(4000),

  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  TOOL_NAME: z.string().min(1).default("dummy"),
  PROJECT_HINT_LIMIT: z.coerce.number().int().min(0).default(100),
  TOOL_WORKDIR: z.string().min(1).optional(),
  TOOL_COMMIT_SUBJECT: z.string().min(1).optional(),

  SWEEP_ON_START: flag(true),
  SWEEP_STALE_MS: z.coerce.number().int().min(0).default(0)
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment:\n${msg}`);
  }
  return parsed.data;
}
