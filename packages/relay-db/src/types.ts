import { z } from 'zod';

export const TASK_STATUSES = [
  'RECEIVED',
  'ROUTED',
  'TRANSCRIBING',
  'REFINING',
  'TOOL_QUEUED',
  'TOOL_RUNNING',
  'SUMMARIZING',
  'TTS_GENERATING',
  'DELIVERED',
  'FAILED'
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TOOL_RUN_STATUSES = ['QUEUED', 'RUNNING', 'SUCCEEDED', 'FAILED'] as const;

export type ToolRunStatus = (typeof TOOL_RUN_STATUSES)[number];

export const INPUT_TYPES = ['text', 'voice'] as const;

export type InputType = (typeof INPUT_TYPES)[number];

const JsonObject = z.record(z.unknown());

// Rows come back from pg-promise untyped; every store read goes through one
// of these schemas.

export const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  metadata: JsonObject.nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

export type Project = z.infer<typeof ProjectSchema>;

const TaskCommon = z.object({
  id: z.string(),
  project_id: z.string(),
  origin_chat_id: z.string().nullable(),
  transcript: z.string().nullable(),
  refined_text: z.string().nullable(),
  project_slug_hint: z.string().nullable(),
  final_summary: z.string().nullable(),
  final_audio_uri: z.string().nullable(),
  status: z.enum(TASK_STATUSES),
  failure_reason: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

export const TaskSchema = z.discriminatedUnion('input_type', [
  TaskCommon.extend({
    input_type: z.literal('text'),
    raw_text: z.string(),
    raw_audio_uri: z.null()
  }),
  TaskCommon.extend({
    input_type: z.literal('voice'),
    raw_text: z.null(),
    raw_audio_uri: z.string()
  })
]);

export type Task = z.infer<typeof TaskSchema>;
export type TextTask = Extract<Task, { input_type: 'text' }>;
export type VoiceTask = Extract<Task, { input_type: 'voice' }>;

export const TaskStatusHistorySchema = z.object({
  id: z.string(),
  task_id: z.string(),
  from_status: z.enum(TASK_STATUSES).nullable(),
  to_status: z.enum(TASK_STATUSES),
  changed_at: z.coerce.date()
});

export type TaskStatusHistory = z.infer<typeof TaskStatusHistorySchema>;

export const ToolRunSchema = z.object({
  id: z.string(),
  task_id: z.string(),
  tool_name: z.string(),
  status: z.enum(TOOL_RUN_STATUSES),
  input: JsonObject.nullable(),
  output: JsonObject.nullable(),
  error: z.string().nullable(),
  started_at: z.coerce.date().nullable(),
  finished_at: z.coerce.date().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

export type ToolRun = z.infer<typeof ToolRunSchema>;

/** Derived task fields the pipeline fills in as it goes. */
export interface TaskFieldsPatch {
  transcript?: string;
  refined_text?: string;
  project_slug_hint?: string | null;
  final_summary?: string;
  final_audio_uri?: string;
}
