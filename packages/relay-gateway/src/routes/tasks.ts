import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  TASK_STATUSES,
  createTask,
  getTaskHistory,
  listTasks,
  listToolRuns,
  parseCreateTaskInput,
  requireTask,
  type Db,
  type Task,
  type TaskQueue
} from "@taskrelay/relay-db";

const MAX_LIST_LIMIT = 500;

export async function registerTasks(app: FastifyInstance, deps: { db: Db; queue: TaskQueue }) {
  const { db, queue } = deps;

  app.post("/tasks", async (req, reply) => {
    if (queue.isClosed()) {
      reply.code(503);
      return { error: "queue_closed", message: "Not accepting tasks while shutting down" };
    }

    const input = parseCreateTaskInput(req.body);
    const task = await createTask(db, input);

    if (!queue.enqueue(task.id)) {
      // stays RECEIVED; the next start-up sweep re-enqueues it
      req.log.warn({ taskId: task.id }, "task_enqueue_refused");
    }

    reply.code(201);
    return { ...task, tool_runs: [] };
  });

  app.get("/tasks", async (req, reply) => {
    const Schema = z.object({
      project_id: z.string().min(1).optional(),
      status: z.enum(TASK_STATUSES).optional(),
      limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(50)
    });

    const parsed = Schema.safeParse(req.query);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_query", issues: parsed.error.issues };
    }

    return listTasks(db, {
      projectId: parsed.data.project_id,
      statuses: parsed.data.status ? [parsed.data.status] : undefined,
      limit: parsed.data.limit
    });
  });

  app.get<{ Params: { taskId: string } }>("/tasks/:taskId", async (req) => {
    const task = await requireTask(db, req.params.taskId);
    return taskSnapshot(db, task);
  });
}

async function taskSnapshot(db: Db, task: Task) {
  const [toolRuns, history] = await Promise.all([listToolRuns(db, task.id), getTaskHistory(db, task.id)]);
  return {
    ...task,
    tool_runs: toolRuns.map((run) => run.id),
    status_history: history.map((entry) => ({
      from: entry.from_status,
      to: entry.to_status,
      changed_at: entry.changed_at
    }))
  };
}
