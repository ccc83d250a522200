import Fastify, { type FastifyError } from "fastify";
import { NotFoundError, StorageUnavailableError, ValidationError, type Db, type TaskQueue } from "@taskrelay/relay-db";
import { registerHealth } from "./routes/health.js";
import { registerProjects } from "./routes/projects.js";
import { registerTasks } from "./routes/tasks.js";
import { registerToolRuns } from "./routes/tool-runs.js";

export const SERVICE_NAME = "relay-gateway";

export interface AppDeps {
  db: Db;
  queue: TaskQueue;
  /** Omitted in tests: no request logging. */
  logLevel?: string;
}

export async function buildApp(deps: AppDeps) {
  const app = Fastify({ logger: deps.logLevel ? { level: deps.logLevel } : false });

  app.setErrorHandler((error: FastifyError, req, reply) => {
    if (error instanceof ValidationError) {
      return reply.code(400).send({ error: error.type, message: error.message, issues: error.issues });
    }
    if (error instanceof NotFoundError) {
      return reply.code(404).send({ error: error.type, message: error.message });
    }
    if (error instanceof StorageUnavailableError) {
      req.log.error({ err: error.message }, "storage_unavailable");
      return reply.code(503).send({ error: error.type, message: "Storage unavailable" });
    }
    return reply.send(error);
  });

  await registerHealth(app, { service: SERVICE_NAME });
  await registerProjects(app, { db: deps.db });
  await registerTasks(app, { db: deps.db, queue: deps.queue });
  await registerToolRuns(app, { db: deps.db });

  return app;
}
