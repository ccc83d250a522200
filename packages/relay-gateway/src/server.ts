import {
  OrchestratorWorker,
  ResultNotifier,
  StageClient,
  TaskQueue,
  createDb,
  migrate,
  sweepStuckTasks,
  type Db
} from "@taskrelay/relay-db";
import { loadEnv } from "./env.js";
import { configFromEnv, configHash } from "./config.js";
import { buildApp } from "./app.js";

async function main() {
  const env = loadEnv();
  const cfg = configFromEnv(env);

  const db: Db = createDb(env.DATABASE_URL);
  const queue = new TaskQueue();
  const app = await buildApp({ db, queue, logLevel: env.LOG_LEVEL });

  app.log.info({ config: { hash: configHash(cfg), ...cfg } }, "gateway_config");

  const applied = await migrate(db);
  if (applied.length > 0) {
    app.log.info({ applied }, "migrations_applied");
  }

  const stages = new StageClient({
    endpoints: cfg.stages,
    timeoutMs: cfg.stages.timeoutMs,
    retry: cfg.stages.retry,
    logger: app.log
  });
  const notifier = new ResultNotifier({ callbackUrl: cfg.notify.callbackUrl, timeoutMs: cfg.stages.timeoutMs });
  const worker = new OrchestratorWorker({
    db,
    queue,
    stages,
    notifier,
    logger: app.log,
    concurrency: cfg.worker.concurrency,
    toolName: cfg.worker.toolName,
    toolWorkdir: cfg.worker.toolWorkdir,
    toolSubject: cfg.worker.toolSubject,
    projectHintLimit: cfg.worker.projectHintLimit
  });

  if (cfg.sweep.onStart) {
    const swept = await sweepStuckTasks(db, { staleMs: cfg.sweep.staleMs });
    for (const taskId of swept.requeue) {
      queue.enqueue(taskId);
    }
    app.log.info({ requeued: swept.requeue.length, failed: swept.failed }, "sweep_done");
  }

  worker.start();
  await app.listen({ port: cfg.http.port, host: "0.0.0.0" });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    app.log.info({ signal }, "gateway_stopping");
    queue.close();
    await app.close();
    await worker.stop();
    await db.$pool.end();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err) => {
          app.log.error({ err }, "gateway_stop_failed");
          process.exit(1);
        }
      );
    });
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
