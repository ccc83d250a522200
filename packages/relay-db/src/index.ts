export { createDb, withStorage, isConnectionError, type Db, type Queryable } from './db.js';
export { migrate, loadMigrations, getAppliedMigrations, applyMigration, defaultMigrationsDir, type Migration } from './migrate.js';
export { ulid } from './ulid.js';
export { createLogger, type Logger } from './logger.js';
export * from './errors.js';
export * from './types.js';
export * from './transitions.js';
export * from './store.projects.js';
export * from './store.tasks.js';
export * from './store.tool-runs.js';
export * from './state-machine.js';
export { TaskQueue } from './pipeline/queue.js';
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY, NO_RETRY, type RetryPolicy, type RetryOptions } from './pipeline/retry.js';
export { callStage, postJson, defaultFetch, joinUrl, type FetchFn, type HttpRequest, type HttpResponse } from './pipeline/http.js';
export {
  StageClient,
  type StageClientOptions,
  type StageEndpoints,
  type KnownProject,
  type RefineResult,
  type ToolInput,
  type ToolResult,
  type SummaryMode,
  type SummarizeInput
} from './pipeline/stages.js';
export { ResultNotifier, resultPayload, type ResultNotifierOptions, type TaskResultPayload } from './pipeline/notifier.js';
export { OrchestratorWorker, DEFAULT_PROJECT_HINT_LIMIT, type OrchestratorWorkerOptions, type WorkerStats } from './pipeline/worker.js';
export { sweepStuckTasks, type SweepOptions, type SweepResult } from './pipeline/sweep.js';
