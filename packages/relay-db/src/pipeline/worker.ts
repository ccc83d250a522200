import type { Logger } from '../logger.js';
import type { Db } from '../db.js';
import { NotifyFailureError, errorMessage, type StageName } from '../errors.js';
import {
  completeToolRun,
  failTask,
  failToolRun,
  queueToolRun,
  startToolRun,
  transitionTask
} from '../state-machine.js';
import { listProjects, projectSlug } from '../store.projects.js';
import { getTask } from '../store.tasks.js';
import type { Task } from '../types.js';
import type { ResultNotifier } from './notifier.js';
import type { TaskQueue } from './queue.js';
import type { StageClient, ToolResult } from './stages.js';

export interface OrchestratorWorkerOptions {
  db: Db;
  queue: TaskQueue;
  stages: StageClient;
  notifier: ResultNotifier;
  logger: Logger;
  /** Tasks processed at the same time. Each task is handled by one routine end to end. */
  concurrency?: number;
  toolName?: string;
  toolWorkdir?: string;
  toolSubject?: string;
  /** Most recent projects offered to refine as slug hints. */
  projectHintLimit?: number;
}

export const DEFAULT_PROJECT_HINT_LIMIT = 100;

export interface WorkerStats {
  processed: number;
  delivered: number;
  failed: number;
  skipped: number;
  notifyFailures: number;
}

/** Everything one pipeline run carries from step to step. */
interface TaskContext {
  /** The task as first dequeued; its input kind and raw input never change. */
  readonly input: Task;
  current: Task;
  log: Logger;
}

export class OrchestratorWorker {
  private readonly db: Db;
  private readonly queue: TaskQueue;
  private readonly stages: StageClient;
  private readonly notifier: ResultNotifier;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly toolName: string;
  private readonly toolWorkdir?: string;
  private readonly toolSubject?: string;
  private readonly projectHintLimit: number;

  private running = false;
  private unsubscribe: (() => void) | null = null;
  private active: Set<Promise<void>> = new Set();
  private inFlight: Set<string> = new Set();
  private idleWaiters: Array<() => void> = [];
  private stats: WorkerStats = { processed: 0, delivered: 0, failed: 0, skipped: 0, notifyFailures: 0 };

  constructor(options: OrchestratorWorkerOptions) {
    this.db = options.db;
    this.queue = options.queue;
    this.stages = options.stages;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.toolName = options.toolName ?? 'dummy';
    this.toolWorkdir = options.toolWorkdir;
    this.toolSubject = options.toolSubject;
    this.projectHintLimit = Math.max(0, options.projectHintLimit ?? DEFAULT_PROJECT_HINT_LIMIT);
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.unsubscribe = this.queue.onEnqueue(() => this.pump());
    this.logger.info({ concurrency: this.concurrency }, 'worker_started');
    this.pump();
  }

  /** Stop taking new ids and wait for the tasks already running. */
  async stop(): Promise<void> {
    this.running = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
    await Promise.all([...this.active]);
    this.logger.info({ stats: this.getStats() }, 'worker_stopped');
  }

  /** Resolves once the queue is empty and no task is in progress. */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  getStats(): WorkerStats {
    return { ...this.stats };
  }

  private isIdle(): boolean {
    return this.active.size === 0 && (this.queue.size() === 0 || !this.running);
  }

  private settleIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private pump(): void {
    while (this.running && this.active.size < this.concurrency) {
      const taskId = this.queue.dequeue();
      if (taskId === undefined) {
        break;
      }
      if (this.inFlight.has(taskId)) {
        this.logger.debug({ taskId }, 'task_already_in_flight');
        continue;
      }

      this.inFlight.add(taskId);
      const job: Promise<void> = this.processTask(taskId)
        .then(
          () => undefined,
          error => {
            this.logger.error({ taskId, err: errorMessage(error) }, 'worker_unhandled_error');
          }
        )
        .finally(() => {
          this.inFlight.delete(taskId);
          this.active.delete(job);
          this.pump();
          this.settleIdle();
        });
      this.active.add(job);
    }
    this.settleIdle();
  }

  /**
   * Drives one task from RECEIVED to a terminal status, then notifies the
   * origin. Never throws for stage or storage failures: those end in FAILED,
   * or leave the task at its last committed status when even that write fails.
   */
  async processTask(taskId: string): Promise<Task | null> {
    const log = this.logger.child({ taskId });
    const task = await getTask(this.db, taskId);
    if (!task) {
      log.warn('task_missing');
      this.stats.skipped++;
      return null;
    }
    if (task.status !== 'RECEIVED') {
      // Already picked up once; steps are never re-entered.
      log.warn({ status: task.status }, 'task_not_received');
      this.stats.skipped++;
      return task;
    }

    log.info({ inputType: task.input_type }, 'task_dequeued');
    const ctx: TaskContext = { input: task, current: task, log };
    let outcome: Task;
    try {
      outcome = await this.runPipeline(ctx);
    } catch (error) {
      log.error({ status: ctx.current.status, err: errorMessage(error) }, 'task_failed');
      try {
        outcome = await failTask(this.db, taskId, error);
      } catch (failError) {
        log.error({ err: errorMessage(failError) }, 'task_fail_write_failed');
        this.stats.processed++;
        return null;
      }
    }

    this.stats.processed++;
    if (outcome.status === 'DELIVERED') {
      this.stats.delivered++;
    } else {
      this.stats.failed++;
    }
    await this.notify(outcome, log);
    return outcome;
  }

  private async runPipeline(ctx: TaskContext): Promise<Task> {
    const { input } = ctx;
    const db = this.db;

    ctx.current = await transitionTask(db, ctx.current, 'ROUTED');

    let sourceText: string;
    if (input.input_type === 'voice') {
      const audioRef = input.raw_audio_uri;
      ctx.current = await transitionTask(db, ctx.current, 'TRANSCRIBING');
      const transcript = await this.timed(ctx, 'transcribe', () => this.stages.transcribe(audioRef));
      ctx.current = await transitionTask(db, ctx.current, 'REFINING', { transcript });
      sourceText = transcript;
    } else {
      sourceText = input.raw_text.trim();
      if (!sourceText) {
        throw new Error('Text task has empty raw_text');
      }
      ctx.current = await transitionTask(db, ctx.current, 'REFINING');
    }

    const known = this.projectHintLimit > 0 ? await listProjects(db, { limit: this.projectHintLimit }) : [];
    const projects = known.map(project => ({ name: project.name, slug: projectSlug(project) }));
    const refined = await this.timed(ctx, 'refine', () => this.stages.refine(sourceText, projects));

    const queued = await queueToolRun(
      db,
      ctx.current,
      { tool_name: this.toolName, input: { text: refined.refinedText } },
      { refined_text: refined.refinedText, project_slug_hint: refined.projectSlugHint }
    );
    ctx.current = queued.task;

    const started = await startToolRun(db, ctx.current, queued.toolRun);
    ctx.current = started.task;

    let tool: ToolResult;
    try {
      tool = await this.timed(ctx, 'run-tool', () =>
        this.stages.runTool(this.toolName, {
          taskId: input.id,
          message: refined.refinedText,
          workdir: this.toolWorkdir,
          subject: this.toolSubject
        })
      );
    } catch (error) {
      const failed = await failToolRun(db, ctx.current, started.toolRun, error);
      ctx.log.warn({ toolRunId: started.toolRun.id, reason: failed.task.failure_reason }, 'tool_run_failed');
      return failed.task;
    }

    ctx.current = (await completeToolRun(db, ctx.current, started.toolRun, tool.output)).task;
    ctx.log.info(
      { toolRunId: started.toolRun.id, artifacts: tool.artifacts.length, branch: tool.branch, commit: tool.commitHash },
      'tool_run_succeeded'
    );

    const summary = await this.timed(ctx, 'summarize', () =>
      this.stages.summarize({
        taskId: input.id,
        refinedText: refined.refinedText,
        toolStdout: tool.resultText,
        toolStderr: tool.stderr,
        mode: input.input_type === 'voice' ? 'audio' : 'text'
      })
    );

    if (input.input_type === 'voice') {
      ctx.current = await transitionTask(db, ctx.current, 'TTS_GENERATING', { final_summary: summary });
      const audioUri = await this.timed(ctx, 'synthesize', () => this.stages.synthesize(summary, input.id));
      ctx.current = await transitionTask(db, ctx.current, 'DELIVERED', { final_audio_uri: audioUri });
    } else {
      ctx.current = await transitionTask(db, ctx.current, 'DELIVERED', { final_summary: summary });
    }

    ctx.log.info('task_delivered');
    return ctx.current;
  }

  private async timed<T>(ctx: TaskContext, stage: StageName, call: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    ctx.log.debug({ stage }, 'stage_start');
    try {
      const result = await call();
      ctx.log.info({ stage, durationMs: Date.now() - startedAt }, 'stage_done');
      return result;
    } catch (error) {
      ctx.log.warn({ stage, durationMs: Date.now() - startedAt, err: errorMessage(error) }, 'stage_error');
      throw error;
    }
  }

  private async notify(task: Task, log: Logger): Promise<void> {
    try {
      if (await this.notifier.notify(task)) {
        log.info({ status: task.status }, 'result_notified');
      }
    } catch (error) {
      if (!(error instanceof NotifyFailureError)) {
        throw error;
      }
      this.stats.notifyFailures++;
      log.warn({ err: error.message }, 'result_notify_failed');
    }
  }
}
