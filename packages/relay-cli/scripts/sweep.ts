#!/usr/bin/env node
/**
 * Fail tasks left in progress by a process that is no longer running
 *
 * Usage:
 *   npm run relay:sweep -- [--stale-ms <n>] [--dry-run]
 *
 * Only run while no gateway is processing tasks against the same database.
 * Tasks still RECEIVED are listed; the gateway picks them up on its next start.
 */

import './common.js';
import { createDb, createLogger, sweepStuckTasks } from '@taskrelay/relay-db';

const DEFAULT_STALE_MS = 10 * 60 * 1000;

async function main() {
  const args = process.argv.slice(2);
  let staleMs = DEFAULT_STALE_MS;
  let dryRun = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--stale-ms' && i + 1 < args.length) {
      staleMs = parseInt(args[++i], 10);
      if (isNaN(staleMs) || staleMs < 0) {
        console.error('Invalid --stale-ms value');
        process.exit(1);
      }
    }
  }

  const log = createLogger(process.env.LOG_LEVEL === 'debug' ? 'debug' : 'info', 'relay-sweep');
  const db = createDb();

  try {
    const result = await sweepStuckTasks(db, { staleMs, dryRun });
    for (const { taskId, status } of result.failed) {
      log.info({ taskId, status, dryRun }, 'task_interrupted');
    }
    log.info({ failed: result.failed.length, pending: result.requeue.length, dryRun }, 'sweep_done');
  } finally {
    await db.$pool.end();
  }
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
