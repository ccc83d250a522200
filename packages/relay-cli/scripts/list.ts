#!/usr/bin/env node
/**
 * List latest tasks
 *
 * Usage:
 *   npm run relay:list -- [options]
 *
 * Options:
 *   --status <status>  Filter by task status (default: all)
 *   --project <id>     Filter by project id
 *   --limit <n>        Number of tasks to show (default: 20)
 *   --help             Show help
 */

import { formatDate, truncate } from './common.js';
import { createDb, isTaskStatus, listTasks } from '@taskrelay/relay-db';
import type { Task, TaskStatus } from '@taskrelay/relay-db';

function excerpt(task: Task): string {
  const text = task.refined_text ?? task.transcript ?? task.raw_text;
  if (text) {
    return truncate(text.replace(/\s+/g, ' ').trim(), 50);
  }
  return task.input_type === 'voice' ? '[audio]' : '[no content]';
}

function showHelp() {
  console.log(`
Usage: npm run relay:list -- [options]

List the most recently created tasks.

Options:
  --status <status>  Filter by status (e.g., FAILED)
  --project <id>     Filter by project id
  --limit <n>        Number of tasks to show (default: 20)
  --help             Show this help message

Environment:
  DATABASE_URL       PostgreSQL connection string (required)
`);
}

async function main() {
  const args = process.argv.slice(2);

  let status: TaskStatus | undefined;
  let projectId: string | undefined;
  let limit = 20;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      showHelp();
      process.exit(0);
    }

    if (arg === '--status' && i + 1 < args.length) {
      const value = args[++i].toUpperCase();
      if (!isTaskStatus(value)) {
        console.error(`Unknown status: ${value}`);
        process.exit(1);
      }
      status = value;
    } else if (arg === '--project' && i + 1 < args.length) {
      projectId = args[++i];
    } else if (arg === '--limit' && i + 1 < args.length) {
      limit = parseInt(args[++i], 10);
      if (isNaN(limit) || limit < 1) {
        console.error('Invalid limit value');
        process.exit(1);
      }
    }
  }

  const db = createDb();

  try {
    const tasks = await listTasks(db, { projectId, statuses: status ? [status] : undefined, limit });

    if (tasks.length === 0) {
      console.log('No tasks found.');
      return;
    }

    console.log(`${'TASK_ID'.padEnd(28)} ${'TYPE'.padEnd(6)} ${'STATUS'.padEnd(15)} ${'CREATED_AT'.padEnd(20)} EXCERPT`);
    console.log('-'.repeat(110));

    for (const task of tasks) {
      console.log(
        `${task.id.padEnd(28)} ` +
        `${task.input_type.padEnd(6)} ` +
        `${task.status.padEnd(15)} ` +
        `${formatDate(task.created_at).padEnd(20)} ` +
        `${excerpt(task)}`
      );
    }

    console.log(`\nShowing ${tasks.length} task(s)`);
  } catch (error) {
    console.error('Failed to list tasks:', error);
    process.exitCode = 1;
  } finally {
    await db.$pool.end();
  }
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
