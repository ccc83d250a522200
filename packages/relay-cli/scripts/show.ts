#!/usr/bin/env node
/**
 * Show one task with its status history and tool runs
 *
 * Usage:
 *   npm run relay:show -- <taskId>
 */

import { formatDate } from './common.js';
import { createDb, getTask, getTaskHistory, listToolRuns } from '@taskrelay/relay-db';

async function main() {
  const taskId = process.argv[2];
  if (!taskId || taskId.startsWith('-')) {
    console.log('Usage: npm run relay:show -- <taskId>');
    process.exit(taskId === '--help' || taskId === '-h' ? 0 : 1);
  }

  const db = createDb();

  try {
    const task = await getTask(db, taskId);
    if (!task) {
      console.error(`Task not found: ${taskId}`);
      process.exitCode = 1;
      return;
    }

    const fields: Array<[string, string | null]> = [
      ['id', task.id],
      ['project', task.project_id],
      ['input', task.input_type],
      ['status', task.status],
      ['chat', task.origin_chat_id],
      ['raw_text', task.raw_text],
      ['raw_audio_uri', task.raw_audio_uri],
      ['transcript', task.transcript],
      ['refined_text', task.refined_text],
      ['project_hint', task.project_slug_hint],
      ['summary', task.final_summary],
      ['audio_uri', task.final_audio_uri],
      ['failure', task.failure_reason],
      ['created_at', formatDate(task.created_at)],
      ['updated_at', formatDate(task.updated_at)]
    ];
    for (const [label, value] of fields) {
      if (value !== null) {
        console.log(`${label.padEnd(14)} ${value}`);
      }
    }

    console.log('\nHistory:');
    for (const entry of await getTaskHistory(db, task.id)) {
      console.log(`  ${formatDate(entry.changed_at)}  ${(entry.from_status ?? '-').padEnd(15)} -> ${entry.to_status}`);
    }

    const runs = await listToolRuns(db, task.id);
    if (runs.length > 0) {
      console.log('\nTool runs:');
      for (const run of runs) {
        console.log(`  ${run.id}  ${run.tool_name}  ${run.status}${run.error ? `  ${run.error}` : ''}`);
      }
    }
  } finally {
    await db.$pool.end();
  }
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
