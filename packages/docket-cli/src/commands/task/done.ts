// packages/docket-cli/src/commands/task/done.ts
import { Command } from 'commander';
import type { LifecycleResult } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { formatDuration, printJson, printNotices } from '../../output.js';
import { parseOptionalTimestamp, parseTaskId } from '../../parse.js';

export interface DoneOptions {
  services: Services;
  taskId: number;
  next?: boolean;
  at?: number;
  json: boolean;
}

export function runDone(options: DoneOptions): LifecycleResult {
  const { services, taskId, next, at, json } = options;
  const result = services.taskService.complete(taskId, { next, at });

  if (json) {
    printJson(result);
    return result;
  }

  printNotices(result.notices);
  if (result.stopped) {
    const secs = result.stopped.end_ts - result.stopped.start_ts;
    console.log(`Stopped timer on task ${taskId} after ${formatDuration(secs)}`);
  }
  console.log(`✓ Completed task ${taskId}: ${result.task.description}`);
  if (result.started) {
    console.log(`Started timer on task ${result.started.task_id}`);
  }
  return result;
}

export function createDoneCommand(): Command {
  return new Command('done')
    .description('Complete a task, stopping its timer if it is running')
    .argument('<taskId>', 'Task ID')
    .option('-n, --next', 'Start the timer on the next queued task')
    .option('--at <time>', 'Completion time (default: now)')
    .action(function (this: Command, rawId: string, opts: { next?: boolean; at?: string }) {
      withServices(this, (services, globalOpts) => {
        runDone({
          services,
          taskId: parseTaskId(rawId),
          next: opts.next,
          at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
