// packages/docket-cli/src/commands/on.ts
import { Command } from 'commander';
import type { TimerResult } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { formatTimestamp, printJson, printNotices } from '../output.js';
import { parseOptionalTimestamp, parseTaskId } from '../parse.js';

export interface OnOptions {
  services: Services;
  /** Omitted starts the task at the front of the queue. */
  taskId?: number;
  at?: number;
  json: boolean;
}

export function runOn(options: OnOptions): TimerResult {
  const { services, taskId, at, json } = options;
  const result =
    taskId === undefined
      ? services.timerService.startDefault({ at })
      : services.timerService.startFor(taskId, { at });

  if (json) {
    printJson(result);
  } else {
    printNotices(result.notices);
    const task = services.taskService.requireTask(result.session.task_id);
    console.log(
      `✓ Timer on task ${task.id} since ${formatTimestamp(result.session.start_ts)}: ${task.description}`
    );
  }
  return result;
}

export function createOnCommand(): Command {
  return new Command('on')
    .description('Start the timer on a task, or on the front of the queue')
    .argument('[taskId]', 'Task ID (switches away from any running task)')
    .option('--at <time>', 'Start time (default: now)')
    .action(function (this: Command, rawId: string | undefined, opts: { at?: string }) {
      withServices(this, (services, globalOpts) => {
        runOn({
          services,
          taskId: rawId === undefined ? undefined : parseTaskId(rawId),
          at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
