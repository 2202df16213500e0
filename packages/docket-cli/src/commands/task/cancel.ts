// packages/docket-cli/src/commands/task/cancel.ts
import { Command } from 'commander';
import type { LifecycleResult } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson, printNotices } from '../../output.js';
import { parseOptionalTimestamp, parseTaskId } from '../../parse.js';

export interface CancelOptions {
  services: Services;
  taskId: number;
  at?: number;
  json: boolean;
}

export function runCancel(options: CancelOptions): LifecycleResult {
  const { services, taskId, at, json } = options;
  const result = services.taskService.cancel(taskId, { at });

  if (json) {
    printJson(result);
  } else {
    printNotices(result.notices);
    console.log(`✓ Cancelled task ${taskId}: ${result.task.description}`);
  }
  return result;
}

export function createCancelCommand(): Command {
  return new Command('cancel')
    .description('Cancel a task')
    .argument('<taskId>', 'Task ID')
    .option('--at <time>', 'Cancellation time (default: now)')
    .action(function (this: Command, rawId: string, opts: { at?: string }) {
      withServices(this, (services, globalOpts) => {
        runCancel({
          services,
          taskId: parseTaskId(rawId),
          at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
