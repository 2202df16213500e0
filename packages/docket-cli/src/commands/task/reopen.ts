// packages/docket-cli/src/commands/task/reopen.ts
import { Command } from 'commander';
import type { Task } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseTaskId } from '../../parse.js';

export interface ReopenOptions {
  services: Services;
  taskId: number;
  json: boolean;
}

export function runReopen(options: ReopenOptions): Task {
  const { services, taskId, json } = options;
  const task = services.taskService.reopen(taskId);

  if (json) {
    printJson(task);
  } else {
    console.log(`✓ Reopened task ${taskId}: ${task.description}`);
  }
  return task;
}

export function createReopenCommand(): Command {
  return new Command('reopen')
    .description('Return a completed or cancelled task to open (not queued)')
    .argument('<taskId>', 'Task ID')
    .action(function (this: Command, rawId: string) {
      withServices(this, (services, globalOpts) => {
        runReopen({ services, taskId: parseTaskId(rawId), json: globalOpts.json });
      });
    });
}
