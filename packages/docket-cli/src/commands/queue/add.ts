// packages/docket-cli/src/commands/queue/add.ts
import { Command } from 'commander';
import type { QueueEntry } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseTaskId } from '../../parse.js';

export interface QueueAddOptions {
  services: Services;
  taskId: number;
  json: boolean;
}

export function runQueueAdd(options: QueueAddOptions): QueueEntry {
  const { services, taskId, json } = options;
  const entry = services.queueService.enqueue(taskId);

  if (json) {
    printJson(entry);
  } else {
    console.log(`✓ Queued task ${taskId} at position ${entry.position}`);
  }
  return entry;
}

export function createQueueAddCommand(): Command {
  return new Command('add')
    .description('Append a task to the queue, or move it to the back')
    .argument('<taskId>', 'Task ID')
    .action(function (this: Command, rawId: string) {
      withServices(this, (services, globalOpts) => {
        runQueueAdd({ services, taskId: parseTaskId(rawId), json: globalOpts.json });
      });
    });
}
