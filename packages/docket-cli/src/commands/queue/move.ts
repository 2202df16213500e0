// packages/docket-cli/src/commands/queue/move.ts
import { Command } from 'commander';
import type { QueueEntry } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseInteger, parseTaskId } from '../../parse.js';

export interface QueueMoveOptions {
  services: Services;
  taskId: number;
  position: number;
  json: boolean;
}

export function runQueueMove(options: QueueMoveOptions): QueueEntry {
  const { services, taskId, position, json } = options;
  const entry = services.queueService.insertAt(taskId, position);

  if (json) {
    printJson(entry);
  } else {
    console.log(`✓ Task ${taskId} is at position ${entry.position}`);
  }
  return entry;
}

export function createQueueMoveCommand(): Command {
  return new Command('move')
    .description('Insert or move a task to a queue position')
    .argument('<taskId>', 'Task ID')
    .argument('<position>', 'Target position (clamped to the queue)')
    .action(function (this: Command, rawId: string, rawPosition: string) {
      withServices(this, (services, globalOpts) => {
        runQueueMove({
          services,
          taskId: parseTaskId(rawId),
          position: parseInteger(rawPosition, 'Position'),
          json: globalOpts.json,
        });
      });
    });
}
