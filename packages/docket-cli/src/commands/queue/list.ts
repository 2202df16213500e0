// packages/docket-cli/src/commands/queue/list.ts
import { Command } from 'commander';
import type { QueueEntry } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson, printTable } from '../../output.js';

export interface QueueListResult {
  entries: QueueEntry[];
  /** Task id of the running session, if the timer is on. */
  timed_task_id: number | null;
}

export interface QueueListOptions {
  services: Services;
  json: boolean;
}

export function runQueueList(options: QueueListOptions): QueueListResult {
  const { services, json } = options;
  const result: QueueListResult = {
    entries: services.queueService.list(),
    timed_task_id: services.timerService.current()?.task_id ?? null,
  };

  if (json) {
    printJson(result);
  } else {
    printTable(
      result.entries.map(entry => ({
        pos: entry.position,
        id: entry.task_id,
        timer: entry.task_id === result.timed_task_id ? 'on' : '',
        description: entry.description,
      }))
    );
  }
  return result;
}

export function createQueueListCommand(): Command {
  return new Command('list')
    .description('Show the queue in order')
    .action(function (this: Command) {
      withServices(this, (services, globalOpts) => {
        runQueueList({ services, json: globalOpts.json });
      });
    });
}
