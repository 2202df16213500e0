// packages/docket-cli/src/commands/task/history.ts
import { Command } from 'commander';
import type { PersistedEventEnvelope } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { formatTimestamp, printJson } from '../../output.js';
import { parseTaskId } from '../../parse.js';

export interface HistoryResult {
  task_id: number;
  events: PersistedEventEnvelope[];
}

export interface HistoryOptions {
  services: Services;
  taskId: number;
  json: boolean;
}

export function runHistory(options: HistoryOptions): HistoryResult {
  const { services, taskId, json } = options;
  const result: HistoryResult = {
    task_id: taskId,
    events: services.taskService.history(taskId),
  };

  if (json) {
    printJson(result);
  } else if (result.events.length === 0) {
    console.log(`No history for task ${taskId}`);
  } else {
    for (const event of result.events) {
      console.log(`[${formatTimestamp(event.timestamp)}] ${event.type} ${JSON.stringify(event.data)}`);
    }
  }
  return result;
}

export function createHistoryCommand(): Command {
  return new Command('history')
    .description('Show the recorded transitions of a task')
    .argument('<taskId>', 'Task ID')
    .action(function (this: Command, rawId: string) {
      withServices(this, (services, globalOpts) => {
        runHistory({ services, taskId: parseTaskId(rawId), json: globalOpts.json });
      });
    });
}
