// packages/docket-cli/src/commands/sessions/list.ts
import { Command } from 'commander';
import type { WorkSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { formatDuration, formatTimestamp, printJson, printTable } from '../../output.js';
import { parseTaskId } from '../../parse.js';

export interface SessionsListResult {
  sessions: WorkSession[];
  total_secs: number;
}

export interface SessionsListOptions {
  services: Services;
  taskId?: number;
  json: boolean;
  now: number;
}

export function runSessionsList(options: SessionsListOptions): SessionsListResult {
  const { services, taskId, json, now } = options;
  if (taskId !== undefined) {
    services.taskService.requireTask(taskId);
  }
  const sessions = services.timerService.listSessions({ taskId });
  const result: SessionsListResult = {
    sessions,
    total_secs: sessions.reduce((sum, s) => sum + ((s.end_ts ?? now) - s.start_ts), 0),
  };

  if (json) {
    printJson(result);
  } else {
    printTable(
      sessions.map(s => ({
        id: s.id,
        task: s.task_id,
        start: formatTimestamp(s.start_ts),
        end: s.end_ts === null ? 'running' : formatTimestamp(s.end_ts),
        duration: formatDuration((s.end_ts ?? now) - s.start_ts),
        origin: s.origin,
      }))
    );
  }
  return result;
}

export function createSessionsListCommand(): Command {
  return new Command('list')
    .description('List work sessions in start order')
    .option('--task <taskId>', 'Only sessions of this task')
    .action(function (this: Command, opts: { task?: string }) {
      withServices(this, (services, globalOpts) => {
        runSessionsList({
          services,
          taskId: opts.task === undefined ? undefined : parseTaskId(opts.task),
          json: globalOpts.json,
          now: services.clock(),
        });
      });
    });
}
