// packages/docket-cli/src/commands/sessions/add.ts
import { Command } from 'commander';
import type { IntervalResult } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { formatDuration, printJson, printNotices } from '../../output.js';
import { parseTaskId, parseTimestamp } from '../../parse.js';

export interface SessionsAddOptions {
  services: Services;
  taskId: number;
  startTs: number;
  endTs: number;
  note?: string;
  json: boolean;
}

export function runSessionsAdd(options: SessionsAddOptions): IntervalResult {
  const { services, taskId, startTs, endTs, note, json } = options;
  const result = services.timerService.interval(taskId, startTs, endTs, { note });

  if (json) {
    printJson(result);
  } else {
    printNotices(result.notices);
    console.log(
      `✓ Recorded session ${result.session.id} on task ${taskId} (${formatDuration(endTs - startTs)})`
    );
  }
  return result;
}

export function createSessionsAddCommand(): Command {
  return new Command('add')
    .description('Record a finished session; overlapping sessions are trimmed')
    .argument('<taskId>', 'Task ID')
    .argument('<start>', 'Start time')
    .argument('<end>', 'End time')
    .option('-n, --note <note>', 'Annotate the task, linked to the new session')
    .action(function (this: Command, rawId: string, rawStart: string, rawEnd: string, opts: { note?: string }) {
      withServices(this, (services, globalOpts) => {
        const now = services.clock();
        runSessionsAdd({
          services,
          taskId: parseTaskId(rawId),
          startTs: parseTimestamp(rawStart, 'Start', now),
          endTs: parseTimestamp(rawEnd, 'End', now),
          note: opts.note,
          json: globalOpts.json,
        });
      });
    });
}
