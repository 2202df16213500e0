// packages/docket-cli/src/commands/onoff.ts
import { Command } from 'commander';
import { EmptyQueueError, type IntervalResult } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { CLIError, ExitCode } from '../errors.js';
import { formatDuration, printJson, printNotices } from '../output.js';
import { parseTaskId, parseTimeRange } from '../parse.js';

export interface OnOffOptions {
  services: Services;
  startTs: number;
  endTs: number;
  /** Defaults to the task at the front of the queue. */
  taskId?: number;
  note?: string;
  json: boolean;
}

export function runOnOff(options: OnOffOptions): IntervalResult {
  const { services, startTs, endTs, note, json } = options;
  const taskId = options.taskId ?? services.queueService.list().at(0)?.task_id;
  if (taskId === undefined) {
    throw new EmptyQueueError();
  }
  const result = services.timerService.interval(taskId, startTs, endTs, { note });

  if (json) {
    printJson(result);
  } else {
    printNotices(result.notices);
    const verb = result.notices.length > 0 ? 'Inserted' : 'Added';
    console.log(
      `✓ ${verb} session ${result.session.id} on task ${taskId} (${formatDuration(endTs - startTs)})`
    );
  }
  return result;
}

export function createOnOffCommand(): Command {
  return new Command('onoff')
    .description('Record time already worked over <start>..<end>, trimming what it overlaps')
    .argument('<range>', 'Interval as <start>..<end>')
    .argument('[taskId]', 'Task ID (default: front of the queue)')
    .option('-n, --note <note>', 'Annotate the task, linked to the new session')
    .action(function (this: Command, rawRange: string, rawId: string | undefined, opts: { note?: string }) {
      withServices(this, (services, globalOpts) => {
        const range = parseTimeRange(rawRange, services.clock());
        if (range.end === undefined) {
          throw new CLIError('Interval required: use <start>..<end>', ExitCode.InvalidInput);
        }
        runOnOff({
          services,
          startTs: range.start,
          endTs: range.end,
          taskId: rawId === undefined ? undefined : parseTaskId(rawId),
          note: opts.note,
          json: globalOpts.json,
        });
      });
    });
}
