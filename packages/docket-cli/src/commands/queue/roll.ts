// packages/docket-cli/src/commands/queue/roll.ts
import { Command } from 'commander';
import type { ClockMode, QueueEntry, WorkSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson, printTable } from '../../output.js';
import { parseIntegerWithDefault, parseOptionalTimestamp } from '../../parse.js';
import { addClockOptions, clockModeFrom, reportTimer, type ClockFlags } from './clock.js';

export interface QueueRollResult {
  entries: QueueEntry[];
  timer: WorkSession | null;
  notices: string[];
}

export interface QueueRollOptions {
  services: Services;
  count: number;
  clock?: ClockMode;
  at?: number;
  json: boolean;
}

export function runQueueRoll(options: QueueRollOptions): QueueRollResult {
  const { services, count, clock, at, json } = options;
  const before = services.timerService.current();
  const { result: entries, session, notices } = services.timerService.reorderQueue(
    () => services.queueService.rotate(count),
    { clock, at }
  );
  const result: QueueRollResult = { entries, timer: session, notices };

  if (json) {
    printJson(result);
  } else {
    printTable(entries.map(entry => ({ pos: entry.position, id: entry.task_id, description: entry.description })));
    reportTimer(before, session, notices);
  }
  return result;
}

export function createQueueRollCommand(): Command {
  const command = new Command('roll')
    .description('Move the first n tasks to the back of the queue')
    .argument('[n]', 'How many tasks to move (negative rolls the other way)');
  return addClockOptions(command).action(function (
    this: Command,
    rawCount: string | undefined,
    opts: ClockFlags
  ) {
    withServices(this, (services, globalOpts) => {
      runQueueRoll({
        services,
        count: parseIntegerWithDefault(rawCount, 'Count', 1),
        clock: clockModeFrom(opts),
        at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
        json: globalOpts.json,
      });
    });
  });
}
