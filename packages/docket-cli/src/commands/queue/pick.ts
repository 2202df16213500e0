// packages/docket-cli/src/commands/queue/pick.ts
import { Command } from 'commander';
import type { ClockMode, QueueEntry, WorkSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseInteger, parseOptionalTimestamp } from '../../parse.js';
import { addClockOptions, clockModeFrom, reportTimer, type ClockFlags } from './clock.js';

export interface QueuePickResult {
  entry: QueueEntry;
  timer: WorkSession | null;
  notices: string[];
}

export interface QueuePickOptions {
  services: Services;
  index: number;
  clock?: ClockMode;
  at?: number;
  json: boolean;
}

export function runQueuePick(options: QueuePickOptions): QueuePickResult {
  const { services, index, clock, at, json } = options;
  const before = services.timerService.current();
  const { result: entry, session, notices } = services.timerService.reorderQueue(
    () => services.queueService.pick(index),
    { clock, at }
  );
  const result: QueuePickResult = { entry, timer: session, notices };

  if (json) {
    printJson(result);
  } else {
    console.log(`✓ Moved task ${entry.task_id} to the front: ${entry.description}`);
    reportTimer(before, session, notices);
  }
  return result;
}

export function createQueuePickCommand(): Command {
  const command = new Command('pick')
    .description('Move the task at a queue index to the front')
    .argument('<index>', 'Queue index (0 is the front; out of range clamps)');
  return addClockOptions(command).action(function (this: Command, rawIndex: string, opts: ClockFlags) {
    withServices(this, (services, globalOpts) => {
      runQueuePick({
        services,
        index: parseInteger(rawIndex, 'Index'),
        clock: clockModeFrom(opts),
        at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
        json: globalOpts.json,
      });
    });
  });
}
