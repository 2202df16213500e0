// packages/docket-cli/src/commands/queue/clear.ts
import { Command } from 'commander';
import type { ClockMode, WorkSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseOptionalTimestamp } from '../../parse.js';
import { addClockOptions, clockModeFrom, reportTimer, type ClockFlags } from './clock.js';

export interface QueueClearResult {
  removed: number[];
  timer: WorkSession | null;
  notices: string[];
}

export interface QueueClearOptions {
  services: Services;
  clock?: ClockMode;
  at?: number;
  json: boolean;
}

/** An empty queue leaves nothing to time, so a running timer stops in every clock mode. */
export function runQueueClear(options: QueueClearOptions): QueueClearResult {
  const { services, clock, at, json } = options;
  const before = services.timerService.current();
  const { result: removed, session, notices } = services.timerService.reorderQueue(
    () => services.queueService.clear(),
    { clock, at }
  );
  const result: QueueClearResult = { removed, timer: session, notices };

  if (json) {
    printJson(result);
  } else {
    console.log(`✓ Cleared ${removed.length} task(s) from the queue`);
    reportTimer(before, session, notices);
  }
  return result;
}

export function createQueueClearCommand(): Command {
  const command = new Command('clear').description('Take every task off the queue and stop the timer');
  return addClockOptions(command, { clockIn: false }).action(function (this: Command, opts: ClockFlags) {
    withServices(this, (services, globalOpts) => {
      runQueueClear({
        services,
        clock: clockModeFrom(opts),
        at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
        json: globalOpts.json,
      });
    });
  });
}
