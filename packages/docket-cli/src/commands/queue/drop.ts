// packages/docket-cli/src/commands/queue/drop.ts
import { Command } from 'commander';
import type { ClockMode, RemoveTarget, WorkSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { CLIError, ExitCode } from '../../errors.js';
import { printJson } from '../../output.js';
import { parseIntegerWithDefault, parseOptionalTimestamp, parseTaskId } from '../../parse.js';
import { addClockOptions, clockModeFrom, reportTimer, type ClockFlags } from './clock.js';

export interface QueueDropResult {
  removed: number | null;
  timer: WorkSession | null;
  notices: string[];
}

export interface QueueDropOptions {
  services: Services;
  target: RemoveTarget;
  clock?: ClockMode;
  at?: number;
  json: boolean;
}

export function runQueueDrop(options: QueueDropOptions): QueueDropResult {
  const { services, target, clock, at, json } = options;
  const before = services.timerService.current();
  const { result: removed, session, notices } = services.timerService.reorderQueue(
    () => services.queueService.remove(target),
    { clock, at }
  );
  const result: QueueDropResult = { removed, timer: session, notices };

  if (json) {
    printJson(result);
  } else {
    if (removed === null) {
      console.log('Task was not queued');
    } else {
      console.log(`✓ Removed task ${removed} from the queue`);
    }
    reportTimer(before, session, notices);
  }
  return result;
}

export function createQueueDropCommand(): Command {
  const command = new Command('drop')
    .description('Take a task off the queue, by index (default 0) or by task ID')
    .argument('[index]', 'Queue index (out of range clamps)')
    .option('--task <taskId>', 'Remove this task instead of an index');
  return addClockOptions(command).action(function (
    this: Command,
    rawIndex: string | undefined,
    opts: ClockFlags & { task?: string }
  ) {
    withServices(this, (services, globalOpts) => {
      if (rawIndex !== undefined && opts.task !== undefined) {
        throw new CLIError('Give either an index or --task, not both', ExitCode.InvalidUsage);
      }
      const target: RemoveTarget =
        opts.task !== undefined
          ? { taskId: parseTaskId(opts.task) }
          : { index: parseIntegerWithDefault(rawIndex, 'Index', 0) };
      runQueueDrop({
        services,
        target,
        clock: clockModeFrom(opts),
        at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
        json: globalOpts.json,
      });
    });
  });
}
