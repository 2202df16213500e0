// packages/docket-cli/src/commands/offon.ts
import { Command } from 'commander';
import type { BreakResult } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { formatTimestamp, printJson, printNotices } from '../output.js';
import { parseTimeRange, type TimeRange } from '../parse.js';

export interface OffOnOptions {
  services: Services;
  range: TimeRange;
  json: boolean;
}

/**
 * Record a break. With the timer running it stops at the start of the range
 * and resumes at its end (default now); with the timer stopped the range is
 * cut out of the recorded sessions.
 */
export function runOffOn(options: OffOnOptions): BreakResult {
  const { services, range, json } = options;
  const result = services.timerService.takeBreak(range.start, range.end);

  if (json) {
    printJson(result);
    return result;
  }

  printNotices(result.notices);
  if (result.resumed) {
    if (result.stopped) {
      console.log(`✓ Stopped timing task ${result.stopped.task_id} at ${formatTimestamp(result.stopped.end_ts)}`);
    }
    console.log(`✓ Started timing task ${result.resumed.task_id} at ${formatTimestamp(result.resumed.start_ts)}`);
  } else {
    console.log(`✓ Sessions modified to leave ${formatTimestamp(range.start)}..${formatTimestamp(range.end ?? null)} free`);
  }
  return result;
}

export function createOffOnCommand(): Command {
  return new Command('offon')
    .description('Take a break: stop the timer at <start> and resume at <end> (default: now)')
    .argument('<time>', 'Break start, or <start>..<end>')
    .action(function (this: Command, rawTime: string) {
      withServices(this, (services, globalOpts) => {
        runOffOn({
          services,
          range: parseTimeRange(rawTime, services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
