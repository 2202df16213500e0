// packages/docket-cli/src/commands/off.ts
import { Command } from 'commander';
import type { StopResult } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { formatDuration, printJson, printNotices } from '../output.js';
import { parseOptionalTimestamp } from '../parse.js';

export interface OffOptions {
  services: Services;
  at?: number;
  json: boolean;
}

export function runOff(options: OffOptions): StopResult {
  const { services, at, json } = options;
  const result = services.timerService.stop({ at });

  if (json) {
    printJson(result);
  } else {
    printNotices(result.notices);
    if (result.session) {
      const { task_id, start_ts, end_ts } = result.session;
      console.log(`✓ Timer off on task ${task_id} after ${formatDuration(end_ts - start_ts)}`);
    } else {
      console.log('✓ Timer off');
    }
  }
  return result;
}

export function createOffCommand(): Command {
  return new Command('off')
    .description('Stop the timer')
    .option('--at <time>', 'Stop time (default: now)')
    .action(function (this: Command, opts: { at?: string }) {
      withServices(this, (services, globalOpts) => {
        runOff({
          services,
          at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
