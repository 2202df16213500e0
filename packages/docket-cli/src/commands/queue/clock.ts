// packages/docket-cli/src/commands/queue/clock.ts
import type { Command } from 'commander';
import type { ClockMode, WorkSession } from 'docket-core';
import { formatTimestamp, printNotices } from '../../output.js';

export interface ClockFlags {
  clockIn?: boolean;
  clockOut?: boolean;
  at?: string;
}

/** `--clock-out` wins over `--clock-in`; with neither, a running timer follows the front. */
export function clockModeFrom(flags: ClockFlags): ClockMode {
  if (flags.clockOut) return 'out';
  if (flags.clockIn) return 'in';
  return 'follow';
}

export function addClockOptions(command: Command, opts: { clockIn: boolean } = { clockIn: true }): Command {
  if (opts.clockIn) {
    command.option('--clock-in', 'Start the timer on the new front');
  }
  return command
    .option('--clock-out', 'Stop the timer')
    .option('--at <time>', 'When the timer switches or stops (default: now)');
}

export function reportTimer(before: WorkSession | null, after: WorkSession | null, notices: string[]): void {
  printNotices(notices);
  if (after && after.id !== before?.id) {
    console.log(`  Timer on task ${after.task_id} since ${formatTimestamp(after.start_ts)}`);
  } else if (before && !after) {
    console.log(`  Timer stopped on task ${before.task_id}`);
  }
}
