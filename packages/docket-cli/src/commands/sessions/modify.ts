// packages/docket-cli/src/commands/sessions/modify.ts
import { Command } from 'commander';
import type { ClosedSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { CLIError, ExitCode } from '../../errors.js';
import { formatTimestamp, printJson } from '../../output.js';
import { parseInteger, parseOptionalTimestamp } from '../../parse.js';

export interface SessionsModifyOptions {
  services: Services;
  sessionId: number;
  startTs?: number;
  endTs?: number;
  json: boolean;
}

export function runSessionsModify(options: SessionsModifyOptions): ClosedSession {
  const { services, sessionId, startTs, endTs, json } = options;
  if (startTs === undefined && endTs === undefined) {
    throw new CLIError('Nothing to change', ExitCode.InvalidUsage, undefined, undefined, [
      'Pass --start and/or --end',
    ]);
  }
  const session = services.timerService.amendSession(sessionId, { startTs, endTs });

  if (json) {
    printJson(session);
  } else {
    console.log(
      `✓ Session ${session.id}: ${formatTimestamp(session.start_ts)} - ${formatTimestamp(session.end_ts)}`
    );
  }
  return session;
}

export function createSessionsModifyCommand(): Command {
  return new Command('modify')
    .description('Correct the bounds of a finished session')
    .argument('<sessionId>', 'Session ID')
    .option('--start <time>', 'New start time')
    .option('--end <time>', 'New end time')
    .action(function (this: Command, rawId: string, opts: { start?: string; end?: string }) {
      withServices(this, (services, globalOpts) => {
        const now = services.clock();
        runSessionsModify({
          services,
          sessionId: parseInteger(rawId, 'Session ID', { min: 1 }),
          startTs: parseOptionalTimestamp(opts.start, 'Start', now),
          endTs: parseOptionalTimestamp(opts.end, 'End', now),
          json: globalOpts.json,
        });
      });
    });
}
