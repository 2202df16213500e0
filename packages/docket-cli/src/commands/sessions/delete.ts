// packages/docket-cli/src/commands/sessions/delete.ts
import { Command } from 'commander';
import type { ClosedSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseInteger } from '../../parse.js';

export interface SessionsDeleteOptions {
  services: Services;
  sessionId: number;
  json: boolean;
}

export function runSessionsDelete(options: SessionsDeleteOptions): ClosedSession {
  const { services, sessionId, json } = options;
  const session = services.timerService.deleteSession(sessionId);

  if (json) {
    printJson(session);
  } else {
    console.log(`✓ Deleted session ${session.id} on task ${session.task_id}`);
  }
  return session;
}

export function createSessionsDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete a finished session')
    .argument('<sessionId>', 'Session ID')
    .action(function (this: Command, rawId: string) {
      withServices(this, (services, globalOpts) => {
        runSessionsDelete({
          services,
          sessionId: parseInteger(rawId, 'Session ID', { min: 1 }),
          json: globalOpts.json,
        });
      });
    });
}
