// packages/docket-cli/src/commands/send.ts
import { Command } from 'commander';
import type { ExternalRecord } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { printJson } from '../output.js';
import { parseOptionalTimestamp, parseTaskId } from '../parse.js';

export interface SendCommandOptions {
  services: Services;
  taskId: number;
  recipient: string;
  note?: string;
  at?: number;
  json: boolean;
}

export function runSend(options: SendCommandOptions): ExternalRecord {
  const { services, taskId, recipient, note, at, json } = options;
  const record = services.handoffService.send(taskId, recipient, { note, at });

  if (json) {
    printJson(record);
  } else {
    console.log(`✓ Sent task ${taskId} to ${record.recipient}`);
  }
  return record;
}

export function createSendCommand(): Command {
  return new Command('send')
    .description('Hand a task off to someone else; it leaves the queue until recalled')
    .argument('<taskId>', 'Task ID')
    .argument('<recipient>', 'Who the task is waiting on')
    .argument('[note...]', 'Optional note')
    .option('--at <time>', 'Send time (default: now)')
    .action(function (this: Command, rawId: string, recipient: string, words: string[], opts: { at?: string }) {
      withServices(this, (services, globalOpts) => {
        runSend({
          services,
          taskId: parseTaskId(rawId),
          recipient,
          note: words.length > 0 ? words.join(' ') : undefined,
          at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
