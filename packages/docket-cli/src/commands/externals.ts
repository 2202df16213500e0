// packages/docket-cli/src/commands/externals.ts
import { Command } from 'commander';
import type { ExternalRecord } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { formatDuration, formatTimestamp, printJson, printTable } from '../output.js';

export interface ExternalsResult {
  waiting: ExternalRecord[];
}

export interface ExternalsOptions {
  services: Services;
  recipient?: string;
  json: boolean;
  now: number;
}

export function runExternals(options: ExternalsOptions): ExternalsResult {
  const { services, recipient, json, now } = options;
  const result: ExternalsResult = { waiting: services.handoffService.listWaiting({ recipient }) };

  if (json) {
    printJson(result);
  } else {
    printTable(
      result.waiting.map(record => ({
        task: record.task_id,
        recipient: record.recipient,
        sent: formatTimestamp(record.sent_ts),
        waiting: formatDuration(Math.max(0, now - record.sent_ts)),
        note: record.note,
      }))
    );
  }
  return result;
}

export function createExternalsCommand(): Command {
  return new Command('externals')
    .description('List tasks waiting on someone else')
    .option('-r, --recipient <recipient>', 'Only tasks waiting on this recipient')
    .action(function (this: Command, opts: { recipient?: string }) {
      withServices(this, (services, globalOpts) => {
        runExternals({ services, recipient: opts.recipient, json: globalOpts.json, now: services.clock() });
      });
    });
}
