// packages/docket-cli/src/commands/recall.ts
import { Command } from 'commander';
import type { RecallResult } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { printJson } from '../output.js';
import { parseOptionalInteger, parseOptionalTimestamp, parseTaskId } from '../parse.js';

export interface RecallCommandOptions {
  services: Services;
  taskId: number;
  position?: number;
  at?: number;
  json: boolean;
}

export function runRecall(options: RecallCommandOptions): RecallResult {
  const { services, taskId, position, at, json } = options;
  const result = services.handoffService.recall(taskId, { position, at });

  if (json) {
    printJson(result);
  } else {
    console.log(`✓ Recalled task ${taskId} from ${result.record.recipient} to position ${result.position}`);
  }
  return result;
}

export function createRecallCommand(): Command {
  return new Command('recall')
    .description('Bring a waiting task back into the queue')
    .argument('<taskId>', 'Task ID')
    .option('-p, --position <position>', 'Queue position to return to (default: front)')
    .option('--at <time>', 'Recall time (default: now)')
    .action(function (this: Command, rawId: string, opts: { position?: string; at?: string }) {
      withServices(this, (services, globalOpts) => {
        runRecall({
          services,
          taskId: parseTaskId(rawId),
          position: parseOptionalInteger(opts.position, 'Position', { min: 0 }),
          at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
