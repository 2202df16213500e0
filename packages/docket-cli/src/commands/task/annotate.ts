// packages/docket-cli/src/commands/task/annotate.ts
import { Command } from 'commander';
import type { Annotation } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseOptionalTimestamp, parseTaskId } from '../../parse.js';

export interface AnnotateOptions {
  services: Services;
  taskId: number;
  note: string;
  at?: number;
  json: boolean;
}

export function runAnnotate(options: AnnotateOptions): Annotation {
  const { services, taskId, note, at, json } = options;
  const annotation = services.taskService.annotate(taskId, note, { at });

  if (json) {
    printJson(annotation);
  } else {
    const link = annotation.session_id === null ? '' : ` (session ${annotation.session_id})`;
    console.log(`✓ Annotated task ${taskId}${link}`);
  }
  return annotation;
}

export function createAnnotateCommand(): Command {
  return new Command('annotate')
    .description('Add a note to a task')
    .argument('<taskId>', 'Task ID')
    .argument('<note...>', 'Note text')
    .option('--at <time>', 'Note time (default: now)')
    .action(function (this: Command, rawId: string, words: string[], opts: { at?: string }) {
      withServices(this, (services, globalOpts) => {
        runAnnotate({
          services,
          taskId: parseTaskId(rawId),
          note: words.join(' '),
          at: parseOptionalTimestamp(opts.at, 'At', services.clock()),
          json: globalOpts.json,
        });
      });
    });
}
