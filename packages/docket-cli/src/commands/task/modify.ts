// packages/docket-cli/src/commands/task/modify.ts
import { Command } from 'commander';
import { UPDATABLE_TASK_FIELDS, type Task, type TaskPatch } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { CLIError, ExitCode } from '../../errors.js';
import { printJson } from '../../output.js';
import { parseDuration, parseList, parseTaskId, parseTimestamp } from '../../parse.js';

// Passing this as a value clears an optional field
const CLEAR = 'none';

export interface ModifyResult {
  task: Task;
  changed: string[];
}

export interface ModifyOptions {
  services: Services;
  taskId: number;
  patch: TaskPatch;
  json: boolean;
}

interface ModifyCommandOptions {
  description?: string;
  project?: string;
  tags?: string;
  due?: string;
  scheduled?: string;
  wait?: string;
  alloc?: string;
}

function clearable<T>(raw: string | undefined, parse: (value: string) => T): T | null | undefined {
  if (raw === undefined) return undefined;
  if (raw === CLEAR) return null;
  return parse(raw);
}

export function buildPatch(opts: ModifyCommandOptions, now: number): TaskPatch {
  return {
    description: opts.description,
    project: clearable(opts.project, value => value),
    tags: opts.tags === undefined ? undefined : parseList(opts.tags === CLEAR ? '' : opts.tags),
    due_ts: clearable(opts.due, value => parseTimestamp(value, 'Due', now)),
    scheduled_ts: clearable(opts.scheduled, value => parseTimestamp(value, 'Scheduled', now)),
    wait_ts: clearable(opts.wait, value => parseTimestamp(value, 'Wait', now)),
    alloc_secs: clearable(opts.alloc, value => parseDuration(value, 'Alloc')),
  };
}

export function runModify(options: ModifyOptions): ModifyResult {
  const { services, taskId, patch, json } = options;

  const before = services.taskService.requireTask(taskId);
  const task = services.taskService.updateTask(taskId, patch);
  const changed = UPDATABLE_TASK_FIELDS.filter(
    field => patch[field] !== undefined && JSON.stringify(before[field]) !== JSON.stringify(task[field])
  );

  const result: ModifyResult = { task, changed };

  if (json) {
    printJson(result);
  } else if (changed.length === 0) {
    console.log(`Task ${taskId} unchanged`);
  } else {
    console.log(`✓ Updated task ${taskId}: ${changed.join(', ')}`);
  }

  return result;
}

export function createModifyCommand(): Command {
  return new Command('modify')
    .description(`Change task attributes (pass "${CLEAR}" to clear a field)`)
    .argument('<taskId>', 'Task ID')
    .option('-d, --description <text>', 'New description')
    .option('-P, --project <project>', 'Project name')
    .option('-t, --tags <tags>', 'Comma-separated tags (replaces existing)')
    .option('--due <time>', 'Due time')
    .option('--scheduled <time>', 'Scheduled start time')
    .option('--wait <time>', 'Hide until this time')
    .option('--alloc <duration>', 'Time allocated, e.g. 2h or 90m')
    .action(function (this: Command, rawId: string, opts: ModifyCommandOptions) {
      withServices(this, (services, globalOpts) => {
        const patch = buildPatch(opts, services.clock());
        if (Object.values(patch).every(value => value === undefined)) {
          throw new CLIError('Nothing to change', ExitCode.InvalidUsage, undefined, undefined, [
            'docket task modify <taskId> --description "new text"',
          ]);
        }
        runModify({ services, taskId: parseTaskId(rawId), patch, json: globalOpts.json });
      });
    });
}
