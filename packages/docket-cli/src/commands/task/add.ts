// packages/docket-cli/src/commands/task/add.ts
import { Command } from 'commander';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';
import { parseDuration, parseList, parseOptionalTimestamp } from '../../parse.js';

export interface AddResult {
  id: number;
  description: string;
  project: string | null;
  tags: string[];
  stage: string;
  queue_position: number | null;
}

export interface AddOptions {
  services: Services;
  description: string;
  project?: string;
  tags?: string[];
  due?: number;
  scheduled?: number;
  wait?: number;
  allocSecs?: number;
  queue?: boolean;
  json: boolean;
}

interface AddCommandOptions {
  project?: string;
  tags?: string;
  due?: string;
  scheduled?: string;
  wait?: string;
  alloc?: string;
  queue?: boolean;
}

export function runAdd(options: AddOptions): AddResult {
  const { services, description, project, tags, due, scheduled, wait, allocSecs, queue, json } = options;

  const task = services.taskService.createTask({
    description,
    project,
    tags,
    due_ts: due,
    scheduled_ts: scheduled,
    wait_ts: wait,
    alloc_secs: allocSecs,
    enqueue: queue ?? false,
  });

  const result: AddResult = {
    id: task.id,
    description: task.description,
    project: task.project,
    tags: task.tags,
    stage: services.taskService.classify(task.id),
    queue_position: task.queue_position,
  };

  if (json) {
    printJson(result);
  } else {
    const where = task.queue_position === null ? '' : ` (queued at ${task.queue_position})`;
    console.log(`✓ Created task ${task.id}: ${task.description}${where}`);
  }

  return result;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Create a new task')
    .argument('<description...>', 'Task description')
    .option('-P, --project <project>', 'Project name')
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .option('--due <time>', 'Due time')
    .option('--scheduled <time>', 'Scheduled start time')
    .option('--wait <time>', 'Hide until this time')
    .option('--alloc <duration>', 'Time allocated, e.g. 2h or 90m')
    .option('-q, --queue', 'Append the task to the queue')
    .action(function (this: Command, words: string[], opts: AddCommandOptions) {
      withServices(this, (services, globalOpts) => {
        const now = services.clock();
        runAdd({
          services,
          description: words.join(' '),
          project: opts.project,
          tags: parseList(opts.tags),
          due: parseOptionalTimestamp(opts.due, 'Due', now),
          scheduled: parseOptionalTimestamp(opts.scheduled, 'Scheduled', now),
          wait: parseOptionalTimestamp(opts.wait, 'Wait', now),
          allocSecs: opts.alloc === undefined ? undefined : parseDuration(opts.alloc, 'Alloc'),
          queue: opts.queue,
          json: globalOpts.json,
        });
      });
    });
}
