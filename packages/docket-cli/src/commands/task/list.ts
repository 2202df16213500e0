// packages/docket-cli/src/commands/task/list.ts
import { Command } from 'commander';
import { Lifecycle } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { formatDuration, printJson, printTable } from '../../output.js';
import { parseLifecycle } from '../../parse.js';
import { viewTask } from './show.js';

export interface TaskListItem {
  id: number;
  description: string;
  stage: string;
  lifecycle: Lifecycle;
  queue_position: number | null;
  project: string | null;
  tags: string[];
  tracked_secs: number;
}

export interface ListResult {
  tasks: TaskListItem[];
  total: number;
}

export interface ListOptions {
  services: Services;
  /** Omitted means open tasks; `all` lists every lifecycle. */
  lifecycle?: Lifecycle | 'all';
  project?: string;
  tag?: string;
  stage?: string;
  json: boolean;
  now: number;
}

interface ListCommandOptions {
  lifecycle?: string;
  all?: boolean;
  project?: string;
  tag?: string;
  stage?: string;
}

export function runList(options: ListOptions): ListResult {
  const { services, project, tag, stage, json, now } = options;
  const lifecycle = options.lifecycle ?? Lifecycle.Open;

  const tasks = services.taskService
    .listTasks({
      lifecycle: lifecycle === 'all' ? undefined : lifecycle,
      project,
      tag,
    })
    .map(task => {
      const view = viewTask(services, task, now);
      return {
        id: task.id,
        description: task.description,
        stage: view.stage,
        lifecycle: task.lifecycle,
        queue_position: task.queue_position,
        project: task.project,
        tags: task.tags,
        tracked_secs: view.tracked_secs,
      };
    })
    .filter(item => stage === undefined || item.stage === stage);

  const result: ListResult = { tasks, total: tasks.length };

  if (json) {
    printJson(result);
  } else {
    printTable(
      tasks.map(t => ({
        id: t.id,
        stage: t.stage,
        q: t.queue_position,
        project: t.project,
        tags: t.tags.join(','),
        tracked: formatDuration(t.tracked_secs),
        description: t.description,
      }))
    );
  }

  return result;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks')
    .option('-l, --lifecycle <lifecycle>', 'Filter by lifecycle (open, closed, cancelled)')
    .option('-a, --all', 'Include every lifecycle')
    .option('-P, --project <project>', 'Filter by project, including projects nested under it')
    .option('-t, --tag <tag>', 'Filter by tag')
    .option('-s, --stage <stage>', 'Filter by stage')
    .action(function (this: Command, opts: ListCommandOptions) {
      withServices(this, (services, globalOpts) => {
        runList({
          services,
          lifecycle: opts.all ? 'all' : parseLifecycle(opts.lifecycle),
          project: opts.project,
          tag: opts.tag,
          stage: opts.stage,
          json: globalOpts.json,
          now: services.clock(),
        });
      });
    });
}
