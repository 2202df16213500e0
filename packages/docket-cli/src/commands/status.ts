// packages/docket-cli/src/commands/status.ts
import { Command } from 'commander';
import type { QueueEntry, WorkSession } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { formatDuration, formatTimestamp, printJson } from '../output.js';

export interface StatusTask {
  id: number;
  description: string;
  stage: string;
  color: string;
  queue_position: number | null;
  timer_on: boolean;
  waiting: boolean;
}

export interface StatusResult {
  queue: QueueEntry[];
  running: (WorkSession & { elapsed_secs: number }) | null;
  tasks: StatusTask[];
}

export interface StatusOptions {
  services: Services;
  json: boolean;
  now: number;
}

export function runStatus(options: StatusOptions): StatusResult {
  const { services, json, now } = options;
  const snapshot = services.taskService.snapshot();

  const result: StatusResult = {
    queue: snapshot.queue,
    running: snapshot.running ? { ...snapshot.running, elapsed_secs: now - snapshot.running.start_ts } : null,
    tasks: snapshot.tasks.map(({ task, facts, stage }) => ({
      id: task.id,
      description: task.description,
      stage: stage.stage,
      color: stage.color,
      queue_position: task.queue_position,
      timer_on: facts.timerOn,
      waiting: facts.waiting,
    })),
  };

  if (json) {
    printJson(result);
    return result;
  }

  if (result.running) {
    console.log(
      `Timer: on task ${result.running.task_id} since ${formatTimestamp(result.running.start_ts)} (${formatDuration(result.running.elapsed_secs)})`
    );
  } else {
    console.log('Timer: off');
  }
  console.log(`Queue: ${result.queue.length} task(s)`);

  let current: string | undefined;
  for (const task of result.tasks) {
    if (task.stage !== current) {
      current = task.stage;
      console.log(`\n${current}:`);
    }
    const pos = task.queue_position === null ? '' : ` [${task.queue_position}]`;
    console.log(`  ${task.id}${pos} ${task.description}`);
  }
  return result;
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show the timer, the queue and open tasks by stage')
    .action(function (this: Command) {
      withServices(this, (services, globalOpts) => {
        runStatus({ services, json: globalOpts.json, now: services.clock() });
      });
    });
}
