// packages/docket-cli/src/commands/task/show.ts
import { Command } from 'commander';
import type { Annotation, ExternalRecord, Task, WorkSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { formatDuration, formatTimestamp, printJson } from '../../output.js';
import { parseTaskId } from '../../parse.js';

export interface TaskView {
  task: Task;
  stage: string;
  timer_on: boolean;
  waiting_on: string | null;
  tracked_secs: number;
}

export interface ShowResult extends TaskView {
  sessions: WorkSession[];
  annotations: Annotation[];
  external: ExternalRecord | null;
}

export interface ShowOptions {
  services: Services;
  taskId: number;
  json: boolean;
  /** Clock for the running session's elapsed time. */
  now: number;
}

function trackedSecs(sessions: WorkSession[], now: number): number {
  return sessions.reduce((sum, s) => sum + ((s.end_ts ?? now) - s.start_ts), 0);
}

/** A task with its derived stage, for listings. */
export function viewTask(services: Services, task: Task, now: number): TaskView {
  const facts = services.taskService.facts(task.id);
  return {
    task,
    stage: services.taskService.classify(task.id),
    timer_on: facts.timerOn,
    waiting_on: services.store.getWaiting(task.id)?.recipient ?? null,
    tracked_secs: trackedSecs(services.timerService.listSessions({ taskId: task.id }), now),
  };
}

export function runShow(options: ShowOptions): ShowResult {
  const { services, taskId, json, now } = options;
  const task = services.taskService.requireTask(taskId);

  const result: ShowResult = {
    ...viewTask(services, task, now),
    sessions: services.timerService.listSessions({ taskId }),
    annotations: services.taskService.listAnnotations(taskId),
    external: services.store.getWaiting(taskId),
  };

  if (json) {
    printJson(result);
    return result;
  }

  console.log(`Task: ${task.id}`);
  console.log(`Description: ${task.description}`);
  console.log(`Stage: ${result.stage}`);
  console.log(`Lifecycle: ${task.lifecycle}`);
  if (task.queue_position !== null) console.log(`Queue position: ${task.queue_position}`);
  if (task.project) console.log(`Project: ${task.project}`);
  if (task.tags.length > 0) console.log(`Tags: ${task.tags.join(', ')}`);
  if (task.due_ts !== null) console.log(`Due: ${formatTimestamp(task.due_ts)}`);
  if (task.scheduled_ts !== null) console.log(`Scheduled: ${formatTimestamp(task.scheduled_ts)}`);
  if (task.wait_ts !== null) console.log(`Wait until: ${formatTimestamp(task.wait_ts)}`);
  if (task.alloc_secs !== null) console.log(`Allocated: ${formatDuration(task.alloc_secs)}`);
  if (result.external) {
    console.log(`Waiting on: ${result.external.recipient} since ${formatTimestamp(result.external.sent_ts)}`);
  }
  console.log(`Tracked: ${formatDuration(result.tracked_secs)}`);
  console.log(`Created: ${formatTimestamp(task.created_ts)}`);

  if (result.sessions.length > 0) {
    console.log(`\nSessions (${result.sessions.length}):`);
    for (const s of result.sessions) {
      const end = s.end_ts === null ? 'running' : formatTimestamp(s.end_ts);
      console.log(`  [${s.id}] ${formatTimestamp(s.start_ts)} - ${end}`);
    }
  }

  if (result.annotations.length > 0) {
    console.log(`\nAnnotations (${result.annotations.length}):`);
    for (const a of result.annotations) {
      console.log(`  [${formatTimestamp(a.entry_ts)}] ${a.note}`);
    }
  }

  return result;
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show task details')
    .argument('<taskId>', 'Task ID')
    .action(function (this: Command, rawId: string) {
      withServices(this, (services, globalOpts) => {
        runShow({
          services,
          taskId: parseTaskId(rawId),
          json: globalOpts.json,
          now: services.clock(),
        });
      });
    });
}
