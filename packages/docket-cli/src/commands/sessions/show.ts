// packages/docket-cli/src/commands/sessions/show.ts
import { Command } from 'commander';
import type { Annotation, WorkSession } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { formatDuration, formatTimestamp, printJson } from '../../output.js';
import { parseTaskId } from '../../parse.js';

export interface SessionsShowResult {
  session: WorkSession | null;
  annotations: Annotation[];
}

export interface SessionsShowOptions {
  services: Services;
  /** Show the latest session of this task instead of the running one. */
  taskId?: number;
  json: boolean;
  now: number;
}

export function runSessionsShow(options: SessionsShowOptions): SessionsShowResult {
  const { services, taskId, json, now } = options;
  const session =
    taskId === undefined ? services.timerService.current() : services.timerService.latestSession(taskId);
  const result: SessionsShowResult = {
    session,
    annotations: session ? services.timerService.sessionAnnotations(session.id) : [],
  };

  if (json) {
    printJson(result);
    return result;
  }
  if (!session) {
    console.log(taskId === undefined ? 'No session is currently running.' : 'No sessions found for this task.');
    return result;
  }

  const task = services.taskService.requireTask(session.task_id);
  const running = session.end_ts === null;
  console.log(`Session ${session.id} (Task ${task.id})`);
  console.log(`Description: ${task.description}`);
  console.log(`Start: ${formatTimestamp(session.start_ts)}`);
  console.log(`End: ${running ? '(running)' : formatTimestamp(session.end_ts)}`);
  console.log(`Duration: ${formatDuration((session.end_ts ?? now) - session.start_ts)}${running ? ' (running)' : ''}`);
  if (result.annotations.length > 0) {
    console.log('Linked Annotations:');
    for (const annotation of result.annotations) {
      console.log(`  [${annotation.id}] ${annotation.note}`);
    }
  }
  return result;
}

export function createSessionsShowCommand(): Command {
  return new Command('show')
    .description('Show the running session, or the latest session of a task')
    .argument('[taskId]', 'Task ID')
    .action(function (this: Command, rawId: string | undefined) {
      withServices(this, (services, globalOpts) => {
        runSessionsShow({
          services,
          taskId: rawId === undefined ? undefined : parseTaskId(rawId),
          json: globalOpts.json,
          now: services.clock(),
        });
      });
    });
}
