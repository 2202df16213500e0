import {
  InvariantViolationError,
  SessionNotFoundError,
  TaskNotFoundError,
  TerminalLifecycleError,
} from '../errors.js';
import { Lifecycle } from '../events/types.js';
import type { FactStore } from '../store/fact-store.js';
import { type ClosedSession, type Task, isClosed } from '../store/types.js';

export function requireTask(store: FactStore, taskId: number): Task {
  const task = store.getTask(taskId);
  if (!task) throw new TaskNotFoundError(taskId);
  return task;
}

/** A task whose queue, timer and external facts may still change. */
export function requireOpenTask(store: FactStore, taskId: number): Task {
  const task = requireTask(store, taskId);
  if (task.lifecycle !== Lifecycle.Open) {
    throw new TerminalLifecycleError(taskId, task.lifecycle);
  }
  return task;
}

export function requireClosedSession(store: FactStore, sessionId: number): ClosedSession {
  const session = store.getSession(sessionId);
  if (!session) throw new SessionNotFoundError(sessionId);
  if (!isClosed(session)) {
    throw new InvariantViolationError([
      `session ${sessionId} is still open; stop the timer first`,
    ]);
  }
  return session;
}

export function timedTaskId(store: FactStore): number | null {
  return store.getOpenSession()?.task_id ?? null;
}
