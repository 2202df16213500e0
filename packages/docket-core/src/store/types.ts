import type { Lifecycle } from '../events/types.js';

/** Current time in epoch seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface Task {
  id: number;
  description: string;
  project: string | null;
  tags: string[];
  lifecycle: Lifecycle;
  queue_position: number | null;
  due_ts: number | null;
  scheduled_ts: number | null;
  wait_ts: number | null;
  alloc_secs: number | null;
  created_ts: number;
  modified_ts: number;
}

export type SessionOrigin = 'timer' | 'interval';

export interface WorkSession {
  id: number;
  task_id: number;
  start_ts: number;
  end_ts: number | null;
  origin: SessionOrigin;
  created_ts: number;
}

/** A session that has been closed. */
export interface ClosedSession extends WorkSession {
  end_ts: number;
}

export type ExternalStatus = 'waiting' | 'collected';

export interface ExternalRecord {
  id: number;
  task_id: number;
  recipient: string;
  note: string | null;
  sent_ts: number;
  status: ExternalStatus;
  collected_ts: number | null;
}

export interface Annotation {
  id: number;
  task_id: number;
  session_id: number | null;
  note: string;
  entry_ts: number;
}

export interface QueueEntry {
  position: number;
  task_id: number;
  description: string;
}

export interface Project {
  id: number;
  name: string;
  archived: boolean;
  created_ts: number;
  modified_ts: number;
}

export interface ProjectSummary extends Project {
  open_tasks: number;
  total_tasks: number;
}

export interface TaskFilter {
  lifecycle?: Lifecycle;
  /** Matches the project and every project nested under it (`work` matches `work.email`). */
  project?: string;
  tag?: string;
}

export function isClosed(session: WorkSession): session is ClosedSession {
  return session.end_ts !== null;
}
