import type Database from 'libsql';
import { withWriteTransaction } from '../db/transaction.js';
import type { Lifecycle, UpdatableTaskField } from '../events/types.js';
import type {
  Annotation,
  ClosedSession,
  ExternalRecord,
  Project,
  ProjectSummary,
  QueueEntry,
  SessionOrigin,
  Task,
  TaskFilter,
  WorkSession,
} from './types.js';

/**
 * The cross-table facts the invariant guard inspects before every commit.
 */
export interface StoreState {
  queue: { task_id: number; queue_position: number; lifecycle: Lifecycle }[];
  openSessions: { id: number; task_id: number; lifecycle: Lifecycle }[];
  waiting: { task_id: number; recipient: string; lifecycle: Lifecycle }[];
  invalidSessions: { id: number; start_ts: number; end_ts: number }[];
}

export type CommitCheck = (state: StoreState) => void;

export interface NewTask {
  description: string;
  project: string | null;
  tags: string[];
  due_ts: number | null;
  scheduled_ts: number | null;
  wait_ts: number | null;
  alloc_secs: number | null;
  created_ts: number;
}

type TaskRow = Omit<Task, 'tags'> & { tags: string };

function rowToTask(row: TaskRow): Task {
  return { ...row, tags: JSON.parse(row.tags) as string[] };
}

type ProjectRow = Omit<Project, 'archived'> & { archived: number };
type ProjectSummaryRow = ProjectRow & { open_tasks: number; total_tasks: number };

function rowToProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    archived: row.archived === 1,
    created_ts: row.created_ts,
    modified_ts: row.modified_ts,
  };
}

// Whitelisted column updates; keys MUST match UPDATABLE_TASK_FIELDS
const UPDATE_FIELD_SQL: Record<UpdatableTaskField, string> = {
  description: 'UPDATE tasks SET description = ?, modified_ts = ? WHERE id = ?',
  project: 'UPDATE tasks SET project = ?, modified_ts = ? WHERE id = ?',
  tags: 'UPDATE tasks SET tags = ?, modified_ts = ? WHERE id = ?',
  due_ts: 'UPDATE tasks SET due_ts = ?, modified_ts = ? WHERE id = ?',
  scheduled_ts: 'UPDATE tasks SET scheduled_ts = ?, modified_ts = ? WHERE id = ?',
  wait_ts: 'UPDATE tasks SET wait_ts = ?, modified_ts = ? WHERE id = ?',
  alloc_secs: 'UPDATE tasks SET alloc_secs = ?, modified_ts = ? WHERE id = ?',
};

/**
 * Durable records for tasks, work sessions, external handoffs and annotations.
 *
 * All mutations go through `write()`. Calls nest: only the outermost call
 * opens and commits the transaction, and the commit check runs once, right
 * before that commit, against the final state.
 */
export class FactStore {
  private depth = 0;

  private insertTaskStmt: Database.Statement;
  private getTaskStmt: Database.Statement;
  private listTasksStmt: Database.Statement;
  private updateFieldStmts: Record<UpdatableTaskField, Database.Statement>;
  private setLifecycleStmt: Database.Statement;
  private queueStmt: Database.Statement;
  private clearPositionsStmt: Database.Statement;
  private setPositionStmt: Database.Statement;

  private getOpenSessionStmt: Database.Statement;
  private getSessionStmt: Database.Statement;
  private insertSessionStmt: Database.Statement;
  private setSessionEndStmt: Database.Statement;
  private setSessionBoundsStmt: Database.Statement;
  private deleteSessionStmt: Database.Statement;
  private lastEndedStmt: Database.Statement;
  private latestForTaskStmt: Database.Statement;
  private overlappingStmt: Database.Statement;
  private listSessionsStmt: Database.Statement;
  private countSessionsStmt: Database.Statement;

  private getWaitingStmt: Database.Statement;
  private insertExternalStmt: Database.Statement;
  private collectExternalStmt: Database.Statement;
  private listWaitingStmt: Database.Statement;

  private insertAnnotationStmt: Database.Statement;
  private listAnnotationsStmt: Database.Statement;
  private sessionAnnotationsStmt: Database.Statement;

  private insertProjectStmt: Database.Statement;
  private getProjectStmt: Database.Statement;
  private listProjectsStmt: Database.Statement;
  private renameProjectStmt: Database.Statement;
  private setProjectArchivedStmt: Database.Statement;
  private deleteProjectStmt: Database.Statement;
  private moveProjectTasksStmt: Database.Statement;

  private stateQueueStmt: Database.Statement;
  private stateOpenStmt: Database.Statement;
  private stateWaitingStmt: Database.Statement;
  private stateInvalidStmt: Database.Statement;

  constructor(
    private db: Database.Database,
    private commitCheck?: CommitCheck
  ) {
    this.insertTaskStmt = db.prepare(`
      INSERT INTO tasks (description, project, tags, due_ts, scheduled_ts, wait_ts, alloc_secs, created_ts, modified_ts)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      RETURNING *
    `);
    this.getTaskStmt = db.prepare('SELECT * FROM tasks WHERE id = ?');
    this.listTasksStmt = db.prepare(`
      SELECT * FROM tasks
      WHERE (? IS NULL OR lifecycle = ?)
        AND (? IS NULL OR project = ? OR substr(project, 1, length(?) + 1) = ? || '.')
        AND (? IS NULL OR EXISTS (SELECT 1 FROM json_each(tasks.tags) WHERE value = ?))
      ORDER BY id ASC
    `);
    this.updateFieldStmts = {
      description: db.prepare(UPDATE_FIELD_SQL.description),
      project: db.prepare(UPDATE_FIELD_SQL.project),
      tags: db.prepare(UPDATE_FIELD_SQL.tags),
      due_ts: db.prepare(UPDATE_FIELD_SQL.due_ts),
      scheduled_ts: db.prepare(UPDATE_FIELD_SQL.scheduled_ts),
      wait_ts: db.prepare(UPDATE_FIELD_SQL.wait_ts),
      alloc_secs: db.prepare(UPDATE_FIELD_SQL.alloc_secs),
    };
    this.setLifecycleStmt = db.prepare(
      'UPDATE tasks SET lifecycle = ?, modified_ts = ? WHERE id = ?'
    );
    this.queueStmt = db.prepare(`
      SELECT queue_position AS position, id AS task_id, description
      FROM tasks
      WHERE queue_position IS NOT NULL
      ORDER BY queue_position ASC
    `);
    this.clearPositionsStmt = db.prepare(
      'UPDATE tasks SET queue_position = NULL WHERE queue_position IS NOT NULL'
    );
    this.setPositionStmt = db.prepare('UPDATE tasks SET queue_position = ? WHERE id = ?');

    this.getOpenSessionStmt = db.prepare(
      'SELECT * FROM sessions WHERE end_ts IS NULL ORDER BY id ASC LIMIT 1'
    );
    this.getSessionStmt = db.prepare('SELECT * FROM sessions WHERE id = ?');
    this.insertSessionStmt = db.prepare(`
      INSERT INTO sessions (task_id, start_ts, end_ts, origin, created_ts)
      VALUES (?, ?, ?, ?, ?)
      RETURNING *
    `);
    this.setSessionEndStmt = db.prepare('UPDATE sessions SET end_ts = ? WHERE id = ?');
    this.setSessionBoundsStmt = db.prepare(
      'UPDATE sessions SET start_ts = ?, end_ts = ? WHERE id = ?'
    );
    this.deleteSessionStmt = db.prepare('DELETE FROM sessions WHERE id = ?');
    this.lastEndedStmt = db.prepare(`
      SELECT * FROM sessions
      WHERE end_ts IS NOT NULL AND end_ts <= ?
      ORDER BY end_ts DESC, id DESC
      LIMIT 1
    `);
    this.latestForTaskStmt = db.prepare(`
      SELECT * FROM sessions WHERE task_id = ?
      ORDER BY start_ts DESC, id DESC
      LIMIT 1
    `);
    this.overlappingStmt = db.prepare(`
      SELECT * FROM sessions
      WHERE end_ts IS NOT NULL
        AND end_ts > ?
        AND (? IS NULL OR start_ts < ?)
        AND id != ?
      ORDER BY start_ts ASC, id ASC
    `);
    this.listSessionsStmt = db.prepare(`
      SELECT * FROM sessions
      WHERE (? IS NULL OR task_id = ?)
      ORDER BY start_ts ASC, id ASC
    `);
    this.countSessionsStmt = db.prepare(
      'SELECT COUNT(*) AS count FROM sessions WHERE task_id = ?'
    );

    this.getWaitingStmt = db.prepare(
      "SELECT * FROM externals WHERE task_id = ? AND status = 'waiting'"
    );
    this.insertExternalStmt = db.prepare(`
      INSERT INTO externals (task_id, recipient, note, sent_ts)
      VALUES (?, ?, ?, ?)
      RETURNING *
    `);
    this.collectExternalStmt = db.prepare(`
      UPDATE externals SET status = 'collected', collected_ts = ?
      WHERE id = ?
      RETURNING *
    `);
    this.listWaitingStmt = db.prepare(`
      SELECT * FROM externals
      WHERE status = 'waiting' AND (? IS NULL OR recipient = ?)
      ORDER BY sent_ts ASC, id ASC
    `);

    this.insertAnnotationStmt = db.prepare(`
      INSERT INTO annotations (task_id, session_id, note, entry_ts)
      VALUES (?, ?, ?, ?)
      RETURNING *
    `);
    this.listAnnotationsStmt = db.prepare(`
      SELECT * FROM annotations WHERE task_id = ? ORDER BY entry_ts ASC, id ASC
    `);
    this.sessionAnnotationsStmt = db.prepare(`
      SELECT * FROM annotations WHERE session_id = ? ORDER BY entry_ts ASC, id ASC
    `);

    this.insertProjectStmt = db.prepare(`
      INSERT INTO projects (name, created_ts, modified_ts)
      VALUES (?, ?, ?)
      RETURNING *
    `);
    this.getProjectStmt = db.prepare('SELECT * FROM projects WHERE name = ?');
    this.listProjectsStmt = db.prepare(`
      SELECT p.*,
        COUNT(t.id) AS total_tasks,
        COALESCE(SUM(CASE WHEN t.lifecycle = 'open' THEN 1 ELSE 0 END), 0) AS open_tasks
      FROM projects p
      LEFT JOIN tasks t ON t.project = p.name
      WHERE (? = 1 OR p.archived = 0)
      GROUP BY p.id
      ORDER BY p.name ASC
    `);
    this.renameProjectStmt = db.prepare(
      'UPDATE projects SET name = ?, modified_ts = ? WHERE id = ?'
    );
    this.setProjectArchivedStmt = db.prepare(
      'UPDATE projects SET archived = ?, modified_ts = ? WHERE id = ?'
    );
    this.deleteProjectStmt = db.prepare('DELETE FROM projects WHERE id = ?');
    this.moveProjectTasksStmt = db.prepare(`
      UPDATE tasks SET project = ?, modified_ts = ?
      WHERE project = ?
      RETURNING id
    `);

    this.stateQueueStmt = db.prepare(`
      SELECT id AS task_id, queue_position, lifecycle FROM tasks
      WHERE queue_position IS NOT NULL
      ORDER BY queue_position ASC
    `);
    this.stateOpenStmt = db.prepare(`
      SELECT s.id, s.task_id, t.lifecycle FROM sessions s
      JOIN tasks t ON t.id = s.task_id
      WHERE s.end_ts IS NULL
    `);
    this.stateWaitingStmt = db.prepare(`
      SELECT e.task_id, e.recipient, t.lifecycle FROM externals e
      JOIN tasks t ON t.id = e.task_id
      WHERE e.status = 'waiting'
    `);
    this.stateInvalidStmt = db.prepare(`
      SELECT id, start_ts, end_ts FROM sessions
      WHERE end_ts IS NOT NULL AND end_ts <= start_ts
    `);
  }

  /**
   * Run `fn` inside the store's write transaction, joining the enclosing one
   * when called from within another `write()`.
   */
  write<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth += 1;
      try {
        return fn();
      } finally {
        this.depth -= 1;
      }
    }

    return withWriteTransaction(this.db, () => {
      this.depth = 1;
      try {
        const result = fn();
        this.commitCheck?.(this.readState());
        return result;
      } finally {
        this.depth = 0;
      }
    });
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  readState(): StoreState {
    return {
      queue: this.stateQueueStmt.all() as StoreState['queue'],
      openSessions: this.stateOpenStmt.all() as StoreState['openSessions'],
      waiting: this.stateWaitingStmt.all() as StoreState['waiting'],
      invalidSessions: this.stateInvalidStmt.all() as StoreState['invalidSessions'],
    };
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  insertTask(input: NewTask): Task {
    const row = this.insertTaskStmt.get(
      input.description,
      input.project,
      JSON.stringify(input.tags),
      input.due_ts,
      input.scheduled_ts,
      input.wait_ts,
      input.alloc_secs,
      input.created_ts,
      input.created_ts
    ) as TaskRow;
    return rowToTask(row);
  }

  getTask(id: number): Task | null {
    const row = this.getTaskStmt.get(id) as TaskRow | undefined;
    return row ? rowToTask(row) : null;
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    const lifecycle = filter.lifecycle ?? null;
    const project = filter.project ?? null;
    const tag = filter.tag ?? null;
    const rows = this.listTasksStmt.all(
      lifecycle,
      lifecycle,
      project,
      project,
      project,
      project,
      tag,
      tag
    ) as TaskRow[];
    return rows.map(rowToTask);
  }

  updateTaskField(
    id: number,
    field: UpdatableTaskField,
    value: string | number | string[] | null,
    ts: number
  ): void {
    const bound = Array.isArray(value) ? JSON.stringify(value) : value;
    this.updateFieldStmts[field].run(bound, ts, id);
  }

  setLifecycle(id: number, lifecycle: Lifecycle, ts: number): void {
    this.setLifecycleStmt.run(lifecycle, ts, id);
  }

  // ---------------------------------------------------------------------------
  // Queue
  // ---------------------------------------------------------------------------

  queue(): QueueEntry[] {
    return this.queueStmt.all() as QueueEntry[];
  }

  queuedTaskIds(): number[] {
    return this.queue().map(entry => entry.task_id);
  }

  /**
   * Replace the whole queue with `taskIds` in order. Positions are cleared
   * first so renumbering never collides on the unique position index.
   */
  writeQueue(taskIds: number[]): void {
    this.clearPositionsStmt.run();
    taskIds.forEach((taskId, position) => {
      this.setPositionStmt.run(position, taskId);
    });
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  getOpenSession(): WorkSession | null {
    const row = this.getOpenSessionStmt.get() as WorkSession | undefined;
    return row ?? null;
  }

  getSession(id: number): WorkSession | null {
    const row = this.getSessionStmt.get(id) as WorkSession | undefined;
    return row ?? null;
  }

  insertSession(
    taskId: number,
    startTs: number,
    endTs: number | null,
    origin: SessionOrigin,
    createdTs: number
  ): WorkSession {
    return this.insertSessionStmt.get(taskId, startTs, endTs, origin, createdTs) as WorkSession;
  }

  closeSession(id: number, endTs: number): void {
    this.setSessionEndStmt.run(endTs, id);
  }

  reopenSession(id: number): void {
    this.setSessionEndStmt.run(null, id);
  }

  setSessionBounds(id: number, startTs: number, endTs: number | null): void {
    this.setSessionBoundsStmt.run(startTs, endTs, id);
  }

  deleteSession(id: number): void {
    this.deleteSessionStmt.run(id);
  }

  /** The closed session with the latest end at or before `ts`. */
  lastEndedSession(ts: number): ClosedSession | null {
    const row = this.lastEndedStmt.get(ts) as ClosedSession | undefined;
    return row ?? null;
  }

  /** The session of `taskId` that started last, open or closed. */
  latestSessionForTask(taskId: number): WorkSession | null {
    const row = this.latestForTaskStmt.get(taskId) as WorkSession | undefined;
    return row ?? null;
  }

  /**
   * Closed sessions intersecting `[from, to)`; `to = null` is unbounded.
   */
  closedSessionsOverlapping(
    from: number,
    to: number | null,
    excludeId: number = 0
  ): ClosedSession[] {
    return this.overlappingStmt.all(from, to, to, excludeId) as ClosedSession[];
  }

  listSessions(taskId?: number): WorkSession[] {
    const id = taskId ?? null;
    return this.listSessionsStmt.all(id, id) as WorkSession[];
  }

  countSessions(taskId: number): number {
    const row = this.countSessionsStmt.get(taskId) as { count: number };
    return row.count;
  }

  // ---------------------------------------------------------------------------
  // Externals
  // ---------------------------------------------------------------------------

  getWaiting(taskId: number): ExternalRecord | null {
    const row = this.getWaitingStmt.get(taskId) as ExternalRecord | undefined;
    return row ?? null;
  }

  insertExternal(
    taskId: number,
    recipient: string,
    note: string | null,
    sentTs: number
  ): ExternalRecord {
    return this.insertExternalStmt.get(taskId, recipient, note, sentTs) as ExternalRecord;
  }

  collectExternal(id: number, collectedTs: number): ExternalRecord {
    return this.collectExternalStmt.get(collectedTs, id) as ExternalRecord;
  }

  listWaiting(recipient?: string): ExternalRecord[] {
    const value = recipient ?? null;
    return this.listWaitingStmt.all(value, value) as ExternalRecord[];
  }

  // ---------------------------------------------------------------------------
  // Annotations
  // ---------------------------------------------------------------------------

  insertAnnotation(
    taskId: number,
    sessionId: number | null,
    note: string,
    entryTs: number
  ): Annotation {
    return this.insertAnnotationStmt.get(taskId, sessionId, note, entryTs) as Annotation;
  }

  listAnnotations(taskId: number): Annotation[] {
    return this.listAnnotationsStmt.all(taskId) as Annotation[];
  }

  listSessionAnnotations(sessionId: number): Annotation[] {
    return this.sessionAnnotationsStmt.all(sessionId) as Annotation[];
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  insertProject(name: string, ts: number): Project {
    return rowToProject(this.insertProjectStmt.get(name, ts, ts) as ProjectRow);
  }

  getProject(name: string): Project | null {
    const row = this.getProjectStmt.get(name) as ProjectRow | undefined;
    return row ? rowToProject(row) : null;
  }

  listProjects(includeArchived: boolean): ProjectSummary[] {
    const rows = this.listProjectsStmt.all(includeArchived ? 1 : 0) as ProjectSummaryRow[];
    return rows.map(row => ({
      ...rowToProject(row),
      open_tasks: row.open_tasks,
      total_tasks: row.total_tasks,
    }));
  }

  renameProject(id: number, name: string, ts: number): void {
    this.renameProjectStmt.run(name, ts, id);
  }

  setProjectArchived(id: number, archived: boolean, ts: number): void {
    this.setProjectArchivedStmt.run(archived ? 1 : 0, ts, id);
  }

  deleteProject(id: number): void {
    this.deleteProjectStmt.run(id);
  }

  /** Point every task in project `from` at `to`. Returns the moved task ids. */
  moveProjectTasks(from: string, to: string, ts: number): number[] {
    const rows = this.moveProjectTasksStmt.all(to, ts, from) as { id: number }[];
    return rows.map(row => row.id);
  }
}
