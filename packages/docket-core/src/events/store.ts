import type Database from 'libsql';
import { newEventId } from '../utils/id.js';
import { type EventEnvelope, EventType, validateEventData } from './types.js';

export interface AppendEventInput {
  event_id?: string;
  task_id: number;
  type: EventType;
  data: Record<string, unknown>;
  timestamp: number;
}

export interface PersistedEventEnvelope extends EventEnvelope {
  rowid: number;
}

export interface GetByTaskIdOptions {
  afterId?: number;
  limit?: number;
}

type EventRow = {
  id: number;
  event_id: string;
  task_id: number;
  type: EventType;
  data: string;
  timestamp: number;
};

export class EventStore {
  private insertStmt: Database.Statement;
  private selectByTaskStmt: Database.Statement;
  private selectRecentStmt: Database.Statement;

  constructor(private db: Database.Database) {
    this.insertStmt = db.prepare(`
      INSERT INTO events (event_id, task_id, type, data, timestamp)
      VALUES (?, ?, ?, ?, ?)
      RETURNING id
    `);

    this.selectByTaskStmt = db.prepare(`
      SELECT * FROM events
      WHERE task_id = ? AND id > COALESCE(?, 0)
      ORDER BY id ASC
      LIMIT COALESCE(?, 1000)
    `);

    this.selectRecentStmt = db.prepare(`
      SELECT * FROM events ORDER BY id DESC LIMIT ?
    `);
  }

  append(input: AppendEventInput): PersistedEventEnvelope {
    validateEventData(input.type, input.data);

    const eventId = input.event_id ?? newEventId(input.timestamp);
    const row = this.insertStmt.get(
      eventId,
      input.task_id,
      input.type,
      JSON.stringify(input.data),
      input.timestamp
    ) as { id: number };

    return {
      rowid: row.id,
      event_id: eventId,
      task_id: input.task_id,
      type: input.type,
      data: input.data,
      timestamp: input.timestamp,
    };
  }

  getByTaskId(taskId: number, opts?: GetByTaskIdOptions): PersistedEventEnvelope[] {
    const rows = this.selectByTaskStmt.all(
      taskId,
      opts?.afterId ?? null,
      opts?.limit ?? null
    ) as EventRow[];
    return rows.map(row => this.rowToEnvelope(row));
  }

  /** Most recent events store-wide, newest first. */
  getRecent(limit: number = 50): PersistedEventEnvelope[] {
    const rows = this.selectRecentStmt.all(limit) as EventRow[];
    return rows.map(row => this.rowToEnvelope(row));
  }

  private rowToEnvelope(row: EventRow): PersistedEventEnvelope {
    return {
      rowid: row.id,
      event_id: row.event_id,
      task_id: row.task_id,
      type: row.type,
      data: JSON.parse(row.data) as Record<string, unknown>,
      timestamp: row.timestamp,
    };
  }
}
