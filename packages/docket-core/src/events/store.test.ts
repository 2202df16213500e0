import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'libsql';
import { ZodError } from 'zod';
import { EventStore } from './store.js';
import { EventType } from './types.js';
import { createTestDb } from '../db/test-utils.js';

describe('EventStore', () => {
  let db: Database.Database;
  let store: EventStore;

  beforeEach(() => {
    db = createTestDb();
    store = new EventStore(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('append', () => {
    it('inserts event and returns envelope with row id', () => {
      const event = store.append({
        task_id: 1,
        type: EventType.TaskCreated,
        data: { description: 'Write report' },
        timestamp: 100,
      });

      expect(event.event_id).toHaveLength(26);
      expect(event).toMatchObject({
        task_id: 1,
        type: EventType.TaskCreated,
        data: { description: 'Write report' },
        timestamp: 100,
      });
      expect(event.rowid).toBeGreaterThan(0);
    });

    it('rejects duplicate event_id', () => {
      const eventId = '01ARZ3NDEKTSV4RRFFQ69G5FAV';
      store.append({
        event_id: eventId,
        task_id: 1,
        type: EventType.QueueAdded,
        data: { position: 0 },
        timestamp: 100,
      });

      expect(() =>
        store.append({
          event_id: eventId,
          task_id: 2,
          type: EventType.QueueAdded,
          data: { position: 1 },
          timestamp: 101,
        })
      ).toThrow();
    });

    it('validates event data before inserting', () => {
      expect(() =>
        store.append({
          task_id: 1,
          type: EventType.TimerStopped,
          data: { session_id: 1, end_ts: 100, duration_secs: 0 },
          timestamp: 100,
        })
      ).toThrow(ZodError);
      expect(store.getRecent()).toEqual([]);
    });
  });

  describe('getByTaskId', () => {
    beforeEach(() => {
      store.append({ task_id: 1, type: EventType.QueueAdded, data: { position: 0 }, timestamp: 100 });
      store.append({ task_id: 2, type: EventType.QueueAdded, data: { position: 1 }, timestamp: 101 });
      store.append({ task_id: 1, type: EventType.QueueRemoved, data: { position: 0 }, timestamp: 102 });
    });

    it('returns one task history in insertion order', () => {
      const events = store.getByTaskId(1);

      expect(events.map(e => e.type)).toEqual([EventType.QueueAdded, EventType.QueueRemoved]);
      expect(events[1].data).toEqual({ position: 0 });
    });

    it('pages with afterId and limit', () => {
      const [first] = store.getByTaskId(1, { limit: 1 });

      expect(store.getByTaskId(1, { limit: 1 })).toHaveLength(1);
      expect(store.getByTaskId(1, { afterId: first.rowid }).map(e => e.timestamp)).toEqual([102]);
    });
  });

  describe('getRecent', () => {
    it('returns newest first', () => {
      for (let i = 0; i < 3; i++) {
        store.append({ task_id: i + 1, type: EventType.QueueAdded, data: { position: i }, timestamp: 100 + i });
      }

      expect(store.getRecent(2).map(e => e.task_id)).toEqual([3, 2]);
    });
  });

  describe('append-only enforcement', () => {
    it('rejects UPDATE and DELETE on events', () => {
      store.append({ task_id: 1, type: EventType.QueueAdded, data: { position: 0 }, timestamp: 100 });

      expect(() => db.prepare('UPDATE events SET timestamp = 0').run()).toThrow(/append-only/);
      expect(() => db.prepare('DELETE FROM events').run()).toThrow(/append-only/);
    });
  });
});
