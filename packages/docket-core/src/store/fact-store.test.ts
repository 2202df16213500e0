import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'libsql';
import { createTestDb } from '../db/test-utils.js';
import { InvariantViolationError } from '../errors.js';
import { Lifecycle } from '../events/types.js';
import { FactStore, type NewTask, type StoreState } from './fact-store.js';

function newTask(description: string): NewTask {
  return {
    description,
    project: null,
    tags: [],
    due_ts: null,
    scheduled_ts: null,
    wait_ts: null,
    alloc_secs: null,
    created_ts: 100,
  };
}

describe('FactStore', () => {
  let db: Database.Database;
  let store: FactStore;
  let checked: StoreState[];

  beforeEach(() => {
    db = createTestDb();
    checked = [];
    store = new FactStore(db, state => {
      checked.push(state);
    });
  });

  afterEach(() => {
    db.close();
  });

  describe('write', () => {
    it('runs the commit check once for nested writes', () => {
      store.write(() => {
        store.insertTask(newTask('a'));
        store.write(() => {
          store.insertTask(newTask('b'));
        });
        expect(store.inTransaction).toBe(true);
      });

      expect(checked).toHaveLength(1);
      expect(store.inTransaction).toBe(false);
    });

    it('rolls back everything when a nested write throws', () => {
      expect(() =>
        store.write(() => {
          store.insertTask(newTask('a'));
          store.write(() => {
            throw new Error('inner failure');
          });
        })
      ).toThrow('inner failure');

      expect(store.listTasks()).toEqual([]);
      expect(store.inTransaction).toBe(false);
    });

    it('rolls back when the commit check rejects the state', () => {
      const guarded = new FactStore(db, () => {
        throw new InvariantViolationError(['nope']);
      });

      expect(() => guarded.write(() => guarded.insertTask(newTask('a')))).toThrow(
        'Invariant violation: nope'
      );
      expect(store.listTasks()).toEqual([]);
    });

    it('reports a broken unique index as an invariant violation', () => {
      store.write(() => {
        store.insertTask(newTask('a'));
        store.insertTask(newTask('b'));
      });

      expect(() =>
        store.write(() => {
          db.prepare('UPDATE tasks SET queue_position = 0').run();
        })
      ).toThrow(InvariantViolationError);
    });
  });

  describe('tasks', () => {
    it('round-trips tags as a list', () => {
      const task = store.insertTask({ ...newTask('a'), tags: ['x', 'y'] });

      expect(task.tags).toEqual(['x', 'y']);
      expect(store.getTask(task.id)?.tags).toEqual(['x', 'y']);
    });

    it('returns null for unknown ids', () => {
      expect(store.getTask(12)).toBeNull();
    });

    it('updates a field and the modified time', () => {
      const task = store.insertTask(newTask('a'));
      store.updateTaskField(task.id, 'tags', ['z'], 200);

      expect(store.getTask(task.id)).toMatchObject({ tags: ['z'], modified_ts: 200 });
    });
  });

  describe('writeQueue', () => {
    it('renumbers without colliding on existing positions', () => {
      const ids = ['a', 'b', 'c'].map(d => store.insertTask(newTask(d)).id);
      store.writeQueue(ids);

      store.writeQueue([ids[2], ids[0], ids[1]]);

      expect(store.queue().map(e => [e.position, e.task_id])).toEqual([
        [0, ids[2]],
        [1, ids[0]],
        [2, ids[1]],
      ]);
    });

    it('unqueues tasks left out', () => {
      const ids = ['a', 'b'].map(d => store.insertTask(newTask(d)).id);
      store.writeQueue(ids);
      store.writeQueue([ids[1]]);

      expect(store.getTask(ids[0])?.queue_position).toBeNull();
      expect(store.queuedTaskIds()).toEqual([ids[1]]);
    });
  });

  describe('sessions', () => {
    it('finds the last session ended at or before a time', () => {
      const task = store.insertTask(newTask('a'));
      store.insertSession(task.id, 10, 20, 'timer', 10);
      const later = store.insertSession(task.id, 30, 40, 'timer', 30);
      store.insertSession(task.id, 50, 60, 'interval', 50);

      expect(store.lastEndedSession(45)?.id).toBe(later.id);
      expect(store.lastEndedSession(5)).toBeNull();
    });

    it('finds closed sessions overlapping a range', () => {
      const task = store.insertTask(newTask('a'));
      const first = store.insertSession(task.id, 10, 20, 'timer', 10);
      const second = store.insertSession(task.id, 30, 40, 'timer', 30);
      store.insertSession(task.id, 50, null, 'timer', 50);

      expect(store.closedSessionsOverlapping(15, 35).map(s => s.id)).toEqual([first.id, second.id]);
      expect(store.closedSessionsOverlapping(20, 30)).toEqual([]);
      expect(store.closedSessionsOverlapping(35, null).map(s => s.id)).toEqual([second.id]);
      expect(store.closedSessionsOverlapping(15, 35, first.id).map(s => s.id)).toEqual([second.id]);
    });

    it('reopens and closes sessions', () => {
      const task = store.insertTask(newTask('a'));
      const session = store.insertSession(task.id, 10, 20, 'timer', 10);

      store.reopenSession(session.id);
      expect(store.getOpenSession()?.id).toBe(session.id);

      store.closeSession(session.id, 90);
      expect(store.getOpenSession()).toBeNull();
      expect(store.getSession(session.id)?.end_ts).toBe(90);
      expect(store.countSessions(task.id)).toBe(1);
    });
  });

  describe('readState', () => {
    it('collects the cross-table facts', () => {
      const a = store.insertTask(newTask('a'));
      const b = store.insertTask(newTask('b'));
      store.writeQueue([a.id]);
      store.insertSession(a.id, 10, null, 'timer', 10);
      store.insertSession(b.id, 5, 5, 'interval', 5);
      store.insertExternal(b.id, 'alice', null, 10);

      expect(store.readState()).toEqual({
        queue: [{ task_id: a.id, queue_position: 0, lifecycle: Lifecycle.Open }],
        openSessions: [{ id: 1, task_id: a.id, lifecycle: Lifecycle.Open }],
        waiting: [{ task_id: b.id, recipient: 'alice', lifecycle: Lifecycle.Open }],
        invalidSessions: [{ id: 2, start_ts: 5, end_ts: 5 }],
      });
    });
  });
});
