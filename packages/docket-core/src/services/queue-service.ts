import { EmptyQueueError, InvariantViolationError } from '../errors.js';
import type { EventStore } from '../events/store.js';
import { EventType } from '../events/types.js';
import type { FactStore } from '../store/fact-store.js';
import type { Clock, QueueEntry } from '../store/types.js';
import { requireOpenTask, timedTaskId } from './lookups.js';

export type RemoveTarget = { index: number } | { taskId: number };

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * The ordered ready-list. Position 0 is the front. Every operation is one
 * transaction that rewrites the queue as a whole.
 */
export class QueueService {
  private frontCheckDeferrals = 0;

  constructor(
    private store: FactStore,
    private eventStore: EventStore,
    private clock: Clock
  ) {}

  list(): QueueEntry[] {
    return this.store.queue();
  }

  /** Append a task, or bump it to the end if it is already queued. */
  enqueue(taskId: number): QueueEntry {
    return this.store.write(() => {
      requireOpenTask(this.store, taskId);

      const waiting = this.store.getWaiting(taskId);
      if (waiting && timedTaskId(this.store) !== taskId) {
        throw new InvariantViolationError([
          `task ${taskId} is waiting on ${waiting.recipient}; recall it first`,
        ]);
      }

      const ids = this.store.queuedTaskIds().filter(id => id !== taskId);
      ids.push(taskId);
      this.commit(ids);
      return this.entryFor(taskId);
    });
  }

  /**
   * Task id at `index`. Out-of-range indices clamp to the nearest end.
   */
  select(index: number): number {
    const ids = this.store.queuedTaskIds();
    if (ids.length === 0) {
      throw new EmptyQueueError();
    }
    return ids[clamp(Math.trunc(index), 0, ids.length - 1)];
  }

  /** Move a task to the front, inserting it if it is not queued. */
  promoteToFront(taskId: number): QueueEntry {
    return this.store.write(() => {
      requireOpenTask(this.store, taskId);
      const ids = this.store.queuedTaskIds().filter(id => id !== taskId);
      this.commit([taskId, ...ids]);
      return this.entryFor(taskId);
    });
  }

  pick(index: number): QueueEntry {
    return this.store.write(() => this.promoteToFront(this.select(index)));
  }

  /**
   * Insert a task at `position` (clamped to the queue bounds). When another
   * task is timed, the front stays with it.
   */
  insertAt(taskId: number, position: number): QueueEntry {
    return this.store.write(() => {
      requireOpenTask(this.store, taskId);
      const ids = this.store.queuedTaskIds().filter(id => id !== taskId);
      const timed = timedTaskId(this.store);
      const min = timed !== null && timed !== taskId ? 1 : 0;
      const at = timed === taskId ? 0 : clamp(Math.trunc(position), min, ids.length);
      ids.splice(at, 0, taskId);
      this.commit(ids);
      return this.entryFor(taskId);
    });
  }

  /**
   * Move the first `n` tasks (mod length) to the back in their order.
   * Negative `n` rotates the other way.
   */
  rotate(n: number = 1): QueueEntry[] {
    return this.store.write(() => {
      const ids = this.store.queuedTaskIds();
      if (ids.length <= 1) {
        return this.store.queue();
      }
      const k = ((Math.trunc(n) % ids.length) + ids.length) % ids.length;
      if (k === 0) {
        return this.store.queue();
      }
      this.commit([...ids.slice(k), ...ids.slice(0, k)]);
      return this.store.queue();
    });
  }

  /**
   * Take a task off the queue. Returns the removed task id, or null when
   * the given task was not queued.
   */
  remove(target: RemoveTarget): number | null {
    return this.store.write(() => {
      const ids = this.store.queuedTaskIds();
      if (ids.length === 0) {
        throw new EmptyQueueError();
      }

      const taskId = 'index' in target ? this.select(target.index) : target.taskId;
      return this.unqueue(taskId) ? taskId : null;
    });
  }

  /**
   * Take a task off the queue if it is there. Unlike `remove`, an empty
   * queue is not an error.
   */
  unqueue(taskId: number): boolean {
    return this.store.write(() => {
      const ids = this.store.queuedTaskIds();
      if (!ids.includes(taskId)) {
        return false;
      }
      this.commit(ids.filter(id => id !== taskId));
      return true;
    });
  }

  /** Unqueue everything. Returns the task ids that were queued. */
  clear(): number[] {
    return this.store.write(() => {
      const ids = this.store.queuedTaskIds();
      if (ids.length > 0) {
        this.commit([]);
      }
      return ids;
    });
  }

  /**
   * Run `fn` with the timed-front check left to the commit-time invariant
   * guard, so the caller can move the timer to the new front afterwards.
   */
  deferFrontCheck<T>(fn: () => T): T {
    this.frontCheckDeferrals += 1;
    try {
      return fn();
    } finally {
      this.frontCheckDeferrals -= 1;
    }
  }

  /**
   * Persist a new queue order, rejecting any order that takes the timed
   * task off the front, and record membership changes.
   */
  private commit(ids: number[]): void {
    const timed = timedTaskId(this.store);
    if (this.frontCheckDeferrals === 0 && timed !== null && ids[0] !== timed) {
      throw new InvariantViolationError([
        `task ${timed} is being timed and must stay at the front of the queue; stop the timer first`,
      ]);
    }

    const before = this.store.queue();
    const ts = this.clock();
    this.store.writeQueue(ids);

    const after = new Map(ids.map((id, position) => [id, position]));
    for (const entry of before) {
      if (!after.has(entry.task_id)) {
        this.eventStore.append({
          task_id: entry.task_id,
          type: EventType.QueueRemoved,
          data: { position: entry.position },
          timestamp: ts,
        });
      }
    }
    const previouslyQueued = new Set(before.map(entry => entry.task_id));
    for (const [id, position] of after) {
      if (!previouslyQueued.has(id)) {
        this.eventStore.append({
          task_id: id,
          type: EventType.QueueAdded,
          data: { position },
          timestamp: ts,
        });
      }
    }
  }

  private entryFor(taskId: number): QueueEntry {
    const entry = this.store.queue().find(e => e.task_id === taskId);
    if (!entry) {
      throw new Error(`Task ${taskId} missing from queue after reorder`);
    }
    return entry;
  }
}
