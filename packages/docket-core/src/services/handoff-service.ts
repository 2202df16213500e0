import { InvariantViolationError, NoWaitingRecordError } from '../errors.js';
import type { EventStore } from '../events/store.js';
import { EventType, noteString, recipientString } from '../events/types.js';
import type { FactStore } from '../store/fact-store.js';
import type { Clock, ExternalRecord } from '../store/types.js';
import { requireOpenTask, requireTask, timedTaskId } from './lookups.js';
import type { QueueService } from './queue-service.js';

export interface SendOptions {
  note?: string;
  at?: number;
}

export interface RecallOptions {
  /** Queue position to return to; defaults to the front. */
  position?: number;
  at?: number;
}

export interface RecallResult {
  record: ExternalRecord;
  position: number;
}

export interface ListWaitingOptions {
  recipient?: string;
}

/**
 * Tasks handed off to someone else. A waiting task leaves the queue unless
 * it is being timed, and comes back on recall.
 */
export class HandoffService {
  constructor(
    private store: FactStore,
    private eventStore: EventStore,
    private queueService: QueueService,
    private clock: Clock
  ) {}

  send(taskId: number, recipient: string, opts: SendOptions = {}): ExternalRecord {
    recipientString.parse(recipient);
    if (opts.note !== undefined) noteString.parse(opts.note);

    return this.store.write(() => {
      requireOpenTask(this.store, taskId);
      const existing = this.store.getWaiting(taskId);
      if (existing) {
        throw new InvariantViolationError([
          `task ${taskId} is already waiting on ${existing.recipient}`,
        ]);
      }

      const at = opts.at ?? this.clock();
      const record = this.store.insertExternal(taskId, recipient, opts.note ?? null, at);
      this.eventStore.append({
        task_id: taskId,
        type: EventType.ExternalSent,
        data: opts.note !== undefined ? { recipient, note: opts.note } : { recipient },
        timestamp: at,
      });

      if (timedTaskId(this.store) !== taskId) {
        this.queueService.unqueue(taskId);
      }
      return record;
    });
  }

  recall(taskId: number, opts: RecallOptions = {}): RecallResult {
    return this.store.write(() => {
      requireTask(this.store, taskId);
      const waiting = this.store.getWaiting(taskId);
      if (!waiting) {
        throw new NoWaitingRecordError(taskId);
      }

      const at = opts.at ?? this.clock();
      const record = this.store.collectExternal(waiting.id, at);
      const entry = this.queueService.insertAt(taskId, opts.position ?? 0);
      this.eventStore.append({
        task_id: taskId,
        type: EventType.ExternalRecalled,
        data: { recipient: waiting.recipient, position: entry.position },
        timestamp: at,
      });
      return { record, position: entry.position };
    });
  }

  /**
   * Collect a waiting record without re-queueing, as when the task is
   * completed or cancelled. Returns the collected record, if there was one.
   */
  collect(taskId: number, at: number): ExternalRecord | null {
    return this.store.write(() => {
      const waiting = this.store.getWaiting(taskId);
      if (!waiting) {
        return null;
      }
      const record = this.store.collectExternal(waiting.id, at);
      this.eventStore.append({
        task_id: taskId,
        type: EventType.ExternalRecalled,
        data: { recipient: waiting.recipient },
        timestamp: at,
      });
      return record;
    });
  }

  listWaiting(opts: ListWaitingOptions = {}): ExternalRecord[] {
    return this.store.listWaiting(opts.recipient);
  }
}
