import {
  AlreadyRunningError,
  EmptyQueueError,
  InvariantViolationError,
  NonChronologicalError,
  NothingToCutError,
  NotRunningError,
} from '../errors.js';
import type { EventStore } from '../events/store.js';
import { EventType, Lifecycle } from '../events/types.js';
import type { FactStore } from '../store/fact-store.js';
import type { Annotation, ClosedSession, Clock, WorkSession } from '../store/types.js';
import { requireClosedSession, requireOpenTask, requireTask } from './lookups.js';
import {
  type BoundaryResolution,
  type MicroSessionPolicy,
  isMicroSession,
  resolveBoundary,
  sessionDuration,
} from './micro-session.js';
import type { QueueService } from './queue-service.js';

export interface TimeOptions {
  /** Epoch seconds; defaults to the clock. */
  at?: number;
}

export interface TimerResult {
  session: WorkSession;
  notices: string[];
}

export interface StopResult {
  /** The closed session, or null when a zero-length session was discarded. */
  session: ClosedSession | null;
  notices: string[];
}

export interface IntervalOptions {
  note?: string;
}

export interface IntervalResult {
  session: ClosedSession;
  notices: string[];
}

export interface BreakResult {
  /** The running session, closed where the break began. */
  stopped: ClosedSession | null;
  /** The session opened on the same task where the break ended. */
  resumed: WorkSession | null;
  notices: string[];
}

export interface AmendSessionInput {
  startTs?: number;
  endTs?: number;
}

/**
 * How the timer reacts to a queue change. `follow` moves a running timer to
 * the new front, `in` also starts a stopped one, `out` stops it.
 */
export type ClockMode = 'follow' | 'in' | 'out';

export interface ReorderOptions extends TimeOptions {
  clock?: ClockMode;
}

export interface ReorderResult<T> {
  result: T;
  /** The running session after the change, or null when the timer is stopped. */
  session: WorkSession | null;
  notices: string[];
}

export interface ListSessionsOptions {
  taskId?: number;
}

/**
 * The global work timer. At most one session is open store-wide; the timer
 * is `running` exactly when that session exists.
 */
export class TimerService {
  constructor(
    private store: FactStore,
    private eventStore: EventStore,
    private queueService: QueueService,
    private policy: MicroSessionPolicy,
    private clock: Clock
  ) {}

  current(): WorkSession | null {
    return this.store.getOpenSession();
  }

  /** Start timing the task at the front of the queue. */
  startDefault(opts: TimeOptions = {}): TimerResult {
    return this.store.write(() => {
      const open = this.store.getOpenSession();
      if (open) {
        throw new AlreadyRunningError(open.task_id);
      }
      const queue = this.store.queuedTaskIds();
      if (queue.length === 0) {
        throw new EmptyQueueError();
      }
      const notices: string[] = [];
      const session = this.openSession(queue[0], opts.at ?? this.clock(), notices);
      return { session, notices };
    });
  }

  /**
   * Start timing `taskId`, switching away from any running task at the same
   * instant, and move it to the front of the queue.
   */
  startFor(taskId: number, opts: TimeOptions = {}): TimerResult {
    return this.store.write(() => {
      requireOpenTask(this.store, taskId);
      const at = opts.at ?? this.clock();
      const notices: string[] = [];

      const open = this.store.getOpenSession();
      if (open && open.task_id === taskId) {
        this.queueService.promoteToFront(taskId);
        return { session: open, notices };
      }
      if (open) {
        this.closeOpenSession(open, at, { discardZeroLength: true }, notices);
        this.dequeueIfWaiting(open.task_id);
      }

      this.queueService.promoteToFront(taskId);
      const session = this.openSession(taskId, at, notices);
      return { session, notices };
    });
  }

  stop(opts: TimeOptions & { discardZeroLength?: boolean } = {}): StopResult {
    return this.store.write(() => {
      const open = this.store.getOpenSession();
      if (!open) {
        throw new NotRunningError();
      }
      const notices: string[] = [];
      const session = this.closeOpenSession(
        open,
        opts.at ?? this.clock(),
        { discardZeroLength: opts.discardZeroLength ?? false },
        notices
      );
      this.dequeueIfWaiting(open.task_id);
      return { session, notices };
    });
  }

  /**
   * Apply a queue change, then keep the timer on the new front. A timer left
   * with nothing queued is stopped.
   */
  reorderQueue<T>(change: () => T, opts: ReorderOptions = {}): ReorderResult<T> {
    return this.store.write(() => {
      const mode = opts.clock ?? 'follow';
      const at = opts.at ?? this.clock();
      const open = this.store.getOpenSession();
      const result = this.queueService.deferFrontCheck(change);
      const front = this.store.queuedTaskIds()[0] ?? null;
      const notices: string[] = [];

      if (open && (mode === 'out' || front === null)) {
        this.closeOpenSession(open, at, { discardZeroLength: true }, notices);
        this.dequeueIfWaiting(open.task_id);
        return { result, session: null, notices };
      }
      if (front !== null && (open || mode === 'in')) {
        const started = this.startFor(front, { at });
        notices.push(...started.notices);
        return { result, session: started.session, notices };
      }
      return { result, session: null, notices };
    });
  }

  /**
   * Record a closed session directly. Existing sessions that overlap the
   * range are trimmed to make room.
   */
  interval(
    taskId: number,
    startTs: number,
    endTs: number,
    opts: IntervalOptions = {}
  ): IntervalResult {
    return this.store.write(() => {
      requireOpenTask(this.store, taskId);
      if (endTs <= startTs) {
        throw new NonChronologicalError(startTs, endTs);
      }
      const notices: string[] = [];
      const now = this.clock();

      const open = this.store.getOpenSession();
      if (open && open.start_ts < endTs) {
        if (open.start_ts < startTs) {
          throw new InvariantViolationError([
            `interval falls inside the running session ${open.id} on task ${open.task_id}; stop the timer first`,
          ]);
        }
        this.store.setSessionBounds(open.id, endTs, null);
        this.recordAmended(open, endTs, null, now);
        notices.push(`Running session ${open.id} on task ${open.task_id} now starts at ${endTs}`);
      }

      this.trimOverlaps(startTs, endTs, notices);
      const inserted = this.store.insertSession(taskId, startTs, endTs, 'interval', now);
      const session: ClosedSession = { ...inserted, end_ts: endTs };
      this.eventStore.append({
        task_id: taskId,
        type: EventType.SessionRecorded,
        data: { session_id: session.id, start_ts: startTs, end_ts: endTs },
        timestamp: now,
      });

      if (opts.note !== undefined) {
        this.store.insertAnnotation(taskId, session.id, opts.note, endTs);
        this.eventStore.append({
          task_id: taskId,
          type: EventType.AnnotationAdded,
          data: { note: opts.note, session_id: session.id },
          timestamp: now,
        });
      }

      return { session, notices };
    });
  }

  /**
   * Record a break over `[startTs, endTs)`. A running timer is stopped at
   * `startTs` and resumed on the same task at `endTs` (default now). With the
   * timer stopped the break is cut out of the recorded sessions instead.
   */
  takeBreak(startTs: number, endTs?: number): BreakResult {
    return this.store.write(() => {
      const now = this.clock();
      const open = this.store.getOpenSession();
      const resumeAt = endTs ?? now;
      if (resumeAt <= startTs) {
        throw new NonChronologicalError(startTs, resumeAt);
      }
      const notices: string[] = [];

      if (open) {
        const stopped = this.closeOpenSession(open, startTs, { discardZeroLength: true }, notices);
        const resumed = this.insertTimedSession(open.task_id, resumeAt);
        return { stopped, resumed, notices };
      }

      if (endTs === undefined) {
        throw new NotRunningError();
      }
      if (this.store.closedSessionsOverlapping(startTs, endTs).length === 0) {
        throw new NothingToCutError(startTs, endTs);
      }
      this.trimOverlaps(startTs, endTs, notices, 'the break');
      return { stopped: null, resumed: null, notices };
    });
  }

  /** The session of `taskId` that started last, running or not. */
  latestSession(taskId: number): WorkSession | null {
    requireTask(this.store, taskId);
    return this.store.latestSessionForTask(taskId);
  }

  sessionAnnotations(sessionId: number): Annotation[] {
    return this.store.listSessionAnnotations(sessionId);
  }

  listSessions(opts: ListSessionsOptions = {}): WorkSession[] {
    return this.store.listSessions(opts.taskId);
  }

  /** Correct the bounds of a closed session. */
  amendSession(sessionId: number, input: AmendSessionInput): ClosedSession {
    return this.store.write(() => {
      const session = requireClosedSession(this.store, sessionId);
      const startTs = input.startTs ?? session.start_ts;
      const endTs = input.endTs ?? session.end_ts;
      if (endTs <= startTs) {
        throw new NonChronologicalError(startTs, endTs);
      }

      const clashes = this.store.closedSessionsOverlapping(startTs, endTs, sessionId);
      const open = this.store.getOpenSession();
      if (open && open.start_ts < endTs) {
        clashes.push({ ...open, end_ts: endTs });
      }
      if (clashes.length > 0) {
        throw new InvariantViolationError(
          clashes.map(c => `session ${sessionId} would overlap session ${c.id} on task ${c.task_id}`)
        );
      }

      this.store.setSessionBounds(sessionId, startTs, endTs);
      this.recordAmended(session, startTs, endTs, this.clock());
      return { ...session, start_ts: startTs, end_ts: endTs };
    });
  }

  deleteSession(sessionId: number): ClosedSession {
    return this.store.write(() => {
      const session = requireClosedSession(this.store, sessionId);
      this.store.deleteSession(sessionId);
      this.eventStore.append({
        task_id: session.task_id,
        type: EventType.SessionDeleted,
        data: { session_id: sessionId, start_ts: session.start_ts, end_ts: session.end_ts },
        timestamp: this.clock(),
      });
      return session;
    });
  }

  // ---------------------------------------------------------------------------
  // Session boundaries
  // ---------------------------------------------------------------------------

  private closeOpenSession(
    open: WorkSession,
    at: number,
    opts: { discardZeroLength: boolean },
    notices: string[]
  ): ClosedSession | null {
    if (at < open.start_ts || (at === open.start_ts && !opts.discardZeroLength)) {
      throw new NonChronologicalError(open.start_ts, at);
    }

    const now = this.clock();
    if (at === open.start_ts) {
      this.store.deleteSession(open.id);
      this.eventStore.append({
        task_id: open.task_id,
        type: EventType.SessionPurged,
        data: { session_id: open.id, start_ts: open.start_ts, end_ts: at },
        timestamp: now,
      });
      notices.push(`Discarded zero-length session ${open.id} on task ${open.task_id}`);
      return null;
    }

    this.store.closeSession(open.id, at);
    const closed: ClosedSession = { ...open, end_ts: at };
    const duration = sessionDuration(closed);
    this.eventStore.append({
      task_id: open.task_id,
      type: EventType.TimerStopped,
      data: { session_id: open.id, end_ts: at, duration_secs: duration },
      timestamp: now,
    });
    if (isMicroSession(closed, this.policy)) {
      notices.push(
        `Session ${open.id} on task ${open.task_id} lasted ${duration}s, under the ${this.policy.thresholdSecs}s micro-session threshold`
      );
    }
    return closed;
  }

  /**
   * Open a session for `taskId` at `at`, first trimming later sessions and
   * applying the micro-session policy to the session that ended last, unless
   * that session's task has been retired.
   */
  private openSession(taskId: number, at: number, notices: string[]): WorkSession {
    const now = this.clock();
    this.trimOverlaps(at, null, notices);

    const previous = this.store.lastEndedSession(at);
    // The last session of a completed or cancelled task stands however short it was.
    const retired = previous !== null && this.store.getTask(previous.task_id)?.lifecycle !== Lifecycle.Open;
    const resolution: BoundaryResolution = retired
      ? { kind: 'keep' }
      : resolveBoundary(previous, taskId, at, this.policy);

    if (resolution.kind === 'merge') {
      const merged = resolution.session;
      this.store.reopenSession(merged.id);
      this.eventStore.append({
        task_id: taskId,
        type: EventType.SessionMerged,
        data: { session_id: merged.id, gap_secs: resolution.gapSecs },
        timestamp: now,
      });
      this.eventStore.append({
        task_id: taskId,
        type: EventType.TimerStarted,
        data: { session_id: merged.id, start_ts: merged.start_ts, merged: true },
        timestamp: now,
      });
      notices.push(
        `Resumed session ${merged.id} on task ${taskId} (gap of ${resolution.gapSecs}s)`
      );
      return { ...merged, end_ts: null };
    }

    if (resolution.kind === 'purge') {
      const purged = resolution.session;
      this.store.deleteSession(purged.id);
      this.eventStore.append({
        task_id: purged.task_id,
        type: EventType.SessionPurged,
        data: {
          session_id: purged.id,
          start_ts: purged.start_ts,
          end_ts: purged.end_ts,
          next_task_id: taskId,
        },
        timestamp: now,
      });
      notices.push(
        `Discarded ${resolution.durationSecs}s session ${purged.id} on task ${purged.task_id}`
      );
    }

    return this.insertTimedSession(taskId, at);
  }

  private insertTimedSession(taskId: number, at: number): WorkSession {
    const now = this.clock();
    const session = this.store.insertSession(taskId, at, null, 'timer', now);
    this.eventStore.append({
      task_id: taskId,
      type: EventType.TimerStarted,
      data: { session_id: session.id, start_ts: at, merged: false },
      timestamp: now,
    });
    return session;
  }

  /**
   * Resolve overlaps between closed sessions and `[from, to)` by truncation;
   * `to = null` is unbounded. A session that contains the range is split
   * around it. Sessions left with no duration are deleted.
   */
  private trimOverlaps(
    from: number,
    to: number | null,
    notices: string[],
    coveredBy = 'the new session'
  ): void {
    const now = this.clock();
    for (const session of this.store.closedSessionsOverlapping(from, to)) {
      if (session.start_ts < from && to !== null && session.end_ts > to) {
        this.store.setSessionBounds(session.id, session.start_ts, from);
        this.recordAmended(session, session.start_ts, from, now);
        const tail = this.store.insertSession(session.task_id, to, session.end_ts, session.origin, now);
        this.eventStore.append({
          task_id: session.task_id,
          type: EventType.SessionRecorded,
          data: { session_id: tail.id, start_ts: to, end_ts: session.end_ts, split_from: session.id },
          timestamp: now,
        });
        notices.push(
          `Session ${session.id} on task ${session.task_id} now ends at ${from}; its remainder from ${to} is session ${tail.id}`
        );
      } else if (session.start_ts < from) {
        this.store.setSessionBounds(session.id, session.start_ts, from);
        this.recordAmended(session, session.start_ts, from, now);
        notices.push(`Session ${session.id} on task ${session.task_id} now ends at ${from}`);
      } else if (to !== null && session.end_ts > to) {
        this.store.setSessionBounds(session.id, to, session.end_ts);
        this.recordAmended(session, to, session.end_ts, now);
        notices.push(`Session ${session.id} on task ${session.task_id} now starts at ${to}`);
      } else {
        this.store.deleteSession(session.id);
        this.eventStore.append({
          task_id: session.task_id,
          type: EventType.SessionDeleted,
          data: { session_id: session.id, start_ts: session.start_ts, end_ts: session.end_ts },
          timestamp: now,
        });
        notices.push(`Removed session ${session.id} on task ${session.task_id}, covered by ${coveredBy}`);
      }
    }
  }

  private recordAmended(
    session: WorkSession,
    startTs: number,
    endTs: number | null,
    ts: number
  ): void {
    this.eventStore.append({
      task_id: session.task_id,
      type: EventType.SessionAmended,
      data: {
        session_id: session.id,
        from: { start_ts: session.start_ts, end_ts: session.end_ts },
        to: { start_ts: startTs, end_ts: endTs },
      },
      timestamp: ts,
    });
  }

  /** A waiting task keeps its queue place only while it is timed. */
  private dequeueIfWaiting(taskId: number): void {
    if (this.store.getWaiting(taskId)) {
      this.queueService.unqueue(taskId);
    }
  }
}
