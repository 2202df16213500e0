import type { StageRule, TaskFacts } from '../classification/stages.js';
import type { StageTable } from '../classification/classify.js';
import type { EventStore, PersistedEventEnvelope } from '../events/store.js';
import {
  EventType,
  Lifecycle,
  type TaskCreatedData,
  UPDATABLE_TASK_FIELDS,
  descriptionString,
  noteString,
  projectName,
  tagsArray,
  validateFieldValue,
} from '../events/types.js';
import { TerminalLifecycleError } from '../errors.js';
import type { FactStore } from '../store/fact-store.js';
import type {
  Annotation,
  Clock,
  ClosedSession,
  QueueEntry,
  Task,
  TaskFilter,
  WorkSession,
} from '../store/types.js';
import type { HandoffService } from './handoff-service.js';
import { requireTask } from './lookups.js';
import type { ProjectService } from './project-service.js';
import type { QueueService } from './queue-service.js';
import type { TimerResult, TimerService } from './timer-service.js';

export interface CreateTaskInput {
  description: string;
  project?: string;
  tags?: string[];
  due_ts?: number;
  scheduled_ts?: number;
  wait_ts?: number;
  alloc_secs?: number;
  /** Append the new task to the queue in the same transaction. */
  enqueue?: boolean;
}

export interface TaskPatch {
  description?: string;
  project?: string | null;
  tags?: string[];
  due_ts?: number | null;
  scheduled_ts?: number | null;
  wait_ts?: number | null;
  alloc_secs?: number | null;
}

export interface LifecycleOptions {
  at?: number;
}

export interface CompleteOptions extends LifecycleOptions {
  /** Start the timer on the new queue front afterwards. */
  next?: boolean;
}

export interface LifecycleResult {
  task: Task;
  /** The timed session closed on the way, if the task was being timed. */
  stopped: ClosedSession | null;
  /** The session started on the next task, for `complete` with `next`. */
  started: WorkSession | null;
  notices: string[];
}

export interface AnnotateOptions {
  at?: number;
}

export interface TaskSnapshot {
  task: Task;
  facts: TaskFacts;
  stage: StageRule;
}

export interface Snapshot {
  queue: QueueEntry[];
  running: WorkSession | null;
  tasks: TaskSnapshot[];
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Task records and lifecycle. Completing or cancelling a task retires all
 * of its queue, timer and external facts in the same transaction.
 */
export class TaskService {
  constructor(
    private store: FactStore,
    private eventStore: EventStore,
    private queueService: QueueService,
    private timerService: TimerService,
    private handoffService: HandoffService,
    private projectService: ProjectService,
    private stageTable: StageTable,
    private clock: Clock
  ) {}

  createTask(input: CreateTaskInput): Task {
    const eventData: TaskCreatedData = {
      description: descriptionString.parse(input.description),
      project: input.project === undefined ? undefined : projectName.parse(input.project),
      tags: input.tags === undefined ? undefined : tagsArray.parse(input.tags),
    };
    for (const field of ['due_ts', 'scheduled_ts', 'wait_ts', 'alloc_secs'] as const) {
      if (input[field] !== undefined) validateFieldValue(field, input[field]);
    }

    return this.store.write(() => {
      const now = this.clock();
      if (eventData.project !== undefined) {
        this.projectService.ensureProject(eventData.project);
      }
      const created = this.store.insertTask({
        description: input.description,
        project: input.project ?? null,
        tags: input.tags ?? [],
        due_ts: input.due_ts ?? null,
        scheduled_ts: input.scheduled_ts ?? null,
        wait_ts: input.wait_ts ?? null,
        alloc_secs: input.alloc_secs ?? null,
        created_ts: now,
      });

      const cleanedEventData = Object.fromEntries(
        Object.entries(eventData).filter(([, value]) => value !== undefined)
      );
      this.eventStore.append({
        task_id: created.id,
        type: EventType.TaskCreated,
        data: cleanedEventData,
        timestamp: now,
      });

      if (input.enqueue) {
        this.queueService.enqueue(created.id);
      }
      return this.requireTask(created.id);
    });
  }

  getTask(taskId: number): Task | null {
    return this.store.getTask(taskId);
  }

  requireTask(taskId: number): Task {
    return requireTask(this.store, taskId);
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    return this.store.listTasks(filter);
  }

  /** Change descriptive attributes. Allowed in every lifecycle. */
  updateTask(taskId: number, patch: TaskPatch): Task {
    return this.store.write(() => {
      const task = this.requireTask(taskId);
      const now = this.clock();

      for (const field of UPDATABLE_TASK_FIELDS) {
        const value = patch[field];
        if (value === undefined || sameValue(task[field], value)) {
          continue;
        }
        validateFieldValue(field, value);
        if (field === 'project' && typeof value === 'string') {
          this.projectService.ensureProject(value);
        }
        this.store.updateTaskField(taskId, field, value, now);
        this.eventStore.append({
          task_id: taskId,
          type: EventType.TaskUpdated,
          data: { field, old_value: task[field], new_value: value },
          timestamp: now,
        });
      }
      return this.requireTask(taskId);
    });
  }

  complete(taskId: number, opts: CompleteOptions = {}): LifecycleResult {
    return this.store.write(() => {
      const result = this.retire(taskId, Lifecycle.Closed, opts.at ?? this.clock());
      if (!opts.next) {
        return result;
      }
      if (this.store.queuedTaskIds().length === 0) {
        result.notices.push('Queue is empty; timer left idle');
        return result;
      }
      const started: TimerResult = this.timerService.startDefault({ at: opts.at ?? this.clock() });
      return {
        ...result,
        started: started.session,
        notices: [...result.notices, ...started.notices],
      };
    });
  }

  cancel(taskId: number, opts: LifecycleOptions = {}): LifecycleResult {
    return this.store.write(() => this.retire(taskId, Lifecycle.Cancelled, opts.at ?? this.clock()));
  }

  /** Return a completed or cancelled task to `open`, not queued. */
  reopen(taskId: number): Task {
    return this.store.write(() => {
      const task = this.requireTask(taskId);
      if (task.lifecycle === Lifecycle.Open) {
        return task;
      }
      const now = this.clock();
      this.store.setLifecycle(taskId, Lifecycle.Open, now);
      this.eventStore.append({
        task_id: taskId,
        type: EventType.LifecycleChanged,
        data: { from: task.lifecycle, to: Lifecycle.Open },
        timestamp: now,
      });
      return this.requireTask(taskId);
    });
  }

  /**
   * Attach a note to a task. While the task is timed, the note is linked to
   * its running session.
   */
  annotate(taskId: number, note: string, opts: AnnotateOptions = {}): Annotation {
    noteString.parse(note);
    return this.store.write(() => {
      this.requireTask(taskId);
      const at = opts.at ?? this.clock();
      const open = this.store.getOpenSession();
      const sessionId = open && open.task_id === taskId ? open.id : null;

      const annotation = this.store.insertAnnotation(taskId, sessionId, note, at);
      this.eventStore.append({
        task_id: taskId,
        type: EventType.AnnotationAdded,
        data: sessionId === null ? { note } : { note, session_id: sessionId },
        timestamp: at,
      });
      return annotation;
    });
  }

  listAnnotations(taskId: number): Annotation[] {
    this.requireTask(taskId);
    return this.store.listAnnotations(taskId);
  }

  facts(taskId: number): TaskFacts {
    return this.factsOf(this.requireTask(taskId));
  }

  classify(taskId: number): string {
    return this.stageTable.resolve(this.facts(taskId)).stage;
  }

  stage(taskId: number): StageRule {
    return this.stageTable.resolve(this.facts(taskId));
  }

  /**
   * The queue, the running session, and every open task with its derived
   * facts and stage, ordered by stage then queue position.
   */
  snapshot(): Snapshot {
    const tasks = this.store.listTasks({ lifecycle: Lifecycle.Open }).map(task => {
      const facts = this.factsOf(task);
      return { task, facts, stage: this.stageTable.resolve(facts) };
    });

    tasks.sort(
      (a, b) =>
        a.stage.sortOrder - b.stage.sortOrder ||
        (a.task.queue_position ?? Number.MAX_SAFE_INTEGER) -
          (b.task.queue_position ?? Number.MAX_SAFE_INTEGER) ||
        a.task.id - b.task.id
    );

    return {
      queue: this.store.queue(),
      running: this.store.getOpenSession(),
      tasks,
    };
  }

  history(taskId: number): PersistedEventEnvelope[] {
    this.requireTask(taskId);
    return this.eventStore.getByTaskId(taskId);
  }

  private factsOf(task: Task): TaskFacts {
    return {
      lifecycle: task.lifecycle,
      timerOn: this.store.getOpenSession()?.task_id === task.id,
      waiting: this.store.getWaiting(task.id) !== null,
      queued: task.queue_position !== null,
      history: this.store.countSessions(task.id) > 0,
    };
  }

  private retire(taskId: number, to: Lifecycle, at: number): LifecycleResult {
    const task = this.requireTask(taskId);
    if (task.lifecycle !== Lifecycle.Open) {
      throw new TerminalLifecycleError(taskId, task.lifecycle);
    }

    let stopped: ClosedSession | null = null;
    const notices: string[] = [];
    if (this.timerService.current()?.task_id === taskId) {
      const stop = this.timerService.stop({ at, discardZeroLength: true });
      stopped = stop.session;
      notices.push(...stop.notices);
    }

    this.queueService.unqueue(taskId);
    this.handoffService.collect(taskId, at);

    this.store.setLifecycle(taskId, to, at);
    this.eventStore.append({
      task_id: taskId,
      type: EventType.LifecycleChanged,
      data: { from: task.lifecycle, to },
      timestamp: at,
    });

    return { task: this.requireTask(taskId), stopped, started: null, notices };
  }
}
