import type Database from 'libsql';
import { StageTable } from '../classification/classify.js';
import type { StageRule } from '../classification/stages.js';
import { EventStore } from '../events/store.js';
import { FactStore } from '../store/fact-store.js';
import { type Clock, systemClock } from '../store/types.js';
import { HandoffService } from './handoff-service.js';
import { assertInvariants } from './invariant-guard.js';
import { DEFAULT_MICRO_POLICY, type MicroSessionPolicy } from './micro-session.js';
import { ProjectService } from './project-service.js';
import { QueueService } from './queue-service.js';
import { TaskService } from './task-service.js';
import { TimerService } from './timer-service.js';

export interface ServiceOptions {
  clock?: Clock;
  micro?: Partial<MicroSessionPolicy>;
  /** Stage rows that override the default classification table. */
  stages?: StageRule[];
}

export interface DocketServices {
  clock: Clock;
  store: FactStore;
  eventStore: EventStore;
  stageTable: StageTable;
  microPolicy: MicroSessionPolicy;
  queueService: QueueService;
  timerService: TimerService;
  handoffService: HandoffService;
  projectService: ProjectService;
  taskService: TaskService;
}

/**
 * Wire every service over one connection. All of them share the fact
 * store, so operations that call one another join a single transaction.
 */
export function createServices(db: Database.Database, options: ServiceOptions = {}): DocketServices {
  const clock = options.clock ?? systemClock;
  const microPolicy: MicroSessionPolicy = { ...DEFAULT_MICRO_POLICY, ...options.micro };
  const stageTable = new StageTable(options.stages);

  const store = new FactStore(db, assertInvariants);
  const eventStore = new EventStore(db);
  const queueService = new QueueService(store, eventStore, clock);
  const timerService = new TimerService(store, eventStore, queueService, microPolicy, clock);
  const handoffService = new HandoffService(store, eventStore, queueService, clock);
  const projectService = new ProjectService(store, eventStore, clock);
  const taskService = new TaskService(
    store,
    eventStore,
    queueService,
    timerService,
    handoffService,
    projectService,
    stageTable,
    clock
  );

  return {
    clock,
    store,
    eventStore,
    stageTable,
    microPolicy,
    queueService,
    timerService,
    handoffService,
    projectService,
    taskService,
  };
}
