/**
 * Docket Core - a personal work queue with a global timer and an external
 * handoff lane.
 *
 * This module provides the fact store, the invariant guard, and the queue,
 * timer, handoff and task services built on them, plus the pure stage
 * classification.
 *
 * @packageDocumentation
 */

// ============================================================================
// Database
// ============================================================================

export { createConnection, MEMORY_DB } from './db/connection.js';

export { withWriteTransaction, translateStoreError } from './db/transaction.js';

export {
  runMigrations,
  runMigrationsWithRollback,
  MIGRATIONS,
  MigrationError,
  type Migration,
  type MigrationResult,
} from './db/migrations.js';

// ============================================================================
// Errors
// ============================================================================

export {
  DomainError,
  InvariantViolationError,
  EmptyQueueError,
  AlreadyRunningError,
  NotRunningError,
  TaskNotFoundError,
  SessionNotFoundError,
  NoWaitingRecordError,
  TerminalLifecycleError,
  NonChronologicalError,
  ProjectNotFoundError,
  ProjectExistsError,
  NothingToCutError,
  StoreUnavailableError,
  isDomainError,
  type DomainErrorCode,
} from './errors.js';

// ============================================================================
// Events
// ============================================================================

export {
  EventStore,
  type AppendEventInput,
  type PersistedEventEnvelope,
  type GetByTaskIdOptions,
} from './events/store.js';

export {
  EventType,
  Lifecycle,
  PROJECT_EVENT_TASK_ID,
  validateEventData,
  EventSchemas,
  FIELD_LIMITS,
  UPDATABLE_TASK_FIELDS,
  type UpdatableTaskField,
  type EventEnvelope,
} from './events/types.js';

// ============================================================================
// Store
// ============================================================================

export { FactStore, type StoreState, type CommitCheck, type NewTask } from './store/fact-store.js';

export {
  systemClock,
  isClosed,
  type Clock,
  type Task,
  type WorkSession,
  type ClosedSession,
  type SessionOrigin,
  type ExternalRecord,
  type ExternalStatus,
  type Annotation,
  type Project,
  type ProjectSummary,
  type QueueEntry,
  type TaskFilter,
} from './store/types.js';

// ============================================================================
// Classification
// ============================================================================

export {
  Tier,
  Stage,
  StageRuleSchema,
  DEFAULT_STAGE_RULES,
  StageTable,
  DEFAULT_STAGE_TABLE,
  classify,
  tierOf,
  type StageRule,
  type TaskFacts,
} from './classification/index.js';

// ============================================================================
// Services
// ============================================================================

export { findViolations, assertInvariants } from './services/invariant-guard.js';

export {
  DEFAULT_MICRO_POLICY,
  resolveBoundary,
  sessionDuration,
  isMicroSession,
  type MicroSessionPolicy,
  type PurgeTrigger,
  type BoundaryResolution,
} from './services/micro-session.js';

export { QueueService, type RemoveTarget } from './services/queue-service.js';

export {
  TimerService,
  type TimeOptions,
  type TimerResult,
  type StopResult,
  type IntervalOptions,
  type IntervalResult,
  type BreakResult,
  type AmendSessionInput,
  type ListSessionsOptions,
  type ClockMode,
  type ReorderOptions,
  type ReorderResult,
} from './services/timer-service.js';

export {
  HandoffService,
  type SendOptions,
  type RecallOptions,
  type RecallResult,
  type ListWaitingOptions,
} from './services/handoff-service.js';

export {
  ProjectService,
  type ListProjectsOptions,
  type RenameResult,
} from './services/project-service.js';

export {
  TaskService,
  type CreateTaskInput,
  type TaskPatch,
  type LifecycleOptions,
  type CompleteOptions,
  type LifecycleResult,
  type AnnotateOptions,
  type TaskSnapshot,
  type Snapshot,
} from './services/task-service.js';

export {
  createServices,
  type ServiceOptions,
  type DocketServices,
} from './services/container.js';

// ============================================================================
// Utilities
// ============================================================================

export { newEventId, isEventId } from './utils/id.js';
