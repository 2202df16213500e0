/**
 * Domain errors. Every `DomainError` is a recoverable, user-facing rejection:
 * the transaction that raised it is rolled back and nothing is committed.
 * Storage faults are reported separately through `StoreUnavailableError`.
 */

export type DomainErrorCode =
  | 'invariant_violation'
  | 'empty_queue'
  | 'already_running'
  | 'not_running'
  | 'no_such_task'
  | 'no_such_session'
  | 'no_waiting_record'
  | 'terminal_lifecycle'
  | 'non_chronological'
  | 'no_such_project'
  | 'project_exists'
  | 'nothing_to_cut';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
}

export class InvariantViolationError extends DomainError {
  readonly code = 'invariant_violation';

  constructor(public readonly violations: string[]) {
    super(
      violations.length === 1
        ? `Invariant violation: ${violations[0]}`
        : `Invariant violations: ${violations.join('; ')}`
    );
    this.name = 'InvariantViolationError';
  }
}

export class EmptyQueueError extends DomainError {
  readonly code = 'empty_queue';

  constructor() {
    super('Queue is empty');
    this.name = 'EmptyQueueError';
  }
}

export class AlreadyRunningError extends DomainError {
  readonly code = 'already_running';

  constructor(public readonly taskId: number) {
    super(`Timer is already running on task ${taskId}`);
    this.name = 'AlreadyRunningError';
  }
}

export class NotRunningError extends DomainError {
  readonly code = 'not_running';

  constructor() {
    super('Timer is not running');
    this.name = 'NotRunningError';
  }
}

export class TaskNotFoundError extends DomainError {
  readonly code = 'no_such_task';

  constructor(public readonly taskId: number) {
    super(`Task not found: ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

export class SessionNotFoundError extends DomainError {
  readonly code = 'no_such_session';

  constructor(public readonly sessionId: number) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class NoWaitingRecordError extends DomainError {
  readonly code = 'no_waiting_record';

  constructor(public readonly taskId: number) {
    super(`Task ${taskId} is not waiting on anyone`);
    this.name = 'NoWaitingRecordError';
  }
}

export class TerminalLifecycleError extends DomainError {
  readonly code = 'terminal_lifecycle';

  constructor(
    public readonly taskId: number,
    public readonly lifecycle: string
  ) {
    super(`Task ${taskId} is ${lifecycle}`);
    this.name = 'TerminalLifecycleError';
  }
}

export class NonChronologicalError extends DomainError {
  readonly code = 'non_chronological';

  constructor(
    public readonly startTs: number,
    public readonly endTs: number
  ) {
    super(`Session must end after it starts (start ${startTs}, end ${endTs})`);
    this.name = 'NonChronologicalError';
  }
}

export class ProjectNotFoundError extends DomainError {
  readonly code = 'no_such_project';

  constructor(public readonly projectName: string) {
    super(`Project '${projectName}' not found`);
    this.name = 'ProjectNotFoundError';
  }
}

export class ProjectExistsError extends DomainError {
  readonly code = 'project_exists';

  constructor(public readonly projectName: string) {
    super(`Project '${projectName}' already exists`);
    this.name = 'ProjectExistsError';
  }
}

/** A break was taken out of history where no session was recorded. */
export class NothingToCutError extends DomainError {
  readonly code = 'nothing_to_cut';

  constructor(
    public readonly startTs: number,
    public readonly endTs: number
  ) {
    super(`No sessions found overlapping ${startTs}..${endTs}`);
    this.name = 'NothingToCutError';
  }
}

/**
 * The store could not complete a transaction for reasons unrelated to the
 * request: I/O failure, corruption, a lock that never cleared.
 */
export class StoreUnavailableError extends Error {
  readonly code = 'store_unavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Store unavailable: ${message}`, options);
    this.name = 'StoreUnavailableError';
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
