// packages/docket-cli/src/errors.ts
import { ZodError } from 'zod';
import {
  AlreadyRunningError,
  type DomainError,
  InvariantViolationError,
  StoreUnavailableError,
  TerminalLifecycleError,
  isDomainError,
} from 'docket-core';
import { createErrorEnvelope } from './output.js';

export enum ExitCode {
  Success = 0,
  GeneralError = 1,
  InvalidUsage = 2,
  InvalidInput = 3,
  NotFound = 4,
  DatabaseError = 5,
  ValidationError = 6,
}

export class CLIError extends Error {
  public readonly exitCode: ExitCode;
  public readonly code: string;
  public readonly details?: unknown;
  public readonly suggestions?: string[];

  constructor(
    message: string,
    exitCode: ExitCode = ExitCode.GeneralError,
    code?: string,
    details?: unknown,
    suggestions?: string[]
  ) {
    super(message);
    this.exitCode = exitCode;
    this.code = code ?? codeForExitCode(exitCode);
    this.details = details;
    this.suggestions = suggestions;
    this.name = 'CLIError';
  }
}

const NOT_FOUND_CODES = new Set(['no_such_task', 'no_such_session', 'no_waiting_record', 'no_such_project']);

/** Commands that get past a domain rejection. */
export function suggestionsFor(error: DomainError): string[] {
  if (error instanceof AlreadyRunningError) {
    return ['docket off', 'docket on <taskId>'];
  }
  if (error instanceof TerminalLifecycleError) {
    return [`docket task reopen ${error.taskId}`];
  }
  if (error instanceof InvariantViolationError) {
    return error.violations.some(violation => violation.endsWith('stop the timer first'))
      ? ['docket off']
      : [];
  }
  switch (error.code) {
    case 'empty_queue':
      return ['docket queue add <taskId>', 'docket task add --queue <description>'];
    case 'not_running':
      return ['docket on'];
    case 'no_such_task':
      return ['docket task list'];
    case 'no_such_session':
      return ['docket sessions list'];
    case 'no_waiting_record':
      return ['docket externals'];
    case 'no_such_project':
      return ['docket project list --archived'];
    case 'nothing_to_cut':
      return ['docket sessions list'];
    default:
      return [];
  }
}

/**
 * Convert any error thrown by a command into a CLIError. Domain rejections
 * keep their own code; storage faults and validation failures get their own
 * exit codes so scripts can tell a user mistake from a broken store.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  if (isDomainError(error)) {
    const exitCode = NOT_FOUND_CODES.has(error.code) ? ExitCode.NotFound : ExitCode.InvalidInput;
    const details = error instanceof InvariantViolationError ? { violations: error.violations } : undefined;
    return new CLIError(error.message, exitCode, error.code, details, suggestionsFor(error));
  }

  if (error instanceof StoreUnavailableError) {
    return new CLIError(error.message, ExitCode.DatabaseError, error.code);
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new CLIError(`Invalid input: ${issues.join('; ')}`, ExitCode.ValidationError, undefined, { issues });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CLIError(message, ExitCode.GeneralError);
}

export function handleError(error: unknown, json: boolean = false): never {
  const cliError = toCLIError(error);
  if (json) {
    console.log(
      JSON.stringify(createErrorEnvelope(cliError.code, cliError.message, cliError.details, cliError.suggestions))
    );
  } else {
    console.error(`Error: ${cliError.message}`);
    if (cliError.suggestions && cliError.suggestions.length > 0) {
      for (const suggestion of cliError.suggestions) {
        console.error(`Hint: ${suggestion}`);
      }
    }
  }
  process.exit(cliError.exitCode);
}

export function codeForExitCode(exitCode: ExitCode): string {
  switch (exitCode) {
    case ExitCode.InvalidUsage:
      return 'invalid_usage';
    case ExitCode.InvalidInput:
      return 'invalid_input';
    case ExitCode.NotFound:
      return 'not_found';
    case ExitCode.DatabaseError:
      return 'database_error';
    case ExitCode.ValidationError:
      return 'validation_error';
    case ExitCode.GeneralError:
      return 'general_error';
    case ExitCode.Success:
      return 'success';
    default:
      return 'general_error';
  }
}
