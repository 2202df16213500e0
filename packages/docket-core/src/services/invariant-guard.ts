import { InvariantViolationError } from '../errors.js';
import { Lifecycle } from '../events/types.js';
import type { StoreState } from '../store/fact-store.js';

/**
 * Every invariant the store state breaks, as human-readable messages.
 * An empty list means the state may be committed.
 */
export function findViolations(state: StoreState): string[] {
  const violations: string[] = [];

  // Global timer exclusivity
  if (state.openSessions.length > 1) {
    const ids = state.openSessions.map(s => s.id).join(', ');
    violations.push(`more than one open session (${ids})`);
  }

  // Dense queue ordinals
  state.queue.forEach((entry, index) => {
    if (entry.queue_position !== index) {
      violations.push(
        `queue positions are not contiguous: task ${entry.task_id} is at ${entry.queue_position}, expected ${index}`
      );
    }
  });

  const positionOf = new Map(state.queue.map(entry => [entry.task_id, entry.queue_position]));
  const timed = new Set(state.openSessions.map(s => s.task_id));

  for (const session of state.openSessions) {
    const position = positionOf.get(session.task_id);
    if (position !== 0) {
      violations.push(
        position === undefined
          ? `task ${session.task_id} is timed but not queued`
          : `task ${session.task_id} is timed but at queue position ${position}, not the front`
      );
    }
    if (session.lifecycle !== Lifecycle.Open) {
      violations.push(`task ${session.task_id} is ${session.lifecycle} but its timer is running`);
    }
  }

  for (const record of state.waiting) {
    if (!timed.has(record.task_id) && positionOf.has(record.task_id)) {
      violations.push(`task ${record.task_id} is waiting on ${record.recipient} but still queued`);
    }
    if (record.lifecycle !== Lifecycle.Open) {
      violations.push(`task ${record.task_id} is ${record.lifecycle} but still waiting on ${record.recipient}`);
    }
  }

  for (const entry of state.queue) {
    if (entry.lifecycle !== Lifecycle.Open) {
      violations.push(`task ${entry.task_id} is ${entry.lifecycle} but still queued`);
    }
  }

  for (const session of state.invalidSessions) {
    violations.push(
      `session ${session.id} ends at or before it starts (${session.start_ts} to ${session.end_ts})`
    );
  }

  return violations;
}

/**
 * Commit check for the fact store: rejects the transaction when any
 * invariant is broken.
 */
export function assertInvariants(state: StoreState): void {
  const violations = findViolations(state);
  if (violations.length > 0) {
    throw new InvariantViolationError(violations);
  }
}
