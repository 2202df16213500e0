import type { ClosedSession } from '../store/types.js';

/**
 * What makes a short session disposable when the next one starts on another
 * task: its own duration alone, or its duration plus a short gap before the
 * next start.
 */
export type PurgeTrigger = 'duration-and-gap' | 'duration';

export interface MicroSessionPolicy {
  /** Sessions shorter than this, and gaps shorter than this, are noise. */
  thresholdSecs: number;
  purgeTrigger: PurgeTrigger;
}

export const DEFAULT_MICRO_POLICY: MicroSessionPolicy = {
  thresholdSecs: 30,
  purgeTrigger: 'duration-and-gap',
};

export type BoundaryResolution =
  | { kind: 'merge'; session: ClosedSession; gapSecs: number }
  | { kind: 'purge'; session: ClosedSession; durationSecs: number }
  | { kind: 'keep' };

export function sessionDuration(session: ClosedSession): number {
  return session.end_ts - session.start_ts;
}

export function isMicroSession(session: ClosedSession, policy: MicroSessionPolicy): boolean {
  return sessionDuration(session) < policy.thresholdSecs;
}

/**
 * Decide what happens to the most recently ended session when a new one is
 * about to open for `nextTaskId` at `startTs`. Only timer sessions are
 * subject to the policy; backfilled intervals always stand.
 */
export function resolveBoundary(
  previous: ClosedSession | null,
  nextTaskId: number,
  startTs: number,
  policy: MicroSessionPolicy
): BoundaryResolution {
  if (!previous || previous.origin !== 'timer') {
    return { kind: 'keep' };
  }

  const gapSecs = startTs - previous.end_ts;
  if (gapSecs < 0) {
    return { kind: 'keep' };
  }

  if (previous.task_id === nextTaskId) {
    return gapSecs < policy.thresholdSecs
      ? { kind: 'merge', session: previous, gapSecs }
      : { kind: 'keep' };
  }

  const durationSecs = sessionDuration(previous);
  if (durationSecs >= policy.thresholdSecs) {
    return { kind: 'keep' };
  }
  if (policy.purgeTrigger === 'duration-and-gap' && gapSecs >= policy.thresholdSecs) {
    return { kind: 'keep' };
  }
  return { kind: 'purge', session: previous, durationSecs };
}
