import { describe, it, expect } from 'vitest';
import type { ClosedSession } from '../store/types.js';
import {
  DEFAULT_MICRO_POLICY,
  isMicroSession,
  resolveBoundary,
  sessionDuration,
  type MicroSessionPolicy,
} from './micro-session.js';

function closed(taskId: number, start: number, end: number, origin: 'timer' | 'interval' = 'timer'): ClosedSession {
  return { id: 1, task_id: taskId, start_ts: start, end_ts: end, origin, created_ts: start };
}

const durationOnly: MicroSessionPolicy = { thresholdSecs: 30, purgeTrigger: 'duration' };

describe('resolveBoundary', () => {
  it('keeps when there is no previous session', () => {
    expect(resolveBoundary(null, 1, 100, DEFAULT_MICRO_POLICY)).toEqual({ kind: 'keep' });
  });

  it('merges the same task inside the window', () => {
    const previous = closed(1, 0, 100);
    expect(resolveBoundary(previous, 1, 129, DEFAULT_MICRO_POLICY)).toEqual({
      kind: 'merge',
      session: previous,
      gapSecs: 29,
    });
  });

  it('keeps the same task once the gap reaches the threshold', () => {
    expect(resolveBoundary(closed(1, 0, 100), 1, 130, DEFAULT_MICRO_POLICY)).toEqual({ kind: 'keep' });
  });

  it('merges even a long session on the same task', () => {
    expect(resolveBoundary(closed(1, 0, 3600), 1, 3600, DEFAULT_MICRO_POLICY).kind).toBe('merge');
  });

  it('purges a short session of another task inside the window', () => {
    const previous = closed(1, 100, 110);
    expect(resolveBoundary(previous, 2, 120, DEFAULT_MICRO_POLICY)).toEqual({
      kind: 'purge',
      session: previous,
      durationSecs: 10,
    });
  });

  it('keeps a short session when the gap is long under duration-and-gap', () => {
    expect(resolveBoundary(closed(1, 100, 110), 2, 140, DEFAULT_MICRO_POLICY)).toEqual({ kind: 'keep' });
  });

  it('purges a short session regardless of the gap under duration', () => {
    expect(resolveBoundary(closed(1, 100, 110), 2, 10_000, durationOnly).kind).toBe('purge');
  });

  it('keeps sessions at or over the threshold', () => {
    expect(resolveBoundary(closed(1, 100, 130), 2, 130, DEFAULT_MICRO_POLICY)).toEqual({ kind: 'keep' });
    expect(resolveBoundary(closed(1, 100, 130), 2, 130, durationOnly)).toEqual({ kind: 'keep' });
  });

  it('ignores interval sessions', () => {
    expect(resolveBoundary(closed(1, 100, 105, 'interval'), 2, 106, DEFAULT_MICRO_POLICY)).toEqual({ kind: 'keep' });
    expect(resolveBoundary(closed(1, 100, 105, 'interval'), 1, 106, DEFAULT_MICRO_POLICY)).toEqual({ kind: 'keep' });
  });

  it('keeps when the new start lies before the end', () => {
    expect(resolveBoundary(closed(1, 100, 110), 1, 105, DEFAULT_MICRO_POLICY)).toEqual({ kind: 'keep' });
  });
});

describe('isMicroSession', () => {
  it('compares the duration with the threshold', () => {
    expect(sessionDuration(closed(1, 10, 39))).toBe(29);
    expect(isMicroSession(closed(1, 10, 39), DEFAULT_MICRO_POLICY)).toBe(true);
    expect(isMicroSession(closed(1, 10, 40), DEFAULT_MICRO_POLICY)).toBe(false);
  });
});
