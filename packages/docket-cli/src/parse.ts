import { Lifecycle } from 'docket-core';
import { CLIError, ExitCode } from './errors.js';

interface IntBounds {
  min?: number;
  max?: number;
}

export const LIFECYCLES: readonly Lifecycle[] = Object.values(Lifecycle);

function formatRange(bounds: IntBounds): string {
  if (bounds.min !== undefined && bounds.max !== undefined) {
    return `an integer between ${bounds.min} and ${bounds.max}`;
  }
  if (bounds.min !== undefined) {
    return `an integer >= ${bounds.min}`;
  }
  if (bounds.max !== undefined) {
    return `an integer <= ${bounds.max}`;
  }
  return 'an integer';
}

export function parseInteger(
  raw: string | number,
  fieldName: string,
  bounds: IntBounds = {}
): number {
  let value: number;

  if (typeof raw === 'number') {
    value = raw;
  } else {
    const trimmed = raw.trim();
    if (!/^-?\d+$/.test(trimmed)) {
      throw new CLIError(`${fieldName} must be an integer`, ExitCode.InvalidInput);
    }
    value = Number(trimmed);
  }

  if (!Number.isInteger(value)) {
    throw new CLIError(`${fieldName} must be an integer`, ExitCode.InvalidInput);
  }

  if (bounds.min !== undefined && value < bounds.min) {
    throw new CLIError(`${fieldName} must be ${formatRange(bounds)}`, ExitCode.InvalidInput);
  }

  if (bounds.max !== undefined && value > bounds.max) {
    throw new CLIError(`${fieldName} must be ${formatRange(bounds)}`, ExitCode.InvalidInput);
  }

  return value;
}

export function parseOptionalInteger(
  raw: string | number | undefined,
  fieldName: string,
  bounds: IntBounds = {}
): number | undefined {
  if (raw === undefined) return undefined;
  return parseInteger(raw, fieldName, bounds);
}

export function parseIntegerWithDefault(
  raw: string | number | undefined,
  fieldName: string,
  defaultValue: number,
  bounds: IntBounds = {}
): number {
  if (raw === undefined) return parseInteger(defaultValue, fieldName, bounds);
  return parseInteger(raw, fieldName, bounds);
}

export function parseTaskId(raw: string, fieldName = 'Task ID'): number {
  return parseInteger(raw, fieldName, { min: 1 });
}

export function parseEnumValue<T extends string>(
  raw: string | undefined,
  fieldName: string,
  allowed: readonly T[]
): T | undefined {
  if (raw === undefined) return undefined;
  const match = allowed.find(value => value === raw);
  if (match === undefined) {
    throw new CLIError(
      `Invalid ${fieldName}: ${raw}. Must be one of: ${allowed.join(', ')}`,
      ExitCode.InvalidInput
    );
  }
  return match;
}

export function parseLifecycle(raw: string | undefined, fieldName = 'lifecycle'): Lifecycle | undefined {
  return parseEnumValue(raw, fieldName, LIFECYCLES);
}

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86_400 };
const DURATION_PATTERN = /^(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;

/** Seconds from either a bare integer or a compact form such as `1h30m`. */
export function parseDuration(raw: string, fieldName: string): number {
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const match = DURATION_PATTERN.exec(trimmed);
  if (!match || trimmed === '') {
    throw new CLIError(`${fieldName} must be seconds or a duration such as 1h30m`, ExitCode.InvalidInput);
  }
  const [, d, h, m, s] = match;
  return (
    Number(d ?? 0) * UNIT_SECONDS.d +
    Number(h ?? 0) * UNIT_SECONDS.h +
    Number(m ?? 0) * UNIT_SECONDS.m +
    Number(s ?? 0) * UNIT_SECONDS.s
  );
}

/**
 * Epoch seconds from `now`, a signed offset from now (`-15m`, `+1h`, `-90`
 * for seconds), bare epoch seconds, or an ISO 8601 date or time.
 */
export function parseTimestamp(raw: string, fieldName: string, now: number): number {
  const trimmed = raw.trim();
  if (trimmed === 'now') {
    return now;
  }

  const offset = /^([+-])(.+)$/.exec(trimmed);
  if (offset) {
    const secs = parseDuration(offset[2], fieldName);
    return offset[1] === '-' ? now - secs : now + secs;
  }

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) {
    throw new CLIError(
      `${fieldName} must be epoch seconds, an ISO 8601 time, now, or an offset such as -15m`,
      ExitCode.InvalidInput
    );
  }
  return Math.floor(ms / 1000);
}

export function parseOptionalTimestamp(raw: string | undefined, fieldName: string, now: number): number | undefined {
  if (raw === undefined) return undefined;
  return parseTimestamp(raw, fieldName, now);
}

export interface TimeRange {
  start: number;
  end?: number;
}

/** A single time, or `<start>..<end>`. */
export function parseTimeRange(raw: string, now: number): TimeRange {
  const parts = raw.split('..');
  if (parts.length > 2 || parts.some(part => part.trim() === '')) {
    throw new CLIError('Time must be <time> or <start>..<end>', ExitCode.InvalidInput);
  }
  const start = parseTimestamp(parts[0], 'Start', now);
  if (parts.length === 1) {
    return { start };
  }
  return { start, end: parseTimestamp(parts[1], 'End', now) };
}

export function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
