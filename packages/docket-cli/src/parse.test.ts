import { describe, it, expect } from 'vitest';
import { Lifecycle } from 'docket-core';
import {
  parseDuration,
  parseEnumValue,
  parseInteger,
  parseIntegerWithDefault,
  parseLifecycle,
  parseList,
  parseOptionalInteger,
  parseTaskId,
  parseTimeRange,
  parseTimestamp,
} from './parse.js';

const NOW = 1_767_225_600;

describe('parseInteger', () => {
  it('parses integer strings', () => {
    expect(parseInteger('42', 'Index')).toBe(42);
    expect(parseInteger('-3', 'Count')).toBe(-3);
  });

  it('rejects non-integers', () => {
    expect(() => parseInteger('4.2', 'Index')).toThrow(/must be an integer/);
    expect(() => parseInteger('abc', 'Index')).toThrow(/must be an integer/);
  });

  it('applies bounds', () => {
    expect(() => parseInteger('-1', 'Position', { min: 0 })).toThrow('Position must be an integer >= 0');
    expect(() => parseInteger('4', 'N', { min: 0, max: 3 })).toThrow(/between 0 and 3/);
  });
});

describe('parseOptionalInteger and parseIntegerWithDefault', () => {
  it('returns undefined for missing values', () => {
    expect(parseOptionalInteger(undefined, 'Position')).toBeUndefined();
  });

  it('uses the default when undefined', () => {
    expect(parseIntegerWithDefault(undefined, 'Count', 1)).toBe(1);
    expect(parseIntegerWithDefault('3', 'Count', 1)).toBe(3);
  });
});

describe('parseTaskId', () => {
  it('requires a positive integer', () => {
    expect(parseTaskId('12')).toBe(12);
    expect(() => parseTaskId('0')).toThrow('Task ID must be an integer >= 1');
  });
});

describe('parseEnumValue and parseLifecycle', () => {
  it('parses allowed values', () => {
    expect(parseEnumValue('a', 'mode', ['a', 'b'])).toBe('a');
    expect(parseLifecycle('closed')).toBe(Lifecycle.Closed);
  });

  it('rejects unknown values', () => {
    expect(() => parseLifecycle('done')).toThrow('Invalid lifecycle: done. Must be one of: open, closed, cancelled');
  });
});

describe('parseDuration', () => {
  it('parses bare seconds and compound units', () => {
    expect(parseDuration('90', 'Alloc')).toBe(90);
    expect(parseDuration('1h30m', 'Alloc')).toBe(5400);
    expect(parseDuration('1d2h3m4s', 'Alloc')).toBe(93_784);
  });

  it('rejects other text', () => {
    expect(() => parseDuration('soon', 'Alloc')).toThrow(/Alloc must be seconds/);
    expect(() => parseDuration('', 'Alloc')).toThrow(/Alloc must be seconds/);
  });
});

describe('parseTimestamp', () => {
  it('accepts now, offsets and epoch seconds', () => {
    expect(parseTimestamp('now', 'At', NOW)).toBe(NOW);
    expect(parseTimestamp('-15m', 'At', NOW)).toBe(NOW - 900);
    expect(parseTimestamp('+2h', 'At', NOW)).toBe(NOW + 7200);
    expect(parseTimestamp('-90', 'At', NOW)).toBe(NOW - 90);
    expect(parseTimestamp('1700000000', 'At', NOW)).toBe(1_700_000_000);
  });

  it('accepts ISO 8601 times', () => {
    expect(parseTimestamp('2026-01-01T00:30:00Z', 'At', NOW)).toBe(NOW + 1800);
  });

  it('rejects anything else', () => {
    expect(() => parseTimestamp('yesterday', 'At', NOW)).toThrow(/At must be epoch seconds/);
  });
});

describe('parseTimeRange', () => {
  it('reads a single time or a start..end pair', () => {
    expect(parseTimeRange('-10m', NOW)).toEqual({ start: NOW - 600 });
    expect(parseTimeRange('-30m..-10m', NOW)).toEqual({ start: NOW - 1800, end: NOW - 600 });
    expect(parseTimeRange('2026-01-01T00:30:00Z..now', NOW)).toEqual({ start: NOW + 1800, end: NOW });
  });

  it('rejects an open-ended or chained range', () => {
    expect(() => parseTimeRange('-30m..', NOW)).toThrow('Time must be <time> or <start>..<end>');
    expect(() => parseTimeRange('1..2..3', NOW)).toThrow('Time must be <time> or <start>..<end>');
  });

  it('names the side that failed to parse', () => {
    expect(() => parseTimeRange('now..later', NOW)).toThrow(/^End must be epoch seconds/);
  });
});

describe('parseList', () => {
  it('splits and trims, dropping empty items', () => {
    expect(parseList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
    expect(parseList(undefined)).toBeUndefined();
  });
});
