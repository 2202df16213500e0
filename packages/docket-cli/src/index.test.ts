import { describe, it, expect } from 'vitest';
import {
  ExitCode,
  buildUsageError,
  createProgram,
  editDistance,
  parseRequestedFormat,
  pickUniqueBestMatch,
} from './index.js';

describe('createProgram', () => {
  it('registers the top-level commands', () => {
    expect(createProgram().commands.map(command => command.name())).toEqual([
      'init',
      'which-db',
      'task',
      'project',
      'queue',
      'on',
      'off',
      'offon',
      'onoff',
      'sessions',
      'send',
      'recall',
      'externals',
      'status',
      'stages',
    ]);
  });

  it('registers the queue subcommands', () => {
    const queue = createProgram().commands.find(command => command.name() === 'queue');
    expect(queue?.commands.map(command => command.name())).toEqual([
      'list',
      'add',
      'pick',
      'roll',
      'drop',
      'move',
      'clear',
    ]);
  });
});

describe('parseRequestedFormat', () => {
  it('finds --format in either spelling', () => {
    expect(parseRequestedFormat(['status', '--format', 'json'])).toBe('json');
    expect(parseRequestedFormat(['--format=json', 'status'])).toBe('json');
    expect(parseRequestedFormat(['status', '--format', 'md'])).toBe('md');
    expect(parseRequestedFormat(['status'])).toBe('md');
  });
});

describe('suggestions', () => {
  it('computes edit distance', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('same', 'same')).toBe(0);
  });

  it('prefers a unique prefix match', () => {
    expect(pickUniqueBestMatch('ext', ['externals', 'status'])).toBe('externals');
  });

  it('gives up on ambiguous prefixes and short tokens', () => {
    expect(pickUniqueBestMatch('s', ['send', 'status'])).toBeNull();
    expect(pickUniqueBestMatch('st', ['status', 'stages'])).toBeNull();
  });

  it('falls back to the single closest candidate', () => {
    expect(pickUniqueBestMatch('statsu', ['status', 'stages', 'send'])).toBe('status');
    expect(pickUniqueBestMatch('zzzzzz', ['status', 'stages'])).toBeNull();
  });
});

describe('buildUsageError', () => {
  it('suggests the closest subcommand', () => {
    const error = buildUsageError(['queue', 'pcik'], createProgram(), "error: unknown command 'pcik'");

    expect(error.exitCode).toBe(ExitCode.InvalidUsage);
    expect(error.code).toBe('invalid_usage');
    expect(error.message).toBe("Unknown command 'pcik'");
    expect(error.details).toEqual({
      received: 'docket queue pcik',
      reason: "Unknown command 'pcik'.",
      did_you_mean: ['pick'],
      examples: ['docket queue pick --help'],
    });
  });

  it('skips option values when locating the subcommand', () => {
    const error = buildUsageError(
      ['--db', 'work.db', 'queue', 'pcik'],
      createProgram(),
      "error: unknown command 'pcik'"
    );

    expect(error.details).toMatchObject({
      did_you_mean: ['pick'],
      examples: ['docket queue pick --help'],
    });
  });

  it('suggests the closest long option, including global ones', () => {
    const error = buildUsageError(
      ['status', '--formt', 'json'],
      createProgram(),
      "error: unknown option '--formt'"
    );

    expect(error.details).toEqual({
      received: 'docket status --formt json',
      reason: "Unknown option '--formt'.",
      did_you_mean: ['--format'],
      examples: ['docket status --help'],
    });
  });

  it('names the missing argument', () => {
    const error = buildUsageError(['send', '3'], createProgram(), "error: missing required argument 'recipient'");

    expect(error.message).toBe("Missing required argument 'recipient'");
    expect(error.details).toEqual({
      received: 'docket send 3',
      reason: "Required argument 'recipient' is missing.",
      examples: ['docket send --help'],
    });
  });

  it('passes other commander messages through', () => {
    const error = buildUsageError(['on'], createProgram(), 'error: too many arguments');
    expect(error.message).toBe('too many arguments');
    expect(error.details).toEqual({
      received: 'docket on',
      reason: 'too many arguments',
      examples: ['docket --help'],
    });
  });
});
