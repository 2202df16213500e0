// packages/docket-cli/src/commands/init.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { createInitCommand, runInit } from './init.js';
import { CLIError, ExitCode } from '../errors.js';

describe('docket init command', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docket-init-test-'));
    configPath = path.join(testDir, 'config.json');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('creates the database and records an explicit path', () => {
    const dbPath = path.join(testDir, 'nested', 'data.db');

    const result = runInit({ dbPath, pathSource: 'cli', json: false, configPath });

    expect(result).toEqual({ dbPath, created: true, source: 'cli' });
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(JSON.parse(fs.readFileSync(configPath, 'utf-8'))).toEqual({ dbPath });
    expect(console.log).toHaveBeenCalledWith(`✓ Initialized new database at ${dbPath} (from --db flag)`);
  });

  it('is idempotent for an existing database', () => {
    const dbPath = path.join(testDir, 'data.db');
    runInit({ dbPath, pathSource: 'cli', json: false, configPath });

    const result = runInit({ dbPath, pathSource: 'cli', json: false, configPath });

    expect(result.created).toBe(false);
  });

  it('does not write config for a default path', () => {
    const dbPath = path.join(testDir, 'data.db');

    runInit({ dbPath, pathSource: 'default', json: false, configPath });

    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('refuses to repoint an existing config', () => {
    fs.writeFileSync(configPath, JSON.stringify({ dbPath: '/elsewhere/data.db' }));

    let caught: unknown;
    try {
      runInit({ dbPath: path.join(testDir, 'data.db'), pathSource: 'cli', json: false, configPath });
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(CLIError);
    expect(caught).toMatchObject({
      exitCode: ExitCode.InvalidInput,
      suggestions: ['docket init --reset-config', 'docket --db <path> init'],
    });
  });

  it('drops dbPath from config on reset and keeps other settings', () => {
    fs.writeFileSync(configPath, JSON.stringify({ dbPath: '/elsewhere/data.db', micro: { thresholdSecs: 45 } }));

    runInit({
      dbPath: path.join(testDir, 'data.db'),
      pathSource: 'default',
      json: false,
      configPath,
      resetConfig: true,
    });

    expect(JSON.parse(fs.readFileSync(configPath, 'utf-8'))).toEqual({ micro: { thresholdSecs: 45 } });
  });

  it('registers --reset-config', () => {
    const flags = createInitCommand().options.map(option => option.long);
    expect(flags).toEqual(['--reset-config']);
  });
});
