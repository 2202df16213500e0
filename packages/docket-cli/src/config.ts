// packages/docket-cli/src/config.ts
import fs from 'fs';
import path from 'path';
import os from 'os';
import type { ServiceOptions } from 'docket-core';
import { CLIError, ExitCode } from './errors.js';
import { ConfigFileSchema, type Config } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// XDG Base Directory paths
// On Windows, use native paths: LOCALAPPDATA for data, APPDATA for config
function getXdgDataHome(): string {
  if (process.platform === 'win32') {
    return process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local');
  }
  return process.env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
}

function getXdgConfigHome(): string {
  if (process.platform === 'win32') {
    return process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
  }
  return process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
}

export function getDefaultDbPath(): string {
  return path.join(getXdgDataHome(), 'docket', 'data.db');
}

export function getConfigPath(): string {
  if (process.env.DOCKET_CONFIG) return process.env.DOCKET_CONFIG;
  return path.join(getXdgConfigHome(), 'docket', 'config.json');
}

function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

export type DbPathSource = 'cli' | 'env' | 'config' | 'default';

export interface ResolvedDbPath {
  path: string;
  source: DbPathSource;
}

export function resolveDbPathWithSource(cliOption?: string, configPath: string = getConfigPath()): ResolvedDbPath {
  if (cliOption) return { path: expandTilde(cliOption), source: 'cli' };
  if (process.env.DOCKET_DB) return { path: expandTilde(process.env.DOCKET_DB), source: 'env' };

  const config = readConfig(configPath);
  if (config.dbPath) return { path: expandTilde(config.dbPath), source: 'config' };

  return { path: getDefaultDbPath(), source: 'default' };
}

export function resolveDbPath(cliOption?: string, configPath: string = getConfigPath()): string {
  return resolveDbPathWithSource(cliOption, configPath).path;
}

/**
 * Read and validate the config file. A missing file is an empty config; a
 * file that is not valid JSON or does not match the schema is rejected.
 */
export function readConfig(configPath: string = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new CLIError(`Config file at ${configPath} is invalid JSON`, ExitCode.ValidationError);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CLIError(
      `Config file at ${configPath} is invalid`,
      ExitCode.ValidationError,
      undefined,
      issues
    );
  }
  return result.data;
}

/** Service options carried by the config: micro-session policy and stage overrides. */
export function serviceOptionsFromConfig(config: Config): ServiceOptions {
  return {
    micro: config.micro,
    stages: config.stages,
  };
}

export function ensureDbDirectory(dbPath: string): void {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function writeConfig(updates: Partial<Config>, configPath: string = getConfigPath()): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (e) {
      throw new Error(`Cannot write config file - directory creation failed: ${dir}`, { cause: e });
    }
  }

  let existing: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      existing = isRecord(parsed) ? parsed : {};
    } catch {
      // An unreadable config is replaced
      existing = {};
    }
  }

  // Merge and write atomically using temp file + rename
  const merged = { ...existing, ...updates };
  const tempPath = `${configPath}.tmp.${process.pid}`;
  try {
    fs.writeFileSync(tempPath, JSON.stringify(merged, null, 2) + '\n');
    fs.renameSync(tempPath, configPath);
  } catch (e) {
    fs.rmSync(tempPath, { force: true });
    throw new Error(`Cannot write config file - your database preference won't persist`, { cause: e });
  }
}
