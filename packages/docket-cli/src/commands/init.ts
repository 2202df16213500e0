import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { createConnection } from 'docket-core';
import {
  resolveDbPathWithSource,
  getDefaultDbPath,
  ensureDbDirectory,
  writeConfig,
  readConfig,
  getConfigPath,
  type DbPathSource,
} from '../config.js';
import { CLIError, ExitCode, handleError } from '../errors.js';
import { printJson } from '../output.js';
import { parseGlobalOptions } from '../db.js';

export interface InitResult {
  dbPath: string;
  created: boolean;
  source: DbPathSource;
}

export interface InitOptions {
  dbPath: string;
  pathSource: DbPathSource;
  json: boolean;
  configPath?: string;
  /** Point the config back at the default database location (non-destructive) */
  resetConfig?: boolean;
}

function formatSourceHint(source: DbPathSource): string {
  switch (source) {
    case 'cli': return `(from --db flag)`;
    case 'env': return `(from DOCKET_DB env var)`;
    case 'config': return `(from existing config)`;
    case 'default': return `(default location)`;
    default: {
      const _exhaustive: never = source;
      return _exhaustive;
    }
  }
}

export function runInit(options: InitOptions): InitResult {
  const { dbPath, pathSource, json, configPath = getConfigPath(), resetConfig = false } = options;

  const existingConfig = readConfig(configPath);
  if (existingConfig.dbPath && existingConfig.dbPath !== dbPath && !resetConfig) {
    throw new CLIError(
      `Config already points to: ${existingConfig.dbPath}`,
      ExitCode.InvalidInput,
      undefined,
      undefined,
      ['docket init --reset-config', 'docket --db <path> init']
    );
  }

  const existed = fs.existsSync(dbPath);
  ensureDbDirectory(dbPath);
  createConnection(dbPath).close();

  // Only persist dbPath if explicitly specified via --db flag
  if (pathSource === 'cli') {
    writeConfig({ dbPath }, configPath);
  } else if (resetConfig && existingConfig.dbPath) {
    const { dbPath: _dropped, ...rest } = existingConfig;
    fs.writeFileSync(configPath, JSON.stringify(rest, null, 2) + '\n');
  }

  const result: InitResult = { dbPath, created: !existed, source: pathSource };

  if (json) {
    printJson(result);
  } else {
    const sourceHint = formatSourceHint(pathSource);
    const message = result.created
      ? `Initialized new database at ${result.dbPath} ${sourceHint}`
      : `Database already exists at ${result.dbPath} ${sourceHint}`;
    console.log(`✓ ${message}`);
  }

  return result;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Initialize a new docket database')
    .option('-r, --reset-config', 'Reset config to default database location (non-destructive)')
    .action(function (this: Command) {
      const globalOpts = parseGlobalOptions(this);
      try {
        const opts = z.object({ resetConfig: z.boolean().optional() }).parse(this.opts());
        let dbPath: string;
        let pathSource: DbPathSource;

        if (globalOpts.db) {
          dbPath = path.resolve(globalOpts.db);
          pathSource = 'cli';
        } else if (opts.resetConfig) {
          dbPath = getDefaultDbPath();
          pathSource = 'default';
        } else {
          const resolved = resolveDbPathWithSource();
          dbPath = resolved.path;
          pathSource = resolved.source;
        }

        runInit({ dbPath, pathSource, json: globalOpts.json, resetConfig: opts.resetConfig });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
