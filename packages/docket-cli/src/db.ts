// packages/docket-cli/src/db.ts
import type { Command } from 'commander';
import type Database from 'libsql';
import {
  createConnection,
  createServices,
  type DocketServices,
  type ServiceOptions,
} from 'docket-core';
import { ensureDbDirectory, getConfigPath, readConfig, resolveDbPath, serviceOptionsFromConfig } from './config.js';
import { CLIError, ExitCode, handleError } from './errors.js';
import { GlobalOptionsSchema, type GlobalOptions } from './types.js';

export interface Services extends DocketServices {
  db: Database.Database;
}

export interface InitializeDbOptions extends ServiceOptions {
  dbPath: string;
}

export function initializeDb(options: InitializeDbOptions): Services {
  const { dbPath, ...serviceOptions } = options;
  ensureDbDirectory(dbPath);
  const db = createConnection(dbPath);
  return { ...createServices(db, serviceOptions), db };
}

export function closeDb(services: Services): void {
  services.db.close();
}

/**
 * Test helper: initialize services over a single database file.
 */
export function initializeDbFromPath(dbPath: string, options: ServiceOptions = {}): Services {
  return initializeDb({ ...options, dbPath });
}

export function parseGlobalOptions(command: Command): GlobalOptions {
  const parsed = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
  if (!parsed.success) {
    handleError(new CLIError('--format must be json or md', ExitCode.InvalidUsage));
  }
  return parsed.data;
}

/**
 * Open the configured database for one command, run it, and close the
 * database again. Errors are reported through handleError.
 */
export function withServices(
  command: Command,
  fn: (services: Services, globalOpts: GlobalOptions) => void
): void {
  const globalOpts = parseGlobalOptions(command);
  let services: Services | undefined;
  try {
    const configPath = getConfigPath();
    const config = readConfig(configPath);
    services = initializeDb({
      dbPath: resolveDbPath(globalOpts.db, configPath),
      ...serviceOptionsFromConfig(config),
    });
    fn(services, globalOpts);
  } catch (e) {
    if (services) {
      closeDb(services);
      services = undefined;
    }
    handleError(e, globalOpts.json);
  } finally {
    if (services) closeDb(services);
  }
}
