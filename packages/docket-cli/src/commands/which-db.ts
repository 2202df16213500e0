// packages/docket-cli/src/commands/which-db.ts
import fs from 'fs';
import { Command } from 'commander';
import { getConfigPath, resolveDbPathWithSource, type DbPathSource } from '../config.js';
import { handleError } from '../errors.js';
import { printJson } from '../output.js';
import { parseGlobalOptions } from '../db.js';

export interface WhichDbResult {
  path: string;
  source: DbPathSource;
  exists: boolean;
  configPath: string;
}

export function runWhichDb(options: { cliPath?: string; json: boolean; configPath?: string }): WhichDbResult {
  const { cliPath, json, configPath = getConfigPath() } = options;

  const resolved = resolveDbPathWithSource(cliPath, configPath);
  const result: WhichDbResult = {
    path: resolved.path,
    source: resolved.source,
    exists: fs.existsSync(resolved.path),
    configPath,
  };

  if (json) {
    printJson(result);
  } else {
    console.log(`Database: ${result.path}`);
    console.log(`Source: ${result.source}`);
    console.log(`Exists: ${result.exists ? 'yes' : 'no'}`);
    console.log(`Config: ${result.configPath}`);
  }

  return result;
}

export function createWhichDbCommand(): Command {
  return new Command('which-db')
    .description('Show resolved database path')
    .action(function (this: Command) {
      const globalOpts = parseGlobalOptions(this);
      try {
        runWhichDb({ cliPath: globalOpts.db, json: globalOpts.json });
      } catch (e) {
        handleError(e, globalOpts.json);
      }
    });
}
