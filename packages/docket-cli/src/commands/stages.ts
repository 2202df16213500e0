// packages/docket-cli/src/commands/stages.ts
import { Command } from 'commander';
import type { StageRule } from 'docket-core';
import { withServices, type Services } from '../db.js';
import { printJson, printTable } from '../output.js';

export interface StagesResult {
  rules: StageRule[];
}

export interface StagesOptions {
  services: Services;
  json: boolean;
}

function flag(value: boolean | null): string {
  return value === null ? '*' : value ? 'yes' : 'no';
}

export function runStages(options: StagesOptions): StagesResult {
  const { services, json } = options;
  const result: StagesResult = { rules: services.stageTable.rules() };

  if (json) {
    printJson(result);
  } else {
    printTable(
      result.rules.map(rule => ({
        tier: rule.tier,
        queued: flag(rule.queued),
        history: flag(rule.history),
        stage: rule.stage,
        order: rule.sortOrder,
        color: rule.color,
      }))
    );
  }
  return result;
}

export function createStagesCommand(): Command {
  return new Command('stages')
    .description('Show the effective stage table, config overrides included')
    .action(function (this: Command) {
      withServices(this, (services, globalOpts) => {
        runStages({ services, json: globalOpts.json });
      });
    });
}
