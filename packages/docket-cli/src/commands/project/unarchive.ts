// packages/docket-cli/src/commands/project/unarchive.ts
import { Command } from 'commander';
import type { Project } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';

export interface ProjectUnarchiveOptions {
  services: Services;
  name: string;
  json: boolean;
}

export function runProjectUnarchive(options: ProjectUnarchiveOptions): Project {
  const { services, name, json } = options;
  const project = services.projectService.unarchiveProject(name);

  if (json) {
    printJson(project);
  } else {
    console.log(`✓ Unarchived project '${project.name}'`);
  }
  return project;
}

export function createProjectUnarchiveCommand(): Command {
  return new Command('unarchive')
    .description('Bring an archived project back into the list')
    .argument('<name>', 'Project name')
    .action(function (this: Command, name: string) {
      withServices(this, (services, globalOpts) => {
        runProjectUnarchive({ services, name, json: globalOpts.json });
      });
    });
}
