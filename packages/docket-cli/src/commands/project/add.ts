// packages/docket-cli/src/commands/project/add.ts
import { Command } from 'commander';
import type { Project } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';

export interface ProjectAddOptions {
  services: Services;
  name: string;
  json: boolean;
}

export function runProjectAdd(options: ProjectAddOptions): Project {
  const { services, name, json } = options;
  const project = services.projectService.createProject(name);

  if (json) {
    printJson(project);
  } else {
    console.log(`✓ Created project '${project.name}'`);
  }
  return project;
}

export function createProjectAddCommand(): Command {
  return new Command('add')
    .description('Create a project; dots nest it under another (work.email)')
    .argument('<name>', 'Project name')
    .action(function (this: Command, name: string) {
      withServices(this, (services, globalOpts) => {
        runProjectAdd({ services, name, json: globalOpts.json });
      });
    });
}
