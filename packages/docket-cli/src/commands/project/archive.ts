// packages/docket-cli/src/commands/project/archive.ts
import { Command } from 'commander';
import type { Project } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';

export interface ProjectArchiveOptions {
  services: Services;
  name: string;
  json: boolean;
}

/** Hide a project from `project list`; its tasks are untouched. */
export function runProjectArchive(options: ProjectArchiveOptions): Project {
  const { services, name, json } = options;
  const project = services.projectService.archiveProject(name);

  if (json) {
    printJson(project);
  } else {
    console.log(`✓ Archived project '${project.name}'`);
  }
  return project;
}

export function createProjectArchiveCommand(): Command {
  return new Command('archive')
    .description('Archive a project')
    .argument('<name>', 'Project name')
    .action(function (this: Command, name: string) {
      withServices(this, (services, globalOpts) => {
        runProjectArchive({ services, name, json: globalOpts.json });
      });
    });
}
