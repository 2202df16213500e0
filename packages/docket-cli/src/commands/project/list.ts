// packages/docket-cli/src/commands/project/list.ts
import { Command } from 'commander';
import type { ProjectSummary } from 'docket-core';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';

export interface ProjectListResult {
  projects: ProjectSummary[];
}

export interface ProjectListOptions {
  services: Services;
  includeArchived?: boolean;
  json: boolean;
}

export function runProjectList(options: ProjectListOptions): ProjectListResult {
  const { services, includeArchived, json } = options;
  const result: ProjectListResult = {
    projects: services.projectService.listProjects({ includeArchived }),
  };

  if (json) {
    printJson(result);
  } else if (result.projects.length === 0) {
    console.log('No projects found');
  } else {
    console.log('Projects:');
    for (const project of result.projects) {
      const done = project.total_tasks - project.open_tasks;
      const suffix = project.archived ? ' (archived)' : '';
      console.log(`  ${project.name}: ${project.open_tasks} open, ${done} finished${suffix}`);
    }
  }
  return result;
}

export function createProjectListCommand(): Command {
  return new Command('list')
    .description('List projects with task counts')
    .option('--archived', 'Include archived projects')
    .action(function (this: Command, opts: { archived?: boolean }) {
      withServices(this, (services, globalOpts) => {
        runProjectList({ services, includeArchived: opts.archived ?? false, json: globalOpts.json });
      });
    });
}
