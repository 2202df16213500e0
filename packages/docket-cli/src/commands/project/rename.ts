// packages/docket-cli/src/commands/project/rename.ts
import { Command } from 'commander';
import { withServices, type Services } from '../../db.js';
import { printJson } from '../../output.js';

export interface ProjectRenameResult {
  old_name: string;
  new_name: string;
  merged: boolean;
  tasks_moved: number;
}

export interface ProjectRenameOptions {
  services: Services;
  oldName: string;
  newName: string;
  json: boolean;
}

export function runProjectRename(options: ProjectRenameOptions): ProjectRenameResult {
  const { services, oldName, newName, json } = options;
  const renamed = services.projectService.renameProject(oldName, newName);
  const result: ProjectRenameResult = {
    old_name: oldName,
    new_name: renamed.project.name,
    merged: renamed.merged,
    tasks_moved: renamed.movedTaskIds.length,
  };

  if (json) {
    printJson(result);
  } else if (result.merged) {
    console.log(`✓ Merged project '${oldName}' into '${result.new_name}' (${result.tasks_moved} tasks moved)`);
  } else {
    console.log(`✓ Renamed project '${oldName}' to '${result.new_name}'`);
  }
  return result;
}

export function createProjectRenameCommand(): Command {
  return new Command('rename')
    .description('Rename a project, merging it into the target if that name exists')
    .argument('<oldName>', 'Current project name')
    .argument('<newName>', 'New project name')
    .action(function (this: Command, oldName: string, newName: string) {
      withServices(this, (services, globalOpts) => {
        runProjectRename({ services, oldName, newName, json: globalOpts.json });
      });
    });
}
