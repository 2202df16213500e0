import { Command } from 'commander';
import { createProjectAddCommand } from './add.js';
import { createProjectListCommand } from './list.js';
import { createProjectRenameCommand } from './rename.js';
import { createProjectArchiveCommand } from './archive.js';
import { createProjectUnarchiveCommand } from './unarchive.js';

export function createProjectCommand(): Command {
  const command = new Command('project').description('Project management commands');

  command.addCommand(createProjectListCommand(), { isDefault: true });
  command.addCommand(createProjectAddCommand());
  command.addCommand(createProjectRenameCommand());
  command.addCommand(createProjectArchiveCommand());
  command.addCommand(createProjectUnarchiveCommand());

  return command;
}
