import { Command } from 'commander';
import { createSessionsAddCommand } from './add.js';
import { createSessionsDeleteCommand } from './delete.js';
import { createSessionsListCommand } from './list.js';
import { createSessionsModifyCommand } from './modify.js';
import { createSessionsShowCommand } from './show.js';

export function createSessionsCommand(): Command {
  const command = new Command('sessions').description('Work session commands');

  command.addCommand(createSessionsListCommand(), { isDefault: true });
  command.addCommand(createSessionsShowCommand());
  command.addCommand(createSessionsAddCommand());
  command.addCommand(createSessionsModifyCommand());
  command.addCommand(createSessionsDeleteCommand());

  return command;
}
