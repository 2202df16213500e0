import { Command } from 'commander';
import { createAddCommand } from './add.js';
import { createListCommand } from './list.js';
import { createShowCommand } from './show.js';
import { createModifyCommand } from './modify.js';
import { createDoneCommand } from './done.js';
import { createCancelCommand } from './cancel.js';
import { createReopenCommand } from './reopen.js';
import { createAnnotateCommand } from './annotate.js';
import { createHistoryCommand } from './history.js';

export function createTaskCommand(): Command {
  const command = new Command('task').description('Task management commands');

  command.addCommand(createAddCommand());
  command.addCommand(createListCommand());
  command.addCommand(createShowCommand());
  command.addCommand(createModifyCommand());
  command.addCommand(createDoneCommand());
  command.addCommand(createCancelCommand());
  command.addCommand(createReopenCommand());
  command.addCommand(createAnnotateCommand());
  command.addCommand(createHistoryCommand());

  return command;
}
