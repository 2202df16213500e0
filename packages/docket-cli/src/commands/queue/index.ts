import { Command } from 'commander';
import { createQueueAddCommand } from './add.js';
import { createQueueClearCommand } from './clear.js';
import { createQueueDropCommand } from './drop.js';
import { createQueueListCommand } from './list.js';
import { createQueueMoveCommand } from './move.js';
import { createQueuePickCommand } from './pick.js';
import { createQueueRollCommand } from './roll.js';

export function createQueueCommand(): Command {
  const command = new Command('queue').description('Queue commands');

  command.addCommand(createQueueListCommand(), { isDefault: true });
  command.addCommand(createQueueAddCommand());
  command.addCommand(createQueuePickCommand());
  command.addCommand(createQueueRollCommand());
  command.addCommand(createQueueDropCommand());
  command.addCommand(createQueueMoveCommand());
  command.addCommand(createQueueClearCommand());

  return command;
}
