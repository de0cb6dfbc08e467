import { Command } from 'commander';
import type { DbExecutor } from '@tasklane/core';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createUpdateCommand } from './commands/update.js';
import { createDeleteCommand } from './commands/delete.js';
import { createTagsCommand } from './commands/tags.js';

export function createProgram(db: DbExecutor): Command {
  const program = new Command()
    .name('tasklane')
    .description('Track tasks with priorities, due dates and tags')
    .version('1.0.0');

  program.addCommand(createAddCommand(db));
  program.addCommand(createListCommand(db));
  program.addCommand(createGetCommand(db));
  program.addCommand(createUpdateCommand(db));
  program.addCommand(createDeleteCommand(db));
  program.addCommand(createTagsCommand(db));

  return program;
}
