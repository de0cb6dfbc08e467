import { Command } from 'commander';
import type { DbExecutor } from '@tasklane/core';
import { createTask, parseTagList } from '@tasklane/core';
import * as out from '../output.js';
import { $try, parseDueArg, parsePriorityArg, unwrap } from '../helpers.js';

interface AddOptions {
  description?: string;
  priority: string;
  due: string;
  tags?: string;
  done?: boolean;
}

export function createAddCommand(db: DbExecutor): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .requiredOption('-p, --priority <level>', 'Priority 1-5 (or lowest, low, medium, high, highest)')
    .requiredOption('--due <date>', 'Due date (today, tomorrow, +3d, friday, jan15, yyyy-MM-dd)')
    .option('-t, --tags <names>', 'Comma-separated tags')
    .option('--done', 'Create the task already completed')
    .action((title: string, opts: AddOptions) => $try(() => {
      const payload = {
        title,
        description: opts.description,
        priority: parsePriorityArg(opts.priority) ?? opts.priority,
        due_date: parseDueArg(opts.due),
        completed: opts.done ?? false,
        tags: parseTagList(opts.tags),
      };

      const task = unwrap(createTask(db, payload));
      if (!task) return;
      out.success(`Task ${task.id} saved. Use the list command to see your tasks`);
    }));
}
