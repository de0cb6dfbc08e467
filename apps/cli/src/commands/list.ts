import { Command } from 'commander';
import chalk from 'chalk';
import type { DbExecutor } from '@tasklane/core';
import { countTasks, listTasks, validateListQuery } from '@tasklane/core';
import * as out from '../output.js';
import { $try, parsePriorityArg } from '../helpers.js';

interface ListOptions {
  skip?: string;
  limit?: string;
  done?: boolean;
  open?: boolean;
  priority?: string;
  tags?: string;
}

export function createListCommand(db: DbExecutor): Command {
  return new Command('list')
    .description('List tasks')
    .option('--skip <n>', 'Skip the first n matches')
    .option('--limit <n>', 'Show at most n tasks (1-100)')
    .option('--done', 'Show only completed tasks')
    .option('--open', 'Show only open tasks')
    .option('-p, --priority <level>', 'Filter by priority')
    .option('-t, --tags <names>', 'Only tasks carrying every listed tag')
    .action((opts: ListOptions) => $try(() => {
      if (opts.done && opts.open) {
        out.error('Cannot use both --done and --open at the same time');
        process.exitCode = 1;
        return;
      }

      const query = validateListQuery({
        skip: opts.skip,
        limit: opts.limit,
        completed: opts.done ? true : opts.open ? false : undefined,
        priority: opts.priority === undefined ? undefined : parsePriorityArg(opts.priority) ?? opts.priority,
        tags: opts.tags,
      });
      if (query.type === 'invalid') {
        out.validationErrors(query.details);
        process.exitCode = 1;
        return;
      }

      const tasks = listTasks(db, query.value);
      if (tasks.length === 0) {
        out.info('No tasks found');
        return;
      }

      const now = new Date();
      for (const task of tasks) console.log(out.formatTaskLine(task, now));

      const total = countTasks(db, query.value);
      console.log(chalk.dim(`Showing ${tasks.length} of ${total} tasks`));
    }));
}
