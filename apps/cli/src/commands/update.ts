import { Command } from 'commander';
import type { DbExecutor } from '@tasklane/core';
import { parseTagList, updateTask } from '@tasklane/core';
import * as out from '../output.js';
import { $try, parseDueArg, parsePriorityArg, parseTaskIdArg, unwrap } from '../helpers.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  clearDescription?: boolean;
  priority?: string;
  due?: string;
  done?: boolean;
  open?: boolean;
  tags?: string;
  clearTags?: boolean;
}

export function createUpdateCommand(db: DbExecutor): Command {
  return new Command('update')
    .description('Change fields of a task; omitted fields stay as they are')
    .argument('<taskId>', 'The task ID to update')
    .option('--title <text>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('--clear-description', 'Remove the description')
    .option('-p, --priority <level>', 'New priority')
    .option('--due <date>', 'New due date')
    .option('--done', 'Mark completed')
    .option('--open', 'Mark not completed')
    .option('-t, --tags <names>', 'Replace all tags with this comma-separated list')
    .option('--clear-tags', 'Remove all tags')
    .action((rawId: string, opts: UpdateOptions) => $try(() => {
      const taskId = parseTaskIdArg(rawId);
      if (taskId === null) {
        out.error(`Task not found: ${rawId}`);
        process.exitCode = 1;
        return;
      }
      if (opts.done && opts.open) {
        out.error('Cannot use both --done and --open at the same time');
        process.exitCode = 1;
        return;
      }

      const patch: Record<string, unknown> = {};
      if (opts.title !== undefined) patch['title'] = opts.title;
      if (opts.clearDescription) patch['description'] = null;
      else if (opts.description !== undefined) patch['description'] = opts.description;
      if (opts.priority !== undefined) patch['priority'] = parsePriorityArg(opts.priority) ?? opts.priority;
      if (opts.due !== undefined) patch['due_date'] = parseDueArg(opts.due);
      if (opts.done) patch['completed'] = true;
      if (opts.open) patch['completed'] = false;
      if (opts.clearTags) patch['tags'] = [];
      else if (opts.tags !== undefined) patch['tags'] = parseTagList(opts.tags);

      if (Object.keys(patch).length === 0) {
        out.warning('Nothing to update');
        return;
      }

      const task = unwrap(updateTask(db, taskId, patch), taskId);
      if (!task) return;
      out.success(`Task ${task.id} updated`);
    }));
}
