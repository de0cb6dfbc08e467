import { Command } from 'commander';
import type { DbExecutor } from '@tasklane/core';
import { softDeleteTask } from '@tasklane/core';
import * as out from '../output.js';
import { $try, parseTaskIdArg, unwrap } from '../helpers.js';

export function createDeleteCommand(db: DbExecutor): Command {
  return new Command('delete')
    .description('Delete a task (it stays in storage but is hidden everywhere)')
    .argument('<taskId>', 'The task ID to delete')
    .action((rawId: string) => $try(() => {
      const taskId = parseTaskIdArg(rawId);
      if (taskId === null) {
        out.error(`Task not found: ${rawId}`);
        process.exitCode = 1;
        return;
      }

      const task = unwrap(softDeleteTask(db, taskId), taskId);
      if (!task) return;
      out.success(`Task ${task.id} deleted`);
    }));
}
