import { Command } from 'commander';
import chalk from 'chalk';
import type { DbExecutor, Task } from '@tasklane/core';
import { PriorityName, getTaskById } from '@tasklane/core';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';

export function createGetCommand(db: DbExecutor): Command {
  return new Command('get')
    .description('Get detailed information about a task')
    .argument('<taskId>', 'The task ID to retrieve')
    .option('--json', 'Output in JSON format')
    .action((rawId: string, opts: { json?: boolean }) => $try(() => {
      const taskId = parseTaskIdArg(rawId);
      const task = taskId === null ? null : getTaskById(db, taskId);
      if (!task) {
        out.error(`Task not found: ${rawId}`);
        process.exitCode = 1;
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(toJson(task), null, 2));
      } else {
        outputHumanReadable(task);
      }
    }));
}

function toJson(task: Task): Record<string, unknown> {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    dueDate: task.dueDate,
    completed: task.completed,
    tags: task.tags.map(t => t.name),
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

function outputHumanReadable(task: Task): void {
  const tags = task.tags.length ? task.tags.map(t => `#${t.name}`).join(' ') : '-';

  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Status:')}      ${out.formatCheckbox(task.completed)}`);
  console.log(`${chalk.bold('Priority:')}    ${task.priority} (${PriorityName[task.priority]})`);
  console.log(`${chalk.bold('Due:')}         ${task.dueDate}`);
  console.log(`${chalk.bold('Tags:')}        ${tags}`);
  console.log(`${chalk.bold('Created:')}     ${task.createdAt.replace('T', ' ').slice(0, 16)}`);
  console.log(`${chalk.bold('Updated:')}     ${task.updatedAt.replace('T', ' ').slice(0, 16)}`);
  if (task.description) {
    console.log(`${chalk.bold('Description:')}`);
    console.log(task.description);
  }
}
