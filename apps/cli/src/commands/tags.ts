import { Command } from 'commander';
import type { DbExecutor } from '@tasklane/core';
import { getAllTags } from '@tasklane/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createTagsCommand(db: DbExecutor): Command {
  return new Command('tags')
    .description('List every known tag')
    .action(() => $try(() => {
      const tags = getAllTags(db);
      if (tags.length === 0) {
        out.info('No tags yet');
        return;
      }
      for (const tag of tags) console.log(out.tagColor(tag.name)(`#${tag.name}`));
    }));
}
