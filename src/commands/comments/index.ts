import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, formatComment, outputJsonOrPlain, withStore } from '../_shared/index.js';

export default class Comments extends Command {
  static override description = 'List the comments on a post';

  static override examples = ['<%= config.bin %> comments 3', '<%= config.bin %> comments 3 --json'];

  static override args = {
    'post-id': Args.integer({ description: 'Post ID', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Comments);

    await withStore(flags['data-dir'], this, (blog) => {
      const comments = blog.listComments(args['post-id']);

      outputJsonOrPlain(this, flags.json, { postId: args['post-id'], comments, count: comments.length }, () => {
        if (comments.length === 0) {
          this.log(chalk.gray(`No comments on post #${args['post-id']}.`));
          return;
        }

        this.log(chalk.bold(`Comments on #${args['post-id']} (${comments.length})`));
        for (const comment of comments) {
          this.log(formatComment(comment));
        }
      });
    });
  }
}
