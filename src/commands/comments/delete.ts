import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, optionalSessionEmail, withStore } from '../_shared/index.js';

export default class CommentsDelete extends Command {
  static override description = 'Delete a comment';

  static override examples = ['<%= config.bin %> comments delete 3 1 --as ana@example.com'];

  static override args = {
    'post-id': Args.integer({ description: 'Post ID', required: true }),
    'comment-id': Args.integer({ description: 'Comment ID', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(CommentsDelete);

    await withStore(flags['data-dir'], this, (blog) => {
      const deleted = blog.deleteComment(args['post-id'], args['comment-id'], optionalSessionEmail(flags.as));
      if (!deleted) {
        this.error(chalk.red(`Comment #${args['comment-id']} not found on post #${args['post-id']}.`));
      }

      this.log(`Deleted comment ${chalk.gray(`#${args['comment-id']}`)} from post ${chalk.gray(`#${args['post-id']}`)}`);
    });
  }
}
