import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, optionalSessionEmail, withStore } from '../_shared/index.js';

export default class CommentsUpdate extends Command {
  static override description = 'Edit the text of a comment';

  static override examples = ['<%= config.bin %> comments update 3 1 "Nice post, thanks!" --as ana@example.com'];

  static override args = {
    'post-id': Args.integer({ description: 'Post ID', required: true }),
    'comment-id': Args.integer({ description: 'Comment ID', required: true }),
    body: Args.string({ description: 'New comment text', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(CommentsUpdate);

    await withStore(flags['data-dir'], this, (blog) => {
      const comment = blog.updateComment(args['post-id'], args['comment-id'], args.body, optionalSessionEmail(flags.as));

      this.log(`Updated comment ${chalk.cyan(`#${comment.id}`)} on post ${chalk.gray(`#${args['post-id']}`)}`);
    });
  }
}
