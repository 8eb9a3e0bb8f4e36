import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import type { Commenter } from '../../blog/index.js';
import { SharedFlags, resolveSessionEmail, withStore } from '../_shared/index.js';

export default class CommentsAdd extends Command {
  static override description = 'Comment on a post, as an author or under a display name';

  static override examples = [
    '<%= config.bin %> comments add 3 "Nice post!" --as ana@example.com',
    '<%= config.bin %> comments add 3 "Thanks for sharing" --name "A reader"',
  ];

  static override args = {
    'post-id': Args.integer({ description: 'Post ID', required: true }),
    body: Args.string({ description: 'Comment text', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
    name: Flags.string({
      char: 'n',
      description: 'Display name for a comment not tied to an author account',
      exclusive: ['as'],
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(CommentsAdd);

    const commenter: Commenter =
      flags.name === undefined ? { email: resolveSessionEmail(flags.as, this) } : { name: flags.name };

    await withStore(flags['data-dir'], this, (blog) => {
      const comment = blog.addComment(args['post-id'], args.body, commenter);

      this.log(
        `Added comment ${chalk.cyan(`#${comment.id}`)} to post ${chalk.gray(`#${args['post-id']}`)} as ${chalk.cyan(comment.authorName)}`
      );
    });
  }
}
