import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, resolveSessionEmail, withStore } from '../_shared/index.js';

export default class PostsDelete extends Command {
  static override description = 'Delete one of your posts';

  static override examples = ['<%= config.bin %> posts delete 3 --as ana@example.com'];

  static override args = {
    id: Args.integer({ description: 'Post ID', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PostsDelete);
    const sessionEmail = resolveSessionEmail(flags.as, this);

    await withStore(flags['data-dir'], this, (blog) => {
      const deleted = blog.deletePost(sessionEmail, args.id);
      if (!deleted) {
        this.error(chalk.red(`Post #${args.id} not found.`));
      }

      this.log(`Deleted post ${chalk.gray(`#${args.id}`)}`);
    });
  }
}
