import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, resolveSessionEmail, withStore } from '../_shared/index.js';

export default class PostsUpdate extends Command {
  static override description = 'Edit one of your posts';

  static override examples = [
    '<%= config.bin %> posts update 3 --as ana@example.com --title "Hello again"',
    '<%= config.bin %> posts update 3 --as ana@example.com --tags ""',
  ];

  static override args = {
    id: Args.integer({ description: 'Post ID', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
    tags: SharedFlags.tags,
    title: Flags.string({
      description: 'New title',
    }),
    body: Flags.string({
      description: 'New body',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PostsUpdate);

    if (flags.title === undefined && flags.body === undefined && flags.tags === undefined) {
      this.error(chalk.red('At least one of --title, --body or --tags is required.'));
    }

    const sessionEmail = resolveSessionEmail(flags.as, this);

    await withStore(flags['data-dir'], this, (blog) => {
      const updated = blog.updatePost(sessionEmail, args.id, {
        title: flags.title,
        body: flags.body,
        tags: flags.tags,
      });

      this.log(`Updated post ${chalk.cyan(updated.title)} (${chalk.gray(`#${updated.id}`)})`);
    });
  }
}
