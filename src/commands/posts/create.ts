import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, formatTags, logVerbose, resolveSessionEmail, withStore } from '../_shared/index.js';

export default class PostsCreate extends Command {
  static override description = 'Publish a new post as the session author';

  static override examples = [
    '<%= config.bin %> posts create "Hello" "My first post" --as ana@example.com',
    '<%= config.bin %> posts create "Notes" "Typed all the things" --as ana@example.com --tags typescript,notes',
  ];

  static override args = {
    title: Args.string({ description: 'Post title', required: true }),
    body: Args.string({ description: 'Post body', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
    tags: SharedFlags.tags,
    verbose: SharedFlags.verbose,
    date: Flags.string({
      description: 'Publication timestamp to store instead of now (YYYY-MM-DD HH:MM:SS)',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PostsCreate);
    const sessionEmail = resolveSessionEmail(flags.as, this);

    await withStore(flags['data-dir'], this, (blog, store) => {
      logVerbose(this, `Posts file: ${store.postsPath}`, flags.verbose);

      const post = blog.createPost(sessionEmail, {
        title: args.title,
        body: args.body,
        tags: flags.tags,
        createdAt: flags.date,
      });

      const tags = post.tags.length > 0 ? ` ${chalk.magenta(formatTags(post.tags))}` : '';
      this.log(`Created post ${chalk.cyan(post.title)} with id ${chalk.cyan(String(post.id))}${tags}`);
    });
  }
}
