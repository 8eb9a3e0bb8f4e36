import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, authorName, formatPostSummary, outputJsonOrPlain, withStore } from '../_shared/index.js';

export default class Posts extends Command {
  static override description = 'List posts in publication order';

  static override examples = [
    '<%= config.bin %> posts',
    '<%= config.bin %> posts --author ana@example.com',
    '<%= config.bin %> posts --tag typescript --json',
  ];

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
    author: Flags.string({
      description: 'Only posts by the author with this email',
    }),
    tag: Flags.string({
      description: 'Only posts carrying this tag (case-insensitive)',
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Posts);

    await withStore(flags['data-dir'], this, (blog) => {
      const posts = blog.listPosts({ authorEmail: flags.author, tag: flags.tag });
      const names = blog.authorNames();

      const jsonData = {
        posts: posts.map((p) => ({ ...p, authorName: authorName(names, p.authorId) })),
        count: posts.length,
      };

      outputJsonOrPlain(this, flags.json, jsonData, () => {
        if (posts.length === 0) {
          this.log(chalk.gray('No posts found.'));
          if (!flags.author && !flags.tag) {
            this.log(chalk.gray('Run `postbook posts create <title> <body> --as <email>` to write one.'));
          }
          return;
        }

        this.log(chalk.bold(`Posts (${posts.length})`));
        this.log('');
        for (const post of posts) {
          this.log(formatPostSummary(post, authorName(names, post.authorId)));
        }
      });
    });
  }
}
