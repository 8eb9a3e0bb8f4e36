import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, formatAuthor, formatPostSummary, outputJsonOrPlain, withStore } from '../_shared/index.js';

export default class AuthorsShow extends Command {
  static override description = 'Show an author and their posts';

  static override examples = ['<%= config.bin %> authors show ana@example.com', '<%= config.bin %> authors show ana@example.com --json'];

  static override args = {
    email: Args.string({ description: 'Author email', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(AuthorsShow);

    await withStore(flags['data-dir'], this, (blog) => {
      const author = blog.findAuthor(args.email);
      if (!author) {
        this.error(chalk.red(`Author "${args.email}" not found.`));
      }

      const posts = blog.listPosts({ authorEmail: author.email });

      outputJsonOrPlain(this, flags.json, { ...author, posts }, () => {
        this.log(`Author: ${formatAuthor(author)}`);
        this.log(`Posts: ${posts.length}`);
        if (posts.length > 0) {
          this.log('');
          for (const post of posts) {
            this.log(formatPostSummary(post, author.name));
          }
        }
      });
    });
  }
}
