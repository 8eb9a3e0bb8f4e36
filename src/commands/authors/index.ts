import { Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, formatAuthor, outputJsonOrPlain, withStore } from '../_shared/index.js';

export default class Authors extends Command {
  static override description = 'List registered authors with post counts';

  static override examples = ['<%= config.bin %> authors', '<%= config.bin %> authors --json'];

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Authors);

    await withStore(flags['data-dir'], this, (blog) => {
      const authors = blog.listAuthors();
      const posts = blog.listPosts();

      const authorsWithPosts = authors.map((a) => ({
        ...a,
        postCount: posts.filter((p) => p.authorId === a.id).length,
      }));

      outputJsonOrPlain(this, flags.json, { authors: authorsWithPosts, count: authors.length }, () => {
        if (authors.length === 0) {
          this.log(chalk.gray('No authors registered.'));
          this.log(chalk.gray('Run `postbook login <email> --name <name>` to create one.'));
          return;
        }

        this.log(chalk.bold(`Authors (${authors.length})`));
        this.log('');
        for (const a of authorsWithPosts) {
          this.log(`  ${formatAuthor(a)} - ${a.postCount} post(s)`);
        }
      });
    });
  }
}
