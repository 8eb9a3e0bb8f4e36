import { Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, logWarning, resolveSessionEmail, withStore } from '../_shared/index.js';

export default class AuthorsDelete extends Command {
  static override description = 'Delete your own account (your posts are kept)';

  static override examples = ['<%= config.bin %> authors delete --as ana@example.com'];

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(AuthorsDelete);
    const sessionEmail = resolveSessionEmail(flags.as, this);

    await withStore(flags['data-dir'], this, (blog) => {
      const author = blog.login(sessionEmail);
      const postCount = blog.listPosts({ authorEmail: author.email }).length;

      const deleted = blog.deleteAuthor(author.email);
      if (!deleted) {
        this.error(chalk.red(`Failed to delete author "${author.email}".`));
      }

      this.log(`Deleted author ${chalk.cyan(author.name)} (${chalk.gray(author.email)})`);
      if (postCount > 0) {
        logWarning(this, `${postCount} post(s) remain and will be shown as written by a deleted author.`);
      }
    });
  }
}
