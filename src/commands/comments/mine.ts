import { Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, formatComment, outputJsonOrPlain, resolveSessionEmail, withStore } from '../_shared/index.js';

export default class CommentsMine extends Command {
  static override description = 'List the comments you left, across all posts';

  static override examples = [
    '<%= config.bin %> comments mine --as ana@example.com',
    '<%= config.bin %> comments mine --as ana@example.com --json',
  ];

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
    json: SharedFlags.json,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(CommentsMine);
    const sessionEmail = resolveSessionEmail(flags.as, this);

    await withStore(flags['data-dir'], this, (blog) => {
      const mine = blog.listCommentsByAuthor(sessionEmail);

      outputJsonOrPlain(this, flags.json, { comments: mine, count: mine.length }, () => {
        if (mine.length === 0) {
          this.log(chalk.gray('You have not commented on any post yet.'));
          return;
        }

        this.log(chalk.bold(`Your comments (${mine.length})`));
        for (const { postId, comment } of mine) {
          this.log(`${formatComment(comment)} ${chalk.gray(`(post #${postId})`)}`);
        }
      });
    });
  }
}
