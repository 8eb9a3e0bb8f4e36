import { Command } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, outputJsonOrPlain, tableSeparator, withStore } from './_shared/index.js';

export default class Tags extends Command {
  static override description = 'List tags in use, most used first';

  static override examples = ['<%= config.bin %> tags', '<%= config.bin %> tags --json'];

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Tags);

    await withStore(flags['data-dir'], this, (blog) => {
      const tags = blog.tagCounts();

      outputJsonOrPlain(this, flags.json, { tags, count: tags.length }, () => {
        if (tags.length === 0) {
          this.log(chalk.gray('No tags in use yet.'));
          return;
        }

        const width = Math.max(3, ...tags.map((t) => t.tag.length));
        this.log(chalk.bold(`${'Tag'.padEnd(width)}  Posts`));
        this.log(tableSeparator(width + 7));
        for (const { tag, count } of tags) {
          this.log(`${chalk.magenta(tag.padEnd(width))}  ${String(count).padStart(5)}`);
        }
      });
    });
  }
}
