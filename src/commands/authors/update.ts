import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { SharedFlags, formatAuthor, resolveSessionEmail, withStore } from '../_shared/index.js';

export default class AuthorsUpdate extends Command {
  static override description = 'Change your own display name or email';

  static override examples = [
    '<%= config.bin %> authors update --as ana@example.com --name "Ana María"',
    '<%= config.bin %> authors update --as ana@example.com --email ana@example.org',
  ];

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    as: SharedFlags.as,
    name: Flags.string({
      char: 'n',
      description: 'New display name',
    }),
    email: Flags.string({
      char: 'e',
      description: 'New email',
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(AuthorsUpdate);

    if (flags.name === undefined && flags.email === undefined) {
      this.error(chalk.red('At least one of --name or --email is required.'));
    }

    const sessionEmail = resolveSessionEmail(flags.as, this);

    await withStore(flags['data-dir'], this, (blog) => {
      const updated = blog.updateAuthor(sessionEmail, { name: flags.name, email: flags.email });

      this.log(`Updated ${formatAuthor(updated)}`);
      if (updated.email !== sessionEmail.trim().toLowerCase()) {
        this.log(chalk.yellow(`From now on act as ${updated.email}.`));
      }
    });
  }
}
