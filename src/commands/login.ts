import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import type { LoginResult } from '../blog/index.js';
import { NotFoundError } from '../store/index.js';
import { SharedFlags, formatAuthor, logVerbose, outputJsonOrPlain, withStore } from './_shared/index.js';

export default class Login extends Command {
  static override description = 'Log in by email, registering a new author when --name is given';

  static override examples = [
    '<%= config.bin %> login ana@example.com',
    '<%= config.bin %> login ana@example.com --name "Ana"',
  ];

  static override args = {
    email: Args.string({ description: 'Author email', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
    verbose: SharedFlags.verbose,
    name: Flags.string({
      char: 'n',
      description: 'Display name, used only when the email is not registered yet',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Login);

    await withStore(flags['data-dir'], this, (blog, store) => {
      logVerbose(this, `Authors file: ${store.authorsPath}`, flags.verbose, flags.json);

      let result: LoginResult;
      try {
        result = blog.loginOrRegister(args.email, flags.name);
      } catch (error) {
        if (error instanceof NotFoundError) {
          this.error(chalk.red(`No author is registered as "${args.email}".\nPass --name <name> to create the account.`));
        }
        throw error;
      }

      const { author, created } = result;
      outputJsonOrPlain(this, flags.json, { author, created }, () => {
        this.log(created ? `Registered ${formatAuthor(author)}` : `Welcome back, ${formatAuthor(author)}`);
        this.log(chalk.gray(`Act as this author with --as ${author.email} or export POSTBOOK_AUTHOR=${author.email}`));
      });
    });
  }
}
