import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { BlogService } from '../blog/index.js';
import { BlogStore, isBlogError } from '../store/index.js';
import { SharedFlags, logVerbose, outputJsonOrPlain, resolveDataDir } from './_shared/index.js';

export default class Init extends Command {
  static override description = 'Create the data directory and its files if they are missing';

  static override examples = [
    '<%= config.bin %> init',
    '<%= config.bin %> init --welcome',
    '<%= config.bin %> init -D ./blog-data --json',
  ];

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
    verbose: SharedFlags.verbose,
    welcome: Flags.boolean({
      description: 'Also create the System author and its welcome post',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Init);

    const store = new BlogStore(resolveDataDir(flags['data-dir'], this));
    logVerbose(this, `Data directory: ${store.dataDir}`, flags.verbose, flags.json);

    try {
      const result = store.initialize();
      const welcomePost = flags.welcome ? new BlogService(store).ensureWelcomePost() : null;

      const jsonData = {
        dataDir: store.dataDir,
        authorsPath: store.authorsPath,
        postsPath: store.postsPath,
        ...result,
        welcomePostId: welcomePost?.id ?? null,
      };

      outputJsonOrPlain(this, flags.json, jsonData, () => {
        this.log(`${result.authorsCreated ? chalk.green('created') : chalk.gray('exists ')}  ${store.authorsPath}`);
        this.log(`${result.postsCreated ? chalk.green('created') : chalk.gray('exists ')}  ${store.postsPath}`);
        if (welcomePost) {
          this.log(`Welcome post ${chalk.cyan(`#${welcomePost.id}`)} is in place.`);
        }
      });
    } catch (error) {
      if (isBlogError(error)) {
        this.error(chalk.red(error.message));
      }
      throw error;
    }
  }
}
