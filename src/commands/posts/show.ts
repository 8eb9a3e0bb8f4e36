import { Args, Command } from '@oclif/core';
import { SharedFlags, authorName, logPost, outputJsonOrPlain, withStore } from '../_shared/index.js';

export default class PostsShow extends Command {
  static override description = 'Show a post with its comments';

  static override examples = ['<%= config.bin %> posts show 3', '<%= config.bin %> posts show 3 --json'];

  static override args = {
    id: Args.integer({ description: 'Post ID', required: true }),
  };

  static override flags = {
    'data-dir': SharedFlags.dataDir,
    json: SharedFlags.json,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(PostsShow);

    await withStore(flags['data-dir'], this, (blog) => {
      const post = blog.getPost(args.id);
      const byline = authorName(blog.authorNames(), post.authorId);

      outputJsonOrPlain(this, flags.json, { ...post, authorName: byline }, () => {
        logPost(this, post, byline);
      });
    });
  }
}
