import path from 'node:path';
import { CsvAuthorRepository } from './repositories/author-repository.js';
import { JsonPostRepository } from './repositories/post-repository.js';
import { AUTHORS_FILE, POSTS_FILE } from './schema.js';

export interface InitializeResult {
  authorsCreated: boolean;
  postsCreated: boolean;
}

/**
 * Flat-file store rooted at one data directory. Owns the author and post repositories.
 */
export class BlogStore {
  public readonly authorsPath: string;
  public readonly postsPath: string;

  // Repositories
  public readonly authors: CsvAuthorRepository;
  public readonly posts: JsonPostRepository;

  constructor(public readonly dataDir: string) {
    this.authorsPath = path.join(dataDir, AUTHORS_FILE);
    this.postsPath = path.join(dataDir, POSTS_FILE);

    this.authors = new CsvAuthorRepository(this.authorsPath);
    this.posts = new JsonPostRepository(this.postsPath);
  }

  /**
   * Create the data directory and any missing file. Existing files are left alone.
   */
  initialize(): InitializeResult {
    return {
      authorsCreated: this.authors.initialize(),
      postsCreated: this.posts.initialize(),
    };
  }
}
