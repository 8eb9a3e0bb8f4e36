export { CsvAuthorRepository } from './author-repository.js';
export type { AuthorRepository } from './author-repository.js';

export { JsonPostRepository } from './post-repository.js';
export type { PostRepository } from './post-repository.js';
