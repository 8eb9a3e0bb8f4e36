import {
  type Author,
  type AuthorRepository,
  type AuthorUpdate,
  type Comment,
  NotFoundError,
  type Post,
  type PostRepository,
  type PostUpdate,
  ReferentialError,
  UnauthorizedError,
  ValidationError,
  normalizeEmail,
} from '../store/index.js';
import { formatTimestamp } from './timestamp.js';
import { type TagsInput, parseTags, requireText, validateEmail } from './validation.js';

export const SYSTEM_EMAIL = 'system@postbook.local';
export const SYSTEM_NAME = 'System';
export const WELCOME_TAG = 'welcome';
export const WELCOME_TITLE = 'Welcome to your timeline';
export const WELCOME_BODY =
  'This is your space. Write posts, leave comments and look around.\nTip: use tags to organize the topics you care about.';

export interface BlogRepositories {
  authors: AuthorRepository;
  posts: PostRepository;
}

export interface BlogServiceOptions {
  /** Clock used for post and comment timestamps. */
  now?: () => Date;
}

export interface LoginResult {
  author: Author;
  created: boolean;
}

export interface PostDraft {
  title: string;
  body: string;
  tags?: TagsInput;
  /** Overrides the clock, stored as given after trimming. */
  createdAt?: string;
}

export interface PostChanges {
  title?: string;
  body?: string;
  tags?: TagsInput;
}

export interface PostFilter {
  authorEmail?: string;
  tag?: string;
}

/** Who is commenting: a registered author, or just a display name. */
export type Commenter = { email: string } | { name: string };

/** A comment together with the post it was left on. */
export interface AuthoredComment {
  postId: number;
  comment: Comment;
}

export interface TagCount {
  tag: string;
  count: number;
}

/**
 * Blog use cases on top of the author and post repositories.
 *
 * There are no passwords. Whoever presents an email acts as that author, so
 * every "session email" below is trusted as-is. Ownership checks only stop
 * one author from changing another author's records by mistake.
 */
export class BlogService {
  private readonly now: () => Date;

  constructor(
    private readonly repos: BlogRepositories,
    options: BlogServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // ============================================================
  // Authors
  // ============================================================

  /**
   * Resolve an author by email, registering them when `name` is given and the email is new.
   */
  loginOrRegister(email: string, name?: string): LoginResult {
    const normalized = validateEmail(email);
    const existing = this.repos.authors.findByEmail(normalized);
    if (existing) {
      return { author: existing, created: false };
    }
    if (name === undefined) {
      throw new NotFoundError('author', normalized);
    }
    return { author: this.register(name, normalized), created: true };
  }

  login(email: string): Author {
    const normalized = validateEmail(email);
    const author = this.repos.authors.findByEmail(normalized);
    if (!author) {
      throw new NotFoundError('author', normalized);
    }
    return author;
  }

  register(name: string, email: string): Author {
    const displayName = requireText(name, 'Author name');
    return this.repos.authors.create(displayName, validateEmail(email), this.referencedAuthorIds());
  }

  findAuthor(email: string): Author | null {
    return this.repos.authors.findByEmail(validateEmail(email));
  }

  listAuthors(): Author[] {
    return this.repos.authors.listAll();
  }

  /**
   * Author names keyed by id, for rendering post and comment bylines.
   */
  authorNames(): Map<number, string> {
    return new Map(this.repos.authors.listAll().map((a) => [a.id, a.name]));
  }

  updateAuthor(sessionEmail: string, changes: AuthorUpdate): Author {
    const author = this.login(sessionEmail);

    const update: AuthorUpdate = {};
    if (changes.name !== undefined) update.name = requireText(changes.name, 'Author name');
    if (changes.email !== undefined) update.email = validateEmail(changes.email);
    if (update.name === undefined && update.email === undefined) {
      throw new ValidationError('Nothing to update: give a new name or email.');
    }

    return this.repos.authors.update(author.id, update);
  }

  /**
   * Delete the session author's own account. Their posts stay in place.
   */
  deleteAuthor(sessionEmail: string): boolean {
    const author = this.login(sessionEmail);
    return this.repos.authors.delete(author.id);
  }

  // ============================================================
  // Posts
  // ============================================================

  /**
   * Create a post for the author registered under `authorEmail`.
   * An unknown author is a ReferentialError and leaves the post store untouched.
   */
  createPost(authorEmail: string, draft: PostDraft): Post {
    const title = requireText(draft.title, 'Title');
    const body = requireText(draft.body, 'Body');
    const tags = parseTags(draft.tags);

    const author = this.repos.authors.findByEmail(normalizeEmail(authorEmail));
    if (!author) {
      throw new ReferentialError(normalizeEmail(authorEmail));
    }

    const createdAt = draft.createdAt?.trim() || formatTimestamp(this.now());
    return this.repos.posts.create({ authorId: author.id, title, body, createdAt, tags });
  }

  /**
   * Posts in insertion order, optionally narrowed to one author and/or one tag.
   * An email nobody is registered under matches no posts.
   */
  listPosts(filter: PostFilter = {}): Post[] {
    const tag = filter.tag === undefined ? undefined : requireText(filter.tag, 'Tag');

    if (filter.authorEmail !== undefined) {
      const author = this.repos.authors.findByEmail(normalizeEmail(filter.authorEmail));
      if (!author) return [];
      if (tag === undefined) return this.repos.posts.listByAuthor(author.id);
      return this.repos.posts.listByTag(tag).filter((p) => p.authorId === author.id);
    }

    return tag === undefined ? this.repos.posts.listAll() : this.repos.posts.listByTag(tag);
  }

  getPost(id: number): Post {
    const post = this.repos.posts.findById(id);
    if (!post) {
      throw new NotFoundError('post', id);
    }
    return post;
  }

  updatePost(sessionEmail: string, id: number, changes: PostChanges): Post {
    const author = this.login(sessionEmail);
    const post = this.getPost(id);
    this.assertPostOwner(post, author, 'edit');

    const update: PostUpdate = {};
    if (changes.title !== undefined) update.title = requireText(changes.title, 'Title');
    if (changes.body !== undefined) update.body = requireText(changes.body, 'Body');
    if (changes.tags !== undefined) update.tags = parseTags(changes.tags);
    if (Object.keys(update).length === 0) {
      throw new ValidationError('Nothing to update: give a new title, body or tags.');
    }

    return this.repos.posts.update(id, update);
  }

  /**
   * @returns false when the post does not exist
   */
  deletePost(sessionEmail: string, id: number): boolean {
    const author = this.login(sessionEmail);
    const post = this.repos.posts.findById(id);
    if (!post) return false;
    this.assertPostOwner(post, author, 'delete');
    return this.repos.posts.delete(id);
  }

  /**
   * Tag usage across all posts: most used first, ties in alphabetical order.
   */
  tagCounts(): TagCount[] {
    const counts = new Map<string, number>();
    for (const post of this.repos.posts.listAll()) {
      for (const raw of post.tags) {
        const tag = raw.trim();
        if (tag) counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }

    return Array.from(counts, ([tag, count]) => ({ tag, count })).sort((a, b) => {
      if (a.count !== b.count) return b.count - a.count;
      const left = a.tag.toLowerCase();
      const right = b.tag.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    });
  }

  /**
   * Make sure the System author and its welcome post exist. Safe to call repeatedly.
   */
  ensureWelcomePost(): Post {
    const system = this.repos.authors.findByEmail(SYSTEM_EMAIL) ?? this.register(SYSTEM_NAME, SYSTEM_EMAIL);
    const existing = this.repos.posts.listByTag(WELCOME_TAG).find((p) => p.authorId === system.id);
    if (existing) return existing;

    return this.createPost(SYSTEM_EMAIL, {
      title: WELCOME_TITLE,
      body: WELCOME_BODY,
      tags: [WELCOME_TAG, 'intro'],
    });
  }

  // ============================================================
  // Comments
  // ============================================================

  addComment(postId: number, body: string, commenter: Commenter): Comment {
    const text = requireText(body, 'Comment');

    let authorName: string;
    let authorId: number | null = null;
    if ('email' in commenter) {
      const author = this.login(commenter.email);
      authorName = author.name;
      authorId = author.id;
    } else {
      authorName = requireText(commenter.name, 'Commenter name');
    }

    return this.repos.posts.addComment(postId, {
      authorName,
      body: text,
      createdAt: formatTimestamp(this.now()),
      authorId,
    });
  }

  listComments(postId: number): Comment[] {
    return this.getPost(postId).comments;
  }

  /**
   * Every comment the session author left, across all posts, in post order.
   * Comments left under a display name belong to nobody.
   */
  listCommentsByAuthor(sessionEmail: string): AuthoredComment[] {
    const author = this.login(sessionEmail);
    return this.repos.posts
      .listAll()
      .flatMap((post) => post.comments.filter((c) => c.authorId === author.id).map((comment) => ({ postId: post.id, comment })));
  }

  /**
   * Edit a comment's text. When the comment belongs to a registered author and a
   * session email is given, the two must match.
   */
  updateComment(postId: number, commentId: number, body: string, sessionEmail?: string): Comment {
    const text = requireText(body, 'Comment');
    const comment = this.getPost(postId).comments.find((c) => c.id === commentId);
    if (!comment) {
      throw new NotFoundError('comment', commentId);
    }
    this.assertCommentOwner(comment, sessionEmail, 'edit');
    return this.repos.posts.updateComment(postId, commentId, text);
  }

  /**
   * @returns false when the post has no such comment
   */
  deleteComment(postId: number, commentId: number, sessionEmail?: string): boolean {
    const comment = this.getPost(postId).comments.find((c) => c.id === commentId);
    if (!comment) return false;
    this.assertCommentOwner(comment, sessionEmail, 'delete');
    return this.repos.posts.deleteComment(postId, commentId);
  }

  /**
   * Author ids that posts and comments point at, including those of deleted authors.
   * New authors never take one of these over.
   */
  private referencedAuthorIds(): Set<number> {
    const ids = new Set<number>();
    for (const post of this.repos.posts.listAll()) {
      ids.add(post.authorId);
      for (const comment of post.comments) {
        if (comment.authorId !== null) ids.add(comment.authorId);
      }
    }
    return ids;
  }

  private assertPostOwner(post: Post, author: Author, action: 'edit' | 'delete'): void {
    if (post.authorId !== author.id) {
      throw new UnauthorizedError(`You cannot ${action} posts written by other authors.`);
    }
  }

  private assertCommentOwner(comment: Comment, sessionEmail: string | undefined, action: 'edit' | 'delete'): void {
    if (comment.authorId === null || sessionEmail === undefined) return;
    const author = this.login(sessionEmail);
    if (author.id !== comment.authorId) {
      throw new UnauthorizedError(`You cannot ${action} comments written by other authors.`);
    }
  }
}
