import { IOFailureError, NotFoundError } from '../errors.js';
import { ensureFile, readTextFile, writeFileAtomic } from '../file-io.js';
import { nextId, parseId } from '../ids.js';
import type {
  Comment,
  CommentInsert,
  CommentRecord,
  Post,
  PostInsert,
  PostRecord,
  PostUpdate,
} from '../schema.js';

/**
 * Post persistence. Comments are stored inside their post.
 * The repository never consults the author store.
 */
export interface PostRepository {
  create(input: PostInsert): Post;
  findById(id: number): Post | null;
  listAll(): Post[];
  listByAuthor(authorId: number): Post[];
  listByTag(tag: string): Post[];
  update(id: number, changes: PostUpdate): Post;
  delete(id: number): boolean;
  addComment(postId: number, input: CommentInsert): Comment;
  updateComment(postId: number, commentId: number, body: string): Comment;
  deleteComment(postId: number, commentId: number): boolean;
}

const JSON_INDENT = 4;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function decodeComment(raw: unknown): Comment | null {
  if (!isObject(raw)) return null;
  const authorId = parseId(raw.id_autor);
  return {
    id: parseId(raw.id_comentario),
    authorName: text(raw.autor),
    body: text(raw.contenido),
    createdAt: text(raw.fecha),
    authorId: authorId > 0 ? authorId : null,
  };
}

function decodePost(raw: Record<string, unknown>): Post {
  const tags = Array.isArray(raw.tags) ? raw.tags.filter((t): t is string => typeof t === 'string') : [];
  const comments = Array.isArray(raw.comentarios)
    ? raw.comentarios.map(decodeComment).filter((c): c is Comment => c !== null)
    : [];
  return {
    id: parseId(raw.id_post),
    authorId: parseId(raw.id_autor),
    title: text(raw.titulo),
    body: text(raw.contenido),
    createdAt: text(raw.fecha_publicacion),
    tags,
    comments,
  };
}

function encodeComment(comment: Comment): CommentRecord {
  return {
    id_comentario: String(comment.id),
    autor: comment.authorName,
    contenido: comment.body,
    fecha: comment.createdAt,
    id_autor: comment.authorId === null ? '' : String(comment.authorId),
  };
}

function encodePost(post: Post): PostRecord {
  return {
    id_post: String(post.id),
    id_autor: String(post.authorId),
    titulo: post.title,
    contenido: post.body,
    fecha_publicacion: post.createdAt,
    tags: [...post.tags],
    comentarios: post.comments.map(encodeComment),
  };
}

/**
 * PostRepository over a JSON file holding a single array, in insertion order.
 * Every write reads the whole array, changes it, and replaces the file atomically.
 */
export class JsonPostRepository implements PostRepository {
  constructor(private readonly filePath: string) {}

  /**
   * Create the file as an empty array if it is missing.
   */
  initialize(): boolean {
    return ensureFile(this.filePath, '[]');
  }

  create(input: PostInsert): Post {
    const posts = this.load();
    const post: Post = {
      id: nextId(posts.map((p) => p.id)),
      authorId: input.authorId,
      title: input.title,
      body: input.body,
      createdAt: input.createdAt,
      tags: [...input.tags],
      comments: [],
    };
    posts.push(post);
    this.save(posts);
    return post;
  }

  findById(id: number): Post | null {
    return this.load().find((p) => p.id === id) ?? null;
  }

  listAll(): Post[] {
    return this.load();
  }

  listByAuthor(authorId: number): Post[] {
    return this.load().filter((p) => p.authorId === authorId);
  }

  /**
   * Posts carrying `tag`, compared case-insensitively.
   */
  listByTag(tag: string): Post[] {
    const wanted = tag.trim().toLowerCase();
    return this.load().filter((p) => p.tags.some((t) => t.toLowerCase() === wanted));
  }

  update(id: number, changes: PostUpdate): Post {
    const posts = this.load();
    const idx = this.indexOf(posts, id);

    const post = { ...posts[idx] };
    if (changes.title !== undefined) post.title = changes.title;
    if (changes.body !== undefined) post.body = changes.body;
    if (changes.tags !== undefined) post.tags = [...changes.tags];

    posts[idx] = post;
    this.save(posts);
    return post;
  }

  delete(id: number): boolean {
    const posts = this.load();
    const remaining = posts.filter((p) => p.id !== id);
    if (remaining.length === posts.length) return false;
    this.save(remaining);
    return true;
  }

  /**
   * Append a comment to a post. Comment ids are allocated per post.
   */
  addComment(postId: number, input: CommentInsert): Comment {
    const posts = this.load();
    const idx = this.indexOf(posts, postId);
    const post = posts[idx];

    const comment: Comment = {
      id: nextId(post.comments.map((c) => c.id)),
      authorName: input.authorName,
      body: input.body,
      createdAt: input.createdAt,
      authorId: input.authorId,
    };
    posts[idx] = { ...post, comments: [...post.comments, comment] };
    this.save(posts);
    return comment;
  }

  updateComment(postId: number, commentId: number, body: string): Comment {
    const posts = this.load();
    const idx = this.indexOf(posts, postId);
    const post = posts[idx];

    const cidx = post.comments.findIndex((c) => c.id === commentId);
    if (cidx === -1) {
      throw new NotFoundError('comment', commentId);
    }

    const comment = { ...post.comments[cidx], body };
    const comments = [...post.comments];
    comments[cidx] = comment;
    posts[idx] = { ...post, comments };
    this.save(posts);
    return comment;
  }

  deleteComment(postId: number, commentId: number): boolean {
    const posts = this.load();
    const idx = this.indexOf(posts, postId);
    const post = posts[idx];

    const comments = post.comments.filter((c) => c.id !== commentId);
    if (comments.length === post.comments.length) return false;
    posts[idx] = { ...post, comments };
    this.save(posts);
    return true;
  }

  private indexOf(posts: Post[], id: number): number {
    const idx = posts.findIndex((p) => p.id === id);
    if (idx === -1) {
      throw new NotFoundError('post', id);
    }
    return idx;
  }

  private load(): Post[] {
    this.initialize();
    const content = readTextFile(this.filePath);

    let parsed: unknown;
    try {
      parsed = content.trim() === '' ? [] : JSON.parse(content);
    } catch (error) {
      throw new IOFailureError(this.filePath, 'parse', error);
    }

    if (!Array.isArray(parsed)) {
      throw new IOFailureError(this.filePath, 'parse', new Error('expected a JSON array of posts'));
    }

    return parsed.map((entry, index) => {
      if (!isObject(entry)) {
        throw new IOFailureError(this.filePath, 'parse', new Error(`entry ${index} is not an object`));
      }
      return decodePost(entry);
    });
  }

  private save(posts: Post[]): void {
    writeFileAtomic(this.filePath, JSON.stringify(posts.map(encodePost), null, JSON_INDENT));
  }
}
