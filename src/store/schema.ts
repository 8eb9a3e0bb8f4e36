/**
 * Domain types and their on-disk layouts.
 *
 * Authors live in a CSV file with the columns of AUTHOR_COLUMNS.
 * Posts live in a JSON array of PostRecord objects, each embedding its comments.
 * Every id is written as a decimal string.
 */

export const AUTHORS_FILE = 'autores.csv';
export const POSTS_FILE = 'posts.json';

export const AUTHOR_COLUMNS = ['id_autor', 'nombre_autor', 'email'] as const;

export type AuthorColumn = (typeof AUTHOR_COLUMNS)[number];

export type AuthorRow = Record<AuthorColumn, string>;

export interface Author {
  id: number;
  name: string;
  email: string;
}

export interface Comment {
  id: number;
  authorName: string;
  body: string;
  createdAt: string;
  /** Set when the commenter is a registered author. */
  authorId: number | null;
}

export interface Post {
  id: number;
  authorId: number;
  title: string;
  body: string;
  createdAt: string;
  tags: string[];
  comments: Comment[];
}

export interface CommentRecord {
  id_comentario: string;
  autor: string;
  contenido: string;
  fecha: string;
  id_autor: string;
}

export interface PostRecord {
  id_post: string;
  id_autor: string;
  titulo: string;
  contenido: string;
  fecha_publicacion: string;
  tags: string[];
  comentarios: CommentRecord[];
}

export interface AuthorUpdate {
  name?: string;
  email?: string;
}

export interface PostInsert {
  authorId: number;
  title: string;
  body: string;
  createdAt: string;
  tags: string[];
}

export interface PostUpdate {
  title?: string;
  body?: string;
  tags?: string[];
}

export interface CommentInsert {
  authorName: string;
  body: string;
  createdAt: string;
  authorId: number | null;
}
