import type { Command } from '@oclif/core';
import chalk from 'chalk';
import type { Author, Comment, Post } from '../../store/index.js';

const UNKNOWN_AUTHOR = '(deleted author)';
const COMMENT_SUMMARY_MAX = 80;

/**
 * Output data as JSON or plain text based on the json flag.
 * @param command The command instance (for this.log)
 * @param json Whether to output as JSON
 * @param data The data to output (for JSON mode)
 * @param plainFn Function to call for plain text output
 */
export function outputJsonOrPlain<T>(command: Command, json: boolean, data: T, plainFn: () => void): void {
  if (json) {
    command.log(JSON.stringify(data, null, 2));
  } else {
    plainFn();
  }
}

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Create a horizontal separator line.
 */
export function tableSeparator(width: number, char = '─'): string {
  return char.repeat(width);
}

export function authorName(names: Map<number, string>, authorId: number): string {
  return names.get(authorId) ?? UNKNOWN_AUTHOR;
}

export function formatAuthor(author: Author): string {
  return `${chalk.cyan(author.name)} ${chalk.gray(`<${author.email}>`)} ${chalk.gray(`#${author.id}`)}`;
}

export function formatTags(tags: string[]): string {
  return tags.map((t) => `#${t}`).join(' ');
}

/**
 * One-line summary of a post for listings.
 */
export function formatPostSummary(post: Post, byline: string): string {
  const tags = post.tags.length > 0 ? ` ${chalk.magenta(formatTags(post.tags))}` : '';
  const comments = post.comments.length > 0 ? chalk.gray(` (${post.comments.length} comment(s))`) : '';
  return `  ${chalk.gray(`#${post.id}`)} ${chalk.cyan(post.title)} ${chalk.gray(`by ${byline}, ${post.createdAt}`)}${tags}${comments}`;
}

/**
 * One-line comment; bodies longer than `maxLen` are truncated.
 */
export function formatComment(comment: Comment, maxLen = COMMENT_SUMMARY_MAX): string {
  const body = truncate(comment.body.replace(/\s*\n\s*/g, ' '), maxLen);
  return `  ${chalk.gray(`#${comment.id}`)} ${chalk.cyan(comment.authorName)} ${chalk.gray(comment.createdAt)}: ${body}`;
}

/**
 * Log a post with its body and comments.
 */
export function logPost(command: Command, post: Post, byline: string): void {
  command.log(chalk.bold(post.title));
  command.log(chalk.gray(`#${post.id} by ${byline}, ${post.createdAt}`));
  if (post.tags.length > 0) {
    command.log(chalk.magenta(formatTags(post.tags)));
  }
  command.log('');
  for (const line of post.body.split('\n')) {
    command.log(line);
  }

  command.log('');
  if (post.comments.length === 0) {
    command.log(chalk.gray('No comments yet.'));
    return;
  }
  command.log(chalk.bold(`Comments (${post.comments.length})`));
  for (const comment of post.comments) {
    command.log(formatComment(comment, Number.POSITIVE_INFINITY));
  }
}
