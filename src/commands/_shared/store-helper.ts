import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Command } from '@oclif/core';
import chalk from 'chalk';
import { BlogService } from '../../blog/index.js';
import { BlogStore, isBlogError } from '../../store/index.js';

const DATA_DIR_NAME = 'data';

/**
 * Walk up from `startDir` looking for a package.json.
 * Returns the directory containing it, or null at the filesystem root.
 */
export function findProjectRoot(startDir: string = path.dirname(fileURLToPath(import.meta.url))): string | null {
  let dir = startDir;
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null; // reached filesystem root
    dir = parent;
  }
}

/**
 * Resolve the data directory from the flag value.
 * Priority: explicit flag > POSTBOOK_DATA_DIR env var > <project root>/data.
 * The working directory never matters.
 */
export function resolveDataDir(dataDir: string | undefined, command: Command): string {
  if (dataDir) return path.resolve(dataDir);
  const envDir = process.env.POSTBOOK_DATA_DIR;
  if (envDir) return path.resolve(envDir);
  const root = findProjectRoot();
  if (!root) {
    command.error(chalk.red('Could not locate the postbook installation.\nSpecify --data-dir <path> or set POSTBOOK_DATA_DIR.'));
  }
  return path.join(root, DATA_DIR_NAME);
}

/**
 * Resolve the email of the author a command acts as.
 * Priority: --as flag > POSTBOOK_AUTHOR env var.
 */
export function resolveSessionEmail(as: string | undefined, command: Command): string {
  const email = optionalSessionEmail(as);
  if (!email) {
    command.error(chalk.red('This command needs an author: pass --as <email> or set POSTBOOK_AUTHOR.'));
  }
  return email;
}

/**
 * Session email when one was given, without requiring it.
 */
export function optionalSessionEmail(as: string | undefined): string | undefined {
  return as || process.env.POSTBOOK_AUTHOR || undefined;
}

/**
 * Open the store for a data directory, creating the directory and files on first use.
 */
export function openStore(dataDir: string | undefined, command: Command): BlogStore {
  const store = new BlogStore(resolveDataDir(dataDir, command));
  try {
    store.initialize();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    command.error(chalk.red(`Failed to initialize data files: ${message}`));
  }
  return store;
}

/**
 * Run `fn` against a freshly opened store and blog service.
 * Blog errors (validation, missing records, I/O) are reported through command.error();
 * anything else propagates untouched.
 */
export async function withStore<T>(
  dataDir: string | undefined,
  command: Command,
  fn: (blog: BlogService, store: BlogStore) => Promise<T> | T
): Promise<T> {
  const store = openStore(dataDir, command);
  try {
    return await fn(new BlogService(store), store);
  } catch (error) {
    if (isBlogError(error)) {
      command.error(chalk.red(error.message));
    }
    throw error;
  }
}
