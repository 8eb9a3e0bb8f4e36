import { randomBytes } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { type FileOperation, IOFailureError } from './errors.js';

function wrap<T>(filePath: string, operation: FileOperation, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new IOFailureError(filePath, operation, error);
  }
}

/**
 * Create `filePath` (and its parent directory) with `initialContent` if it does not exist yet.
 * Existing files are never touched.
 * @returns true when the file was created
 */
export function ensureFile(filePath: string, initialContent: string): boolean {
  return wrap(filePath, 'create', () => {
    if (fs.existsSync(filePath)) return false;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    // 'wx' so a file created between the check and the write is left alone
    try {
      fs.writeFileSync(filePath, initialContent, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') return false;
      throw error;
    }
    return true;
  });
}

export function readTextFile(filePath: string): string {
  return wrap(filePath, 'read', () => fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Replace the contents of `filePath` by writing a temp file in the same directory
 * and renaming it over the target. Readers see either the old or the new content.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  wrap(filePath, 'write', () => {
    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });

    const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`);
    try {
      fs.writeFileSync(tmpPath, content, 'utf-8');
      fs.renameSync(tmpPath, filePath);
    } catch (error) {
      fs.rmSync(tmpPath, { force: true });
      throw error;
    }
  });
}
