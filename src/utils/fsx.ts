/**
 * File system utilities for reading fixtures, writing results and locating executables
 */

import { readFile, writeFile, access, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import { delimiter, join } from 'node:path';
import { debugError } from './debug.js';

export type FileOperation = 'read' | 'write';

/**
 * Raised for any failure reading or writing a file named on the command line
 */
export class FileAccessError extends Error {
  readonly path: string;
  readonly operation: FileOperation;
  readonly code: string | undefined;

  constructor(path: string, operation: FileOperation, cause: NodeJS.ErrnoException) {
    super(describeErrno(path, operation, cause), { cause });
    this.name = 'FileAccessError';
    this.path = path;
    this.operation = operation;
    this.code = cause.code;
  }
}

function describeErrno(path: string, operation: FileOperation, err: NodeJS.ErrnoException): string {
  switch (err.code) {
    case 'ENOENT':
      return operation === 'read'
        ? `File not found: "${path}"`
        : `Directory does not exist for output file: "${path}"`;
    case 'EACCES':
    case 'EPERM':
      return `Permission denied: "${path}"`;
    case 'EISDIR':
      return `Path is a directory, not a file: "${path}"`;
    case 'EMFILE':
      return `Too many open files. Cannot ${operation}: "${path}"`;
    case 'ENOSPC':
      return `No space left on device while writing: "${path}"`;
    default:
      return `Failed to ${operation} file "${path}": ${err.message}`;
  }
}

function toErrno(error: unknown): NodeJS.ErrnoException {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read a file as raw bytes
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    const err = toErrno(error);
    debugError('fsx', 'readBytes', { filePath, code: err.code, message: err.message });
    throw new FileAccessError(filePath, 'read', err);
  }
}

/**
 * Fail with a FileAccessError unless the file can be opened for reading
 */
export async function ensureReadable(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch (error) {
    const err = toErrno(error);
    debugError('fsx', 'ensureReadable', { filePath, code: err.code, message: err.message });
    throw new FileAccessError(filePath, 'read', err);
  }
}

/**
 * Write text verbatim as UTF-8, replacing any existing file.
 * The write is not atomic: a failure part way through can leave a partial file.
 */
export async function writeText(filePath: string, text: string): Promise<void> {
  try {
    await writeFile(filePath, text, 'utf8');
  } catch (error) {
    const err = toErrno(error);
    debugError('fsx', 'writeText', { filePath, code: err.code, message: err.message });
    throw new FileAccessError(filePath, 'write', err);
  }
}

/**
 * Look up an executable by name in a PATH-style search list.
 * Returns the first candidate that is a regular executable file, or null.
 */
export async function findExecutable(name: string, searchPath: string | undefined): Promise<string | null> {
  if (!searchPath) {
    return null;
  }

  for (const dir of searchPath.split(delimiter)) {
    if (dir === '') {
      continue;
    }
    const candidate = join(dir, name);
    try {
      if ((await stat(candidate)).isFile()) {
        await access(candidate, constants.X_OK);
        return candidate;
      }
    } catch {
      // not in this directory
    }
  }
  return null;
}
