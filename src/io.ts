/**
 * File I/O at the compiler boundary.
 *
 * Everything goes through the FileSystem interface so the orchestration can
 * run against an in-memory fake; nodeFileSystem is the real implementation.
 */

import { mkdirSync, readFileSync, readdirSync, renameSync, statSync, writeFileSync, existsSync, unlinkSync } from 'fs';
import { dirname, join } from 'path';

export interface FileSystem {
  readFile(path: string): string;
  writeFile(path: string, content: string): void;
  rename(from: string, to: string): void;
  /** Succeeds when the file does not exist */
  remove(path: string): void;
  /** Recursive; succeeds when the directory exists */
  mkdir(path: string): void;
  exists(path: string): boolean;
  isDirectory(path: string): boolean;
  readdir(path: string): string[];
}

export const nodeFileSystem: FileSystem = {
  readFile: path => readFileSync(path, 'utf-8'),
  writeFile: (path, content) => writeFileSync(path, content),
  rename: (from, to) => renameSync(from, to),
  remove: path => {
    if (existsSync(path)) unlinkSync(path);
  },
  mkdir: path => {
    mkdirSync(path, { recursive: true });
  },
  exists: path => existsSync(path),
  isDirectory: path => statSync(path).isDirectory(),
  readdir: path => readdirSync(path),
};

export type IOOperation = 'read' | 'write' | 'mkdir' | 'stat' | 'list';

export class SchemaIOError extends Error {
  readonly operation: IOOperation;
  readonly path: string;

  constructor(operation: IOOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = 'SchemaIOError';
    this.operation = operation;
    this.path = path;
  }
}

function attempt<T>(operation: IOOperation, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new SchemaIOError(operation, path, err);
  }
}

export const SCHEMA_EXTENSION = '.zed';

export interface SchemaInput {
  source: string;
  /** Files that contributed, in concatenation order */
  files: string[];
}

/**
 * Read a schema file, or every `.zed` file of a directory (name order,
 * joined by newlines) as one document.
 */
export function readSchemaInput(path: string, fs: FileSystem): SchemaInput {
  if (!attempt('stat', path, () => fs.exists(path))) {
    throw new SchemaIOError('read', path, new Error('no such file or directory'));
  }

  if (!attempt('stat', path, () => fs.isDirectory(path))) {
    return { source: attempt('read', path, () => fs.readFile(path)), files: [path] };
  }

  const files = attempt('list', path, () => fs.readdir(path))
    .filter(name => name.endsWith(SCHEMA_EXTENSION))
    .sort()
    .map(name => join(path, name));

  if (files.length === 0) {
    throw new SchemaIOError('list', path, new Error(`no ${SCHEMA_EXTENSION} files found`));
  }

  const parts = files.map(file => attempt('read', file, () => fs.readFile(file)));
  return { source: parts.join('\n'), files };
}

export type WriteStatus = 'written' | 'unchanged';

/**
 * Write through a temporary sibling and rename it over the target, so the
 * target is either the old content or the complete new content. The
 * temporary file is removed when either step fails.
 */
export function writeArtifact(path: string, content: string, fs: FileSystem): WriteStatus {
  const dir = dirname(path);
  attempt('mkdir', dir, () => fs.mkdir(dir));

  if (fs.exists(path) && attempt('read', path, () => fs.readFile(path)) === content) {
    return 'unchanged';
  }

  const tmp = `${path}.tmp`;
  try {
    attempt('write', tmp, () => fs.writeFile(tmp, content));
    attempt('write', path, () => fs.rename(tmp, path));
  } catch (err) {
    discardTemporary(tmp, err, fs);
    throw err;
  }
  return 'written';
}

/** Remove a leftover temporary file; a failed removal is reported together with the write error. */
function discardTemporary(tmp: string, writeError: unknown, fs: FileSystem): void {
  try {
    fs.remove(tmp);
  } catch (removeError) {
    const reason = writeError instanceof Error ? writeError.message : String(writeError);
    throw new SchemaIOError('write', tmp, new AggregateError([writeError, removeError], `${reason}; ${tmp} could not be removed`));
  }
}
