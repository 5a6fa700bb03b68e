/**
 * In-memory FileSystem for orchestration and CLI tests.
 */

import { basename, dirname } from 'path';
import type { FileSystem } from '../src/io.js';
import type { LogFields, Logger } from '../src/logger.js';

export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, string>();
  readonly dirs = new Set<string>(['/']);
  /** Paths passed to writeFile, in call order */
  readonly writes: string[] = [];
  failRename = false;
  failRemove = false;

  addFile(path: string, content: string): this {
    this.mkdir(dirname(path));
    this.files.set(path, content);
    return this;
  }

  readFile(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    return content;
  }

  writeFile(path: string, content: string): void {
    if (!this.dirs.has(dirname(path))) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    this.writes.push(path);
    this.files.set(path, content);
  }

  rename(from: string, to: string): void {
    const content = this.files.get(from);
    if (this.failRename || content === undefined) throw new Error(`EACCES: permission denied, rename '${from}' -> '${to}'`);
    this.files.delete(from);
    this.files.set(to, content);
  }

  remove(path: string): void {
    if (this.failRemove) throw new Error(`EBUSY: resource busy or locked, unlink '${path}'`);
    this.files.delete(path);
  }

  mkdir(path: string): void {
    for (let dir = path; !this.dirs.has(dir); dir = dirname(dir)) {
      this.dirs.add(dir);
    }
  }

  exists(path: string): boolean {
    return this.files.has(path) || this.dirs.has(path);
  }

  isDirectory(path: string): boolean {
    return this.dirs.has(path);
  }

  readdir(path: string): string[] {
    const entries = [...this.files.keys(), ...this.dirs].filter(p => p !== path && dirname(p) === path);
    return entries.map(p => basename(p));
  }
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  fields?: LogFields;
}

export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (message, fields) => entries.push({ level: 'debug', message, fields }),
    info: (message, fields) => entries.push({ level: 'info', message, fields }),
    warn: (message, fields) => entries.push({ level: 'warn', message, fields }),
    error: (message, fields) => entries.push({ level: 'error', message, fields }),
  };
}

export interface CapturedConsole {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  stdout: string[];
  stderr: string[];
}

export function captureConsole(): CapturedConsole {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    log: (...args) => stdout.push(args.map(String).join(' ')),
    error: (...args) => stderr.push(args.map(String).join(' ')),
  };
}
