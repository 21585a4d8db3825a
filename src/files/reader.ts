/**
 * File Readers
 * File access for include and subninja statements
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileReader } from '../types.js';

/**
 * Reads manifests from disk. Relative paths resolve against `rootDir`,
 * the directory the build runs in, not the including file's directory.
 */
export class NodeFileReader implements FileReader {
  readonly rootDir: string;

  constructor(rootDir: string = process.cwd()) {
    this.rootDir = rootDir;
  }

  readFile(filePath: string): string {
    const absolutePath = path.resolve(this.rootDir, filePath);
    try {
      return fs.readFileSync(absolutePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new Error('No such file or directory', { cause: err });
      }
      throw err;
    }
  }
}

/** Serves manifests from a path-to-content map */
export class InMemoryFileReader implements FileReader {
  private readonly files: Map<string, string>;
  /** Paths requested so far, in order */
  readonly reads: string[] = [];

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  set(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }

  readFile(filePath: string): string {
    this.reads.push(filePath);
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new Error('No such file or directory');
    }
    return content;
  }
}
