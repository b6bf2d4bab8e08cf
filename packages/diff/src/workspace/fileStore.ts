/**
 * Storage the workspace reads target files from and saves them to
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PathGuard } from './pathGuard.js';

export interface FileStore {
  exists(filePath: string): Promise<boolean>;
  read(filePath: string): Promise<string>;
  write(filePath: string, text: string): Promise<void>;
  remove(filePath: string): Promise<void>;
}

/** Source of file contents at a version-control revision. */
export interface RevisionReader {
  read(filePath: string, revision: string): Promise<string>;
}

/** Files on disk below `root`; paths escaping it are rejected. */
export class NodeFileStore implements FileStore {
  constructor(
    readonly root: string = process.cwd(),
    private readonly maxFileSizeMB?: number
  ) {}

  private resolve(filePath: string): string {
    const resolved = PathGuard.resolveWithin(this.root, filePath);
    if (!resolved) {
      throw new Error(`Path outside of ${this.root}: ${filePath}`);
    }
    return resolved;
  }

  async exists(filePath: string): Promise<boolean> {
    const resolved = PathGuard.resolveWithin(this.root, filePath);
    if (!resolved) return false;
    try {
      const stats = await fs.stat(resolved);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async read(filePath: string): Promise<string> {
    const resolved = this.resolve(filePath);
    const sizeError = await PathGuard.checkFileSize(resolved, this.maxFileSizeMB);
    if (sizeError) {
      throw new Error(sizeError);
    }
    return fs.readFile(resolved, 'utf-8');
  }

  async write(filePath: string, text: string): Promise<void> {
    const resolved = this.resolve(filePath);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, text, 'utf-8');
  }

  async remove(filePath: string): Promise<void> {
    await fs.unlink(this.resolve(filePath));
  }
}

/** Files held in a map, keyed by sanitized path. */
export class MemoryFileStore implements FileStore {
  private readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [filePath, text] of Object.entries(files)) {
      this.files.set(PathGuard.sanitizePath(filePath), text);
    }
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(PathGuard.sanitizePath(filePath));
  }

  async read(filePath: string): Promise<string> {
    const text = this.files.get(PathGuard.sanitizePath(filePath));
    if (text === undefined) {
      throw new Error(`No such file: ${filePath}`);
    }
    return text;
  }

  async write(filePath: string, text: string): Promise<void> {
    this.files.set(PathGuard.sanitizePath(filePath), text);
  }

  async remove(filePath: string): Promise<void> {
    if (!this.files.delete(PathGuard.sanitizePath(filePath))) {
      throw new Error(`No such file: ${filePath}`);
    }
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.files);
  }
}
