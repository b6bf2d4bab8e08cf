/**
 * Buffers of target files. Hunks are applied to buffers; buffers reach the
 * store only when saved, so unsaved edits are visible to later lookups.
 */

import { TargetIOError, describeError, err, ok, type Result } from '../errors.js';
import type { Span } from '../engine/text.js';
import { PathGuard } from './pathGuard.js';
import type { FileStore, RevisionReader } from './fileStore.js';

export interface TextBuffer {
  path: string;
  text: string;
  modified: boolean;
  /** Marked for removal from the store on save */
  deleted: boolean;
  /** Whether the store held the file when the buffer was opened */
  existed: boolean;
}

export class Workspace {
  private readonly buffers = new Map<string, TextBuffer>();

  constructor(
    readonly store: FileStore,
    private readonly revisions?: RevisionReader
  ) {}

  private key(filePath: string): string {
    return PathGuard.sanitizePath(filePath);
  }

  async exists(filePath: string): Promise<boolean> {
    const buffer = this.buffers.get(this.key(filePath));
    if (buffer) return !buffer.deleted;
    try {
      return await this.store.exists(filePath);
    } catch {
      return false;
    }
  }

  async open(filePath: string): Promise<Result<TextBuffer, TargetIOError>> {
    const key = this.key(filePath);
    const cached = this.buffers.get(key);
    if (cached && !cached.deleted) return ok(cached);

    try {
      const text = await this.store.read(filePath);
      const buffer: TextBuffer = { path: key, text, modified: false, deleted: false, existed: true };
      this.buffers.set(key, buffer);
      return ok(buffer);
    } catch (error) {
      return err(new TargetIOError(`Cannot read ${filePath}: ${describeError(error)}`, filePath, error));
    }
  }

  /** A new, unsaved buffer for a file the store does not have yet. */
  create(filePath: string, text = ''): TextBuffer {
    const key = this.key(filePath);
    const buffer: TextBuffer = { path: key, text, modified: true, deleted: false, existed: false };
    this.buffers.set(key, buffer);
    return buffer;
  }

  async readRevision(filePath: string, revision: string): Promise<Result<string, TargetIOError>> {
    if (!this.revisions) {
      return err(new TargetIOError(`No revision reader to fetch ${filePath}@${revision}`, filePath));
    }
    try {
      return ok(await this.revisions.read(filePath, revision));
    } catch (error) {
      return err(new TargetIOError(`Cannot read ${filePath}@${revision}: ${describeError(error)}`, filePath, error));
    }
  }

  replace(buffer: TextBuffer, span: Span, replacement: string): void {
    buffer.text = buffer.text.slice(0, span.start) + replacement + buffer.text.slice(span.end);
    buffer.modified = true;
  }

  markDeleted(buffer: TextBuffer): void {
    buffer.deleted = true;
    buffer.modified = true;
  }

  get modifiedBuffers(): TextBuffer[] {
    return [...this.buffers.values()].filter((buffer) => buffer.modified);
  }

  async save(buffer: TextBuffer): Promise<Result<TextBuffer, TargetIOError>> {
    try {
      if (buffer.deleted) {
        if (buffer.existed) await this.store.remove(buffer.path);
        this.buffers.delete(buffer.path);
      } else {
        await this.store.write(buffer.path, buffer.text);
        buffer.existed = true;
      }
      buffer.modified = false;
      return ok(buffer);
    } catch (error) {
      const verb = buffer.deleted ? 'delete' : 'save';
      return err(new TargetIOError(`Cannot ${verb} ${buffer.path}: ${describeError(error)}`, buffer.path, error));
    }
  }

  /** Save every modified buffer; failures do not stop the others. */
  async saveAll(): Promise<{ saved: string[]; errors: TargetIOError[] }> {
    const saved: string[] = [];
    const errors: TargetIOError[] = [];
    for (const buffer of this.modifiedBuffers) {
      const result = await this.save(buffer);
      if (result.ok) {
        saved.push(buffer.path);
      } else {
        errors.push(result.error);
      }
    }
    return { saved, errors };
  }
}
