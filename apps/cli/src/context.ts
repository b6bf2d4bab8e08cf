/**
 * What every command needs: configuration, output, file access
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { NodeFileStore, Workspace, type FileStore, type RevisionReader } from '@hunkwise/diff';
import type { ConfigManager } from './config/ConfigManager.js';
import type { StatusReporter } from './display/StatusReporter.js';
import { GitRevisionReader } from './vcs/GitRevisionReader.js';

/** Reading patches and writing rewritten ones. `-` names standard input. */
export interface PatchIO {
  read(file: string): Promise<string>;
  write(file: string, text: string): Promise<void>;
}

export interface WorkspaceOptions {
  /** Discard writes instead of saving them */
  dryRun?: boolean;
}

export interface CliContext {
  config: ConfigManager;
  reporter: StatusReporter;
  io: PatchIO;
  openWorkspace(directory: string, options?: WorkspaceOptions): Workspace;
  /** Set to non-zero by a command that failed */
  exitCode: number;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export const nodePatchIO: PatchIO = {
  read: (file) => (file === '-' ? readStdin() : fs.readFile(file, 'utf-8')),
  write: (file, text) => fs.writeFile(file, text, 'utf-8'),
};

/** Passes reads through to another store and drops every write. */
export class DryRunStore implements FileStore {
  constructor(private readonly inner: FileStore) {}

  exists(filePath: string): Promise<boolean> {
    return this.inner.exists(filePath);
  }

  read(filePath: string): Promise<string> {
    return this.inner.read(filePath);
  }

  async write(): Promise<void> {}

  async remove(): Promise<void> {}
}

export function nodeWorkspace(directory: string, options: WorkspaceOptions = {}): Workspace {
  const root = path.resolve(directory);
  const store = new NodeFileStore(root);
  const revisions: RevisionReader = new GitRevisionReader(root);
  return new Workspace(options.dryRun ? new DryRunStore(store) : store, revisions);
}
