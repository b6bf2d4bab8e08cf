/**
 * File contents at a git revision, through `git show`
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { RevisionReader } from '@hunkwise/diff';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 64 * 1024 * 1024;

export class GitRevisionReader implements RevisionReader {
  constructor(private readonly cwd: string) {}

  async read(filePath: string, revision: string): Promise<string> {
    // `./` makes the path relative to cwd rather than to the repository root.
    const { stdout } = await execFileAsync('git', ['show', `${revision}:./${filePath}`], {
      cwd: this.cwd,
      encoding: 'utf8',
      maxBuffer: MAX_BUFFER,
    });
    return stdout;
  }
}
