import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { PathGuard } from './pathGuard.js';

describe('PathGuard', () => {
  it('should normalize separators', () => {
    expect(PathGuard.sanitizePath('.//a\\b//c/')).toBe('a/b/c');
    expect(PathGuard.sanitizePath('a\0b')).toBe('ab');
  });

  it('should reject empty and escaping paths', () => {
    expect(PathGuard.validatePath('./')).toBe('Empty path');
    expect(PathGuard.validatePath('../x')).toBe('Path traversal detected');
    expect(PathGuard.validatePath('a/../../b')).toBe('Path traversal detected');
    expect(PathGuard.validatePath('a/b')).toBeNull();
  });

  it('should resolve paths inside the root only', () => {
    const root = path.resolve('/srv/project');
    expect(PathGuard.resolveWithin(root, 'a/b')).toBe(path.join(root, 'a', 'b'));
    expect(PathGuard.resolveWithin(root, '../etc')).toBeNull();
    expect(PathGuard.resolveWithin(root, '/etc/passwd')).toBeNull();
  });

  describe('checkFileSize', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pathguard-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should flag files over the limit', async () => {
      const file = path.join(dir, 'small.txt');
      await fs.writeFile(file, '0123456789');
      expect(await PathGuard.checkFileSize(file)).toBeNull();
      expect(await PathGuard.checkFileSize(file, 0)).toBe('File too large: 0.00MB (max: 0MB)');
    });
  });
});
