/**
 * Guard for the target paths named by a diff
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export class PathGuard {
  private static readonly MAX_FILE_SIZE_MB = 50;

  static sanitizePath(inputPath: string): string {
    // Remove null bytes
    let sanitized = inputPath.replace(/\0/g, '');

    // Normalize path separators
    sanitized = sanitized.replace(/\\/g, '/');

    // Remove redundant separators
    while (sanitized.includes('//')) {
      sanitized = sanitized.replace(/\/\//g, '/');
    }

    // Remove leading ./ and trailing separator
    sanitized = sanitized.replace(/^(\.\/)+/, '').replace(/\/+$/, '');

    return sanitized;
  }

  /** Error message for a path a diff must not touch, or null when it is fine. */
  static validatePath(inputPath: string): string | null {
    const sanitized = this.sanitizePath(inputPath);

    if (sanitized === '') {
      return 'Empty path';
    }
    if (sanitized.split('/').includes('..')) {
      return 'Path traversal detected';
    }

    return null;
  }

  /** Absolute path of `inputPath` under `root`, or null when it would leave it. */
  static resolveWithin(root: string, inputPath: string): string | null {
    if (this.validatePath(inputPath)) {
      return null;
    }
    const resolvedRoot = path.resolve(root);
    const resolved = path.resolve(resolvedRoot, this.sanitizePath(inputPath));
    if (resolved !== resolvedRoot && !resolved.startsWith(resolvedRoot + path.sep)) {
      return null;
    }
    return resolved;
  }

  static async checkFileSize(filePath: string, maxSizeMB: number = this.MAX_FILE_SIZE_MB): Promise<string | null> {
    const stats = await fs.stat(filePath);
    const sizeMB = stats.size / (1024 * 1024);

    if (sizeMB > maxSizeMB) {
      return `File too large: ${sizeMB.toFixed(2)}MB (max: ${maxSizeMB}MB)`;
    }

    return null;
  }
}
