import { describe, it, expect } from 'vitest';
import { checkHunk, killFile, killHunk, splitHunk, type HunkDamage } from './hunkEditing.js';

const FIRST_FILE = '--- a/f\n+++ b/f\n@@ -1 +1 @@\n-a\n+b\n';
const SECOND_FILE = '--- a/g\n+++ b/g\n@@ -1 +1 @@\n-x\n+y\n';

describe('splitHunk', () => {
  const hunk = '@@ -1,4 +1,4 @@\n a\n-b\n+B\n c\n d\n';

  it('should split a unified hunk at a line and fix both headers', () => {
    const result = splitHunk(hunk, hunk.indexOf(' c'));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.text).toBe('@@ -1,2 +1,2 @@\n a\n-b\n+B\n@@ -3,2 +3,2 @@\n c\n d\n');
    expect(result.value.span).toEqual({ start: 0, end: hunk.length });
  });

  it('should refuse to split at the header', () => {
    const result = splitHunk(hunk, 5);
    expect(!result.ok && result.error.message).toBe("Can't split the hunk at its first or past its last line");
  });

  it('should only split unified hunks', () => {
    const text = '***************\n*** 1 ****\n! ab\n--- 1 ----\n! cd\n';
    const result = splitHunk(text, text.indexOf('! ab'));
    expect(!result.ok && result.error.message).toBe('Can only split unified hunks');
  });
});

describe('killHunk', () => {
  it('should remove one hunk of several', () => {
    const text = FIRST_FILE + '@@ -5 +5 @@\n-c\n+d\n';
    const result = killHunk(text, text.indexOf('@@ -5'));
    expect(result.ok && result.value.text).toBe(FIRST_FILE);
  });

  it('should remove the file header with the last hunk', () => {
    const text = FIRST_FILE + SECOND_FILE;
    const result = killHunk(text, text.indexOf('-a'));
    expect(result.ok && result.value.text).toBe(SECOND_FILE);
    expect(result.ok && result.value.span).toEqual({ start: 0, end: FIRST_FILE.length });
  });
});

describe('killFile', () => {
  it('should remove the section holding the position', () => {
    const text = FIRST_FILE + SECOND_FILE;
    const result = killFile(text, text.indexOf('+y'));
    expect(result.ok && result.value.text).toBe(FIRST_FILE);
  });
});

describe('checkHunk', () => {
  it('should accept a hunk that matches its header', () => {
    const text = '@@ -1,2 +1,2 @@\n a\n-b\n+c\n';
    expect(checkHunk(text, 0)).toEqual({ ok: true, value: { text, fixed: false } });
  });

  it('should accept a well-formed context hunk', () => {
    const text = '***************\n*** 1,2 ****\n  a\n! b\n--- 1,2 ----\n  a\n! c\n';
    expect(checkHunk(text, 0).ok).toBe(true);
  });

  it('should restore the lost whitespace of an empty line', () => {
    const text = '@@ -1,2 +1,2 @@\n\n-b\n+c\n';
    const asked: Array<[HunkDamage, number]> = [];

    const refused = checkHunk(text, 0, { validUnifiedEmptyLine: false });
    expect(!refused.ok && refused.error.message).toBe('Hunk seems to have lost the leading whitespace of a line');

    const fixed = checkHunk(text, 0, {
      validUnifiedEmptyLine: false,
      autoFix: (damage, line) => {
        asked.push([damage, line]);
        return true;
      },
    });
    expect(fixed).toEqual({ ok: true, value: { text: '@@ -1,2 +1,2 @@\n \n-b\n+c\n', fixed: true } });
    expect(asked).toEqual([['whitespace-loss', 16]]);
  });

  it('should rejoin a line broken by word wrapping', () => {
    const text = '@@ -1,2 +1,2 @@\n a\n-b is\nlong\n+c\n';

    const refused = checkHunk(text, 0);
    expect(!refused.ok && refused.error.message).toBe('Hunk seriously malformed');

    const fixed = checkHunk(text, 0, { autoFix: () => true });
    expect(fixed.ok && fixed.value.text).toBe('@@ -1,2 +1,2 @@\n a\n-b islong\n+c\n');
  });

  it('should report a body shorter than the header', () => {
    const result = checkHunk('@@ -1,3 +1,3 @@\n a\n', 0);
    expect(!result.ok && result.error.message).toBe('Hunk is shorter than its header says');
  });

  it('should report surplus old lines', () => {
    const result = checkHunk('@@ -1,1 +1,2 @@\n a\n-b\n+c\n', 0);
    expect(!result.ok && result.error.message).toBe('Hunk has more old lines than its header says');
  });
});
