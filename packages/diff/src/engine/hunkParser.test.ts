import { describe, it, expect } from 'vitest';
import {
  beginningOfHunk,
  extractHunkText,
  findHunkBounds,
  hunkStyleAt,
  nextHunkStart,
  parseHeader,
  parseHunk,
} from './hunkParser.js';

const UNIFIED = '@@ -1,3 +1,3 @@ fn\n a\n-b\n+B\n c\n';

const CONTEXT = ['***************', '*** 1,3 ****', '  a', '! b', '  c', '--- 1,3 ----', '  a', '! B', '  c', ''].join('\n');

const NORMAL = '2c2\n< b\n---\n> B\n';

const TWO_HUNKS = ['--- a/f', '+++ b/f', '@@ -1,2 +1,2 @@', '-x', '+y', ' z', '@@ -10 +10 @@', '-p', '+q', ''].join('\n');

describe('hunk headers', () => {
  it('should recognize each header style', () => {
    expect(hunkStyleAt(UNIFIED, 0)).toBe('unified');
    expect(hunkStyleAt(CONTEXT, 0)).toBe('context');
    expect(hunkStyleAt(NORMAL, 0)).toBe('normal');
    expect(hunkStyleAt('@@ -x +1 @@\n', 0)).toBeNull();
    expect(hunkStyleAt('hello\n', 0)).toBeNull();
  });

  it('should parse unified ranges and the section text', () => {
    const header = parseHeader(UNIFIED, 0);
    expect(header.ok && header.value).toMatchObject({
      style: 'unified',
      old: { start: 1, count: 3, explicitCount: true },
      new: { start: 1, count: 3, explicitCount: true },
      section: ' fn',
      start: 0,
      end: 19,
    });
  });

  it('should default a missing unified count to one', () => {
    const header = parseHeader('@@ -10 +10 @@\n-p\n+q\n', 0);
    expect(header.ok && header.value.old).toEqual({ start: 10, count: 1, explicitCount: false });
  });

  it('should parse normal commands', () => {
    const header = parseHeader('1a2,3\n> x\n> y\n', 0);
    expect(header.ok && header.value).toMatchObject({
      style: 'normal',
      command: 'a',
      old: { start: 1, count: 0 },
      new: { start: 2, count: 2, explicitCount: true },
    });
  });

  it('should reject unrecognizable headers', () => {
    const plain = parseHeader('hello\n', 0);
    expect(plain.ok).toBe(false);
    expect(!plain.ok && plain.error.message).toBe('Not recognizable hunk header');

    const banner = parseHeader('***************\nfoo\n', 0);
    expect(!banner.ok && banner.error.message).toBe('Unrecognized context diff first hunk header format');
  });
});

describe('parseHunk', () => {
  it('should split a unified hunk into classified lines', () => {
    const hunk = parseHunk(UNIFIED, 0);
    expect(hunk.ok).toBe(true);
    if (!hunk.ok) return;
    expect(hunk.value.end).toBe(UNIFIED.length);
    expect(hunk.value.lines.map((line) => [line.kind, line.content])).toEqual([
      ['context', 'a'],
      ['removed', 'b'],
      ['added', 'B'],
      ['context', 'c'],
    ]);
  });

  it('should assign context hunk lines to their blocks', () => {
    const hunk = parseHunk(CONTEXT, 0);
    expect(hunk.ok).toBe(true);
    if (!hunk.ok) return;
    expect(hunk.value.header.midHeader).toBeDefined();
    expect(hunk.value.lines.map((line) => `${line.block}:${line.kind}:${line.content}`)).toEqual([
      'old:context:a',
      'old:changed:b',
      'old:context:c',
      'new:context:a',
      'new:changed:B',
      'new:context:c',
    ]);
  });

  it('should settle single-number context ranges from the body', () => {
    const hunk = parseHunk('***************\n*** 2 ****\n--- 3 ----\n+ x\n', 0);
    expect(hunk.ok).toBe(true);
    if (!hunk.ok) return;
    expect(hunk.value.header.old.count).toBe(0);
    expect(hunk.value.header.new.count).toBe(1);
  });

  it('should scan the body when the header is not trusted', () => {
    const text = '@@ -1,5 +1,5 @@\n a\n-b\n+c\n';
    const trusted = parseHunk(text, 0);
    expect(trusted.ok && trusted.value.end).toBe(text.length);

    const scanned = parseHunk('@@ -1 +1 @@\n-a\n+b\n\n', 0, { dontTrustHeader: true });
    expect(scanned.ok && scanned.value.end).toBe(18);
  });
});

describe('hunk bounds', () => {
  it('should find the hunk enclosing or following a position', () => {
    expect(findHunkBounds(TWO_HUNKS, 0)).toEqual({ ok: true, value: { start: 16, end: 41 } });
    expect(findHunkBounds(TWO_HUNKS, 36)).toEqual({ ok: true, value: { start: 16, end: 41 } });
    expect(findHunkBounds(TWO_HUNKS, 56)).toEqual({ ok: true, value: { start: 41, end: 61 } });
  });

  it('should step between headers', () => {
    expect(beginningOfHunk(TWO_HUNKS, 10)).toBeNull();
    expect(beginningOfHunk(TWO_HUNKS, 36)).toBe(16);
    expect(nextHunkStart(TWO_HUNKS, 17)).toBe(41);
    expect(nextHunkStart(TWO_HUNKS, 42)).toBeNull();
  });
});

describe('extractHunkText', () => {
  it('should extract both sides of each style', () => {
    const text = (hunk: string, side: 'old' | 'new') => {
      const extracted = extractHunkText(hunk, side);
      return extracted.ok ? extracted.value.text : extracted.error.message;
    };
    expect(text(UNIFIED, 'old')).toBe('a\nb\nc\n');
    expect(text(UNIFIED, 'new')).toBe('a\nB\nc\n');
    expect(text(CONTEXT, 'old')).toBe('a\nb\nc\n');
    expect(text(CONTEXT, 'new')).toBe('a\nB\nc\n');
    expect(text(NORMAL, 'old')).toBe('b\n');
    expect(text(NORMAL, 'new')).toBe('B\n');
  });

  it('should use the new block for an omitted old block', () => {
    const hunk = '***************\n*** 1 ****\n--- 1,2 ----\n  a\n+ b\n';
    const old = extractHunkText(hunk, 'old');
    const added = extractHunkText(hunk, 'new');
    expect(old.ok && old.value.text).toBe('a\n');
    expect(added.ok && added.value.text).toBe('a\nb\n');
  });

  it('should drop the newline before a no-newline marker', () => {
    const hunk = '@@ -1 +1 @@\n-a\n\\ No newline at end of file\n+b\n';
    const old = extractHunkText(hunk, 'old');
    const added = extractHunkText(hunk, 'new');
    expect(old.ok && old.value.text).toBe('a');
    expect(added.ok && added.value.text).toBe('b\n');
  });

  it('should map a hunk offset into the extracted text', () => {
    const extracted = extractHunkText(UNIFIED, 'new', 26);
    expect(extracted).toEqual({ ok: true, value: { text: 'a\nB\nc\n', offset: 2 } });
  });

  it('should give nothing for the missing side of a normal add', () => {
    const extracted = extractHunkText('1a2\n> x\n', 'old');
    expect(extracted).toEqual({ ok: true, value: { text: '', offset: 0 } });
  });
});
