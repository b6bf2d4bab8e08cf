import { describe, it, expect } from 'vitest';
import { parseHunk, type Hunk } from './hunkParser.js';
import { buildApproxPattern, findApproxText, findText, locate, replacementText } from './sourceLocator.js';

const HUNK = '@@ -1,2 +1,2 @@\n-foo\n+bar\n baz\n';

function hunkOf(text: string): Hunk {
  const parsed = parseHunk(text, 0);
  if (!parsed.ok) throw parsed.error;
  return parsed.value;
}

describe('findText', () => {
  it('should pick the nearest occurrence around the origin', () => {
    expect(findText('ab--ab----ab', 'ab', 6)).toEqual({ start: 4, end: 6 });
  });

  it('should prefer the forward occurrence on a tie', () => {
    expect(findText('ab--ab----ab', 'ab', 7)).toEqual({ start: 10, end: 12 });
  });

  it('should return null when the text is absent', () => {
    expect(findText('abc', 'x', 0)).toBeNull();
  });
});

describe('whitespace-insensitive search', () => {
  it('should match across different runs of whitespace', () => {
    expect(findApproxText('int  x =\t1;\n', 'int x = 1;\n', 0)).toEqual({ start: 0, end: 12 });
  });

  it('should refuse texts over the limits', () => {
    expect(buildApproxPattern('a b c', { maxTokens: 2 })).toBeNull();
    expect(buildApproxPattern('a b c', { maxChars: 3 })).toBeNull();
    expect(buildApproxPattern('a b c')).not.toBeNull();
  });

  it('should not swallow neighbouring blank lines', () => {
    expect(findApproxText('\nfoo \n\n', 'foo\n', 0)).toEqual({ start: 1, end: 6 });
  });
});

describe('locate', () => {
  it('should find the old text at the declared line', () => {
    const found = locate(hunkOf(HUNK), { path: 'f.txt', text: 'foo\nbaz\n' });
    expect(found.ok).toBe(true);
    if (!found.ok) return;
    expect(found.value).toMatchObject({
      span: { start: 0, end: 8 },
      lineOffset: 0,
      declaredLine: 1,
      switched: false,
      fuzzy: false,
    });
    expect(replacementText(found.value)).toBe('bar\nbaz\n');
  });

  it('should report an applied hunk as switched', () => {
    const found = locate(hunkOf(HUNK), { path: 'f.txt', text: 'bar\nbaz\n' });
    expect(found.ok && found.value.switched).toBe(true);
    expect(found.ok && replacementText(found.value)).toBe('foo\nbaz\n');
  });

  it('should fall back to a fuzzy match', () => {
    const found = locate(hunkOf(HUNK), { path: 'f.txt', text: 'foo   \nbaz\n' });
    expect(found.ok).toBe(true);
    if (!found.ok) return;
    expect(found.value).toMatchObject({ span: { start: 0, end: 11 }, lineOffset: 0, switched: false, fuzzy: true });
  });

  it('should fail without fuzzy matching when only whitespace differs', () => {
    const found = locate(hunkOf(HUNK), { path: 'f.txt', text: 'foo   \nbaz\n' }, { fuzzy: { enabled: false } });
    expect(found.ok).toBe(false);
    if (found.ok) return;
    expect(found.error.code).toBe('HUNK_NOT_FOUND');
    expect(found.error.message).toBe('Hunk text not found');
  });

  it('should measure the offset from the declared line', () => {
    const found = locate(hunkOf(HUNK), { path: 'f.txt', text: 'x\ny\nfoo\nbaz\n' });
    expect(found.ok && found.value.lineOffset).toBe(2);
    expect(found.ok && found.value.span).toEqual({ start: 4, end: 12 });
  });

  it('should look for the new text when reversing', () => {
    const found = locate(hunkOf(HUNK), { path: 'f.txt', text: 'bar\nbaz\n' }, { reverse: true });
    expect(found.ok).toBe(true);
    if (!found.ok) return;
    expect(found.value.switched).toBe(false);
    expect(replacementText(found.value)).toBe('foo\nbaz\n');
  });

  it('should prefer the match that contains the other one', () => {
    const addition = hunkOf('@@ -1 +1,2 @@\n a\n+b\n');
    const applied = locate(addition, { path: 'f.txt', text: 'a\nb\n' });
    expect(applied.ok && applied.value.switched).toBe(true);

    const pending = locate(addition, { path: 'f.txt', text: 'a\nc\n' });
    expect(pending.ok && pending.value.switched).toBe(false);
  });

  it('should insert a pure addition at its line even when the text occurs elsewhere', () => {
    const insertion = hunkOf('@@ -1,0 +2 @@\n+}\n');

    const pending = locate(insertion, { path: 'f.txt', text: 'a\nb\nc\n}\n' });
    expect(pending.ok && pending.value.switched).toBe(false);
    expect(pending.ok && pending.value.span).toEqual({ start: 2, end: 2 });

    const applied = locate(insertion, { path: 'f.txt', text: 'a\n}\nb\nc\n}\n' });
    expect(applied.ok && applied.value.switched).toBe(true);
    expect(applied.ok && applied.value.span).toEqual({ start: 2, end: 4 });
  });

  it('should find a pure deletion away from its declared line', () => {
    const deletion = hunkOf('@@ -2,1 +1,0 @@\n-b\n');

    const pending = locate(deletion, { path: 'f.txt', text: 'x\na\nb\n' });
    expect(pending.ok).toBe(true);
    if (!pending.ok) return;
    expect(pending.value).toMatchObject({ span: { start: 4, end: 6 }, lineOffset: 1, switched: false });

    const applied = locate(deletion, { path: 'f.txt', text: 'x\na\n' });
    expect(applied.ok && applied.value.switched).toBe(true);
  });

  it('should give the same answer when asked twice', () => {
    const target = { path: 'f.txt', text: 'x\nfoo\nbaz\n' };
    expect(locate(hunkOf(HUNK), target)).toEqual(locate(hunkOf(HUNK), target));
  });
});
