import { describe, it, expect } from 'vitest';
import { classifyLine, isNewSide, isOldSide, prefixWidth } from './lineKind.js';

describe('classifyLine', () => {
  it('should classify unified body lines', () => {
    expect(classifyLine(' same', 'unified')).toBe('context');
    expect(classifyLine('+new', 'unified')).toBe('added');
    expect(classifyLine('-old', 'unified')).toBe('removed');
    expect(classifyLine('\\ No newline at end of file', 'unified')).toBe('no-newline');
    expect(classifyLine('! changed', 'unified')).toBe('other');
  });

  it('should treat an empty unified line as context only when asked', () => {
    expect(classifyLine('', 'unified', { emptyIsContext: true })).toBe('context');
    expect(classifyLine('', 'unified')).toBe('other');
    expect(classifyLine('', 'context', { emptyIsContext: true })).toBe('other');
  });

  it('should classify context and normal body lines', () => {
    expect(classifyLine('! changed', 'context')).toBe('changed');
    expect(classifyLine('< old', 'normal')).toBe('removed');
    expect(classifyLine('> new', 'normal')).toBe('added');
    expect(classifyLine('---', 'normal')).toBe('other');
  });

  it('should know the prefix width and sides', () => {
    expect(prefixWidth('unified')).toBe(1);
    expect(prefixWidth('context')).toBe(2);
    expect(isOldSide('changed')).toBe(true);
    expect(isNewSide('removed')).toBe(false);
    expect(isNewSide('context')).toBe(true);
  });
});
