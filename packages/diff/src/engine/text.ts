/**
 * Line-oriented helpers over plain strings. Positions are UTF-16 offsets.
 */

export interface Span {
  start: number;
  end: number;
}

export interface TextLine {
  /** Offset of the first character of the line */
  start: number;
  /** Offset of the terminating newline, or the text length */
  end: number;
  /** Offset of the next line */
  next: number;
  content: string;
  hasNewline: boolean;
}

export function lineStartAt(text: string, pos: number): number {
  if (pos <= 0) return 0;
  const clamped = Math.min(pos, text.length);
  return text.lastIndexOf('\n', clamped - 1) + 1;
}

export function lineEndAt(text: string, pos: number): number {
  const nl = text.indexOf('\n', pos);
  return nl < 0 ? text.length : nl;
}

export function nextLineStart(text: string, pos: number): number {
  const nl = text.indexOf('\n', pos);
  return nl < 0 ? text.length : nl + 1;
}

export function lineAt(text: string, pos: number): TextLine {
  const start = lineStartAt(text, pos);
  const end = lineEndAt(text, start);
  const hasNewline = end < text.length;
  return {
    start,
    end,
    next: hasNewline ? end + 1 : end,
    content: text.slice(start, end),
    hasNewline,
  };
}

/** The line starting at `pos`, or null at the end of the text. */
export function lineFrom(text: string, pos: number): TextLine | null {
  if (pos >= text.length) return null;
  return lineAt(text, pos);
}

export function* linesBetween(text: string, start: number, end: number): Generator<TextLine> {
  let pos = lineStartAt(text, start);
  while (pos < end && pos < text.length) {
    const line = lineAt(text, pos);
    yield line;
    pos = line.next;
  }
}

/** 1-based line number of the line holding `pos`. */
export function lineNumberAt(text: string, pos: number): number {
  let count = 1;
  const limit = Math.min(pos, text.length);
  let idx = text.indexOf('\n');
  while (idx >= 0 && idx < limit) {
    count++;
    idx = text.indexOf('\n', idx + 1);
  }
  return count;
}

/** Start offset of 1-based line `line`, clamped to the end of the text. */
export function positionOfLine(text: string, line: number): number {
  let pos = 0;
  for (let i = 1; i < line; i++) {
    const nl = text.indexOf('\n', pos);
    if (nl < 0) return text.length;
    pos = nl + 1;
  }
  return pos;
}

export function countNewlines(text: string, start = 0, end = text.length): number {
  let count = 0;
  let idx = text.indexOf('\n', start);
  while (idx >= 0 && idx < end) {
    count++;
    idx = text.indexOf('\n', idx + 1);
  }
  return count;
}

/** Join lines back, keeping a trailing newline only when the source had one. */
export function joinLines(lines: string[], trailingNewline: boolean): string {
  if (lines.length === 0) return '';
  return lines.join('\n') + (trailingNewline ? '\n' : '');
}

/**
 * Whether `[start, end)` is selected by `range`. An empty range selects the
 * span holding its position; no range selects everything.
 */
export function spanTouches(start: number, end: number, range?: Span): boolean {
  if (!range) return true;
  if (range.start === range.end) {
    return start <= range.start && range.start < end;
  }
  return start < range.end && end > range.start;
}
