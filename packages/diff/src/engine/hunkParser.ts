/**
 * Hunk header grammars, hunk boundaries and side-text extraction for
 * unified, context and normal diffs.
 */

import { MalformedHunkError, err, ok, type Result } from '../errors.js';
import { classifyLine, prefixWidth, type HunkStyle, type LineKind } from './lineKind.js';
import { lineAt, lineFrom, lineStartAt, linesBetween, type Span, type TextLine } from './text.js';

export interface LineRange {
  /** 1-based first line; for an empty range, the line before it */
  start: number;
  count: number;
  /** Whether the header spelled out the count (or, in context diffs, the end line) */
  explicitCount: boolean;
}

export type NormalCommand = 'a' | 'c' | 'd';

export type HunkSide = 'old' | 'new';

export interface HunkHeader {
  style: HunkStyle;
  old: LineRange;
  new: LineRange;
  /** Text after `@@ ... @@`, or after the context banner */
  section: string;
  command?: NormalCommand;
  /** Offset of the header's first line */
  start: number;
  /** Offset of the first body line */
  end: number;
  /** The `--- a,b ----` line of a context hunk */
  midHeader?: Span;
}

export interface HunkLine {
  kind: LineKind;
  /** Line text without its prefix */
  content: string;
  raw: string;
  start: number;
  next: number;
  /** Which half of a context or normal hunk the line sits in */
  block: 'old' | 'new' | 'both';
}

export interface Hunk {
  header: HunkHeader;
  lines: HunkLine[];
  start: number;
  end: number;
  raw: string;
}

export interface ParseOptions {
  /** Empty lines inside unified hunks are context lines that lost their space */
  validUnifiedEmptyLine?: boolean;
  /** Ignore the declared counts and find the end by scanning the body */
  dontTrustHeader?: boolean;
}

export const UNIFIED_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(.*)$/;
export const CONTEXT_BANNER_RE = /^\*{15}(.*)$/;
export const CONTEXT_OLD_HEADER_RE = /^\*\*\* (\d+)(?:,(-?\d*))? \*\*\*\*$/;
export const CONTEXT_MID_HEADER_RE = /^--- (\d+)(?:,(-?\d*))? ----$/;
export const NORMAL_HEADER_RE = /^(\d+)(?:,(\d+))?([acd])(\d+)(?:,(\d+))?$/;

const LOOSE_UNIFIED_RE = /^@@ -[0-9,]+ \+[0-9,]+ @@/;
const LOOSE_CONTEXT_OLD_RE = /^\*\*\* .+ \*\*\*\*$/;

/** Style of the hunk header starting at line offset `pos`, if any. */
export function hunkStyleAt(text: string, pos: number): HunkStyle | null {
  const line = lineFrom(text, pos);
  if (!line) return null;
  const content = line.content;

  if (content.startsWith('@@ -')) {
    return LOOSE_UNIFIED_RE.test(content) ? 'unified' : null;
  }
  if (CONTEXT_BANNER_RE.test(content)) {
    const second = lineFrom(text, line.next);
    return second && LOOSE_CONTEXT_OLD_RE.test(second.content) ? 'context' : null;
  }
  if (NORMAL_HEADER_RE.test(content)) {
    return 'normal';
  }
  return null;
}

function isNormalCommand(value: string): value is NormalCommand {
  return value === 'a' || value === 'c' || value === 'd';
}

function unifiedRange(startText: string, countText: string | undefined): LineRange {
  return {
    start: parseInt(startText, 10),
    count: countText === undefined ? 1 : parseInt(countText, 10),
    explicitCount: countText !== undefined,
  };
}

function contextRange(startText: string, endText: string | undefined): LineRange {
  const start = parseInt(startText, 10);
  if (endText === undefined || endText === '') {
    return { start, count: 1, explicitCount: false };
  }
  return { start, count: Math.max(0, parseInt(endText, 10) - start + 1), explicitCount: true };
}

function normalRange(startText: string, endText: string | undefined, empty: boolean): LineRange {
  const start = parseInt(startText, 10);
  if (empty) {
    return { start, count: 0, explicitCount: endText !== undefined };
  }
  if (endText === undefined) {
    return { start, count: 1, explicitCount: false };
  }
  return { start, count: parseInt(endText, 10) - start + 1, explicitCount: true };
}

interface MidHeaderMatch {
  line: TextLine;
  match: RegExpExecArray;
}

/** Find the `--- a,b ----` separator of a context hunk whose old block starts at `from`. */
export function findMidHeader(text: string, from: number): MidHeaderMatch | null {
  let pos = from;
  for (;;) {
    const line = lineFrom(text, pos);
    if (!line || line.content.startsWith('*')) return null;
    const match = CONTEXT_MID_HEADER_RE.exec(line.content);
    if (match) return { line, match };
    pos = line.next;
  }
}

function findNormalDivider(text: string, from: number): TextLine | null {
  let pos = from;
  for (;;) {
    const line = lineFrom(text, pos);
    if (!line) return null;
    if (line.content === '---') return line;
    if (!line.content.startsWith('<') && !line.content.startsWith('\\')) return null;
    pos = line.next;
  }
}

export function parseHeader(text: string, pos: number): Result<HunkHeader, MalformedHunkError> {
  const start = lineStartAt(text, pos);
  const line = lineFrom(text, start);
  if (!line) {
    return err(new MalformedHunkError('No hunk header at end of text', start));
  }

  const unified = UNIFIED_HEADER_RE.exec(line.content);
  if (unified) {
    return ok({
      style: 'unified',
      old: unifiedRange(unified[1], unified[2]),
      new: unifiedRange(unified[3], unified[4]),
      section: unified[5],
      start,
      end: line.next,
    });
  }

  const banner = CONTEXT_BANNER_RE.exec(line.content);
  if (banner) {
    const second = lineFrom(text, line.next);
    const oldMatch = second ? CONTEXT_OLD_HEADER_RE.exec(second.content) : null;
    if (!second || !oldMatch) {
      return err(new MalformedHunkError('Unrecognized context diff first hunk header format', start));
    }
    const mid = findMidHeader(text, second.next);
    if (!mid) {
      return err(new MalformedHunkError("Can't find the hunk separator", start));
    }
    return ok({
      style: 'context',
      old: contextRange(oldMatch[1], oldMatch[2]),
      new: contextRange(mid.match[1], mid.match[2]),
      section: banner[1],
      start,
      end: second.next,
      midHeader: { start: mid.line.start, end: mid.line.next },
    });
  }

  const normal = NORMAL_HEADER_RE.exec(line.content);
  if (normal && isNormalCommand(normal[3])) {
    const command = normal[3];
    return ok({
      style: 'normal',
      old: normalRange(normal[1], normal[2], command === 'a'),
      new: normalRange(normal[4], normal[5], command === 'd'),
      section: '',
      command,
      start,
      end: line.next,
    });
  }

  return err(new MalformedHunkError('Not recognizable hunk header', start));
}

function skipNoNewlineMarker(text: string, pos: number): number {
  const line = lineFrom(text, pos);
  return line && line.content.startsWith('\\') ? line.next : pos;
}

/** End of a unified hunk computed from its declared counts, or null when the body runs short. */
function trustedUnifiedEnd(text: string, header: HunkHeader, validEmpty: boolean): number | null {
  let oldLeft = header.old.count;
  let newLeft = header.new.count;
  let endOld = oldLeft === 0 ? header.end : -1;
  let endNew = newLeft === 0 ? header.end : -1;
  let pos = header.end;

  while (endOld < 0 || endNew < 0) {
    const line = lineFrom(text, pos);
    if (!line) return null;
    const kind = classifyLine(line.content, 'unified', { emptyIsContext: validEmpty });
    if (kind === 'other') return null;

    if (endOld < 0 && (kind === 'context' || kind === 'removed')) {
      oldLeft--;
      if (oldLeft === 0) endOld = skipNoNewlineMarker(text, line.next);
    }
    if (endNew < 0 && (kind === 'context' || kind === 'added')) {
      newLeft--;
      if (newLeft === 0) endNew = skipNoNewlineMarker(text, line.next);
    }
    pos = line.next;
  }

  return Math.max(endOld, endNew);
}

function isUnifiedFileHeader(text: string, line: TextLine): boolean {
  if (!line.content.startsWith('--- ')) return false;
  const next = lineFrom(text, line.next);
  return next !== null && next.content.startsWith('+++ ');
}

function continuesHunk(text: string, line: TextLine, style: HunkStyle, validEmpty: boolean): boolean {
  const content = line.content;
  switch (style) {
    case 'unified':
      if (content === '') return validEmpty;
      return '-+ \\'.includes(content[0]) && !isUnifiedFileHeader(text, line);
    case 'context':
      return content !== '' && '-+! \\'.includes(content[0]);
    case 'normal':
      return content === '---' || (content !== '' && '<>\\'.includes(content[0]));
  }
}

function scannedEnd(text: string, header: HunkHeader, validEmpty: boolean): number {
  let pos = header.end;
  for (;;) {
    const line = lineFrom(text, pos);
    if (!line || !continuesHunk(text, line, header.style, validEmpty)) break;
    pos = line.next;
  }

  let end = pos;
  if (validEmpty) {
    // Blank lines at the end are more likely unrelated than empty context.
    while (end > header.end && text[end - 1] === '\n' && text[end - 2] === '\n') {
      end--;
    }
  }
  return end;
}

/**
 * Offset just past the last body line of the hunk. Unified hunks are
 * measured by their declared counts unless `dontTrustHeader` is set or the
 * body is too short for them; everything else is found by scanning.
 */
export function endOfHunk(text: string, header: HunkHeader, options: ParseOptions = {}): number {
  const validEmpty = options.validUnifiedEmptyLine ?? true;
  if (header.style === 'unified' && !options.dontTrustHeader) {
    const trusted = trustedUnifiedEnd(text, header, validEmpty);
    if (trusted !== null) return trusted;
  }
  return scannedEnd(text, header, validEmpty);
}

/** Start of the hunk header at or above `pos`. */
export function beginningOfHunk(text: string, pos: number): number | null {
  let lineStart = lineStartAt(text, pos);
  for (;;) {
    if (hunkStyleAt(text, lineStart)) return lineStart;
    if (lineStart === 0) return null;
    lineStart = lineStartAt(text, lineStart - 1);
  }
}

/** Start of the first hunk header on a line starting at or after `from`. */
export function nextHunkStart(text: string, from: number): number | null {
  let pos = lineStartAt(text, from) === from ? from : lineAt(text, from).next;
  while (pos < text.length) {
    if (hunkStyleAt(text, pos)) return pos;
    pos = lineAt(text, pos).next;
  }
  return null;
}

function hunkEnd(text: string, start: number, options: ParseOptions): Result<number, MalformedHunkError> {
  const header = parseHeader(text, start);
  if (!header.ok) return header;
  return ok(endOfHunk(text, header.value, options));
}

/**
 * Span of the hunk enclosing `pos`, or of the next hunk when `pos` sits in a
 * file header or in junk after a hunk.
 */
export function findHunkBounds(text: string, pos: number, options: ParseOptions = {}): Result<Span, MalformedHunkError> {
  const begin = beginningOfHunk(text, pos);
  if (begin !== null) {
    const end = hunkEnd(text, begin, options);
    if (!end.ok) return end;
    if (end.value >= pos) {
      return ok({ start: begin, end: end.value });
    }
  }

  const following = nextHunkStart(text, pos);
  if (following !== null) {
    const end = hunkEnd(text, following, options);
    if (!end.ok) return end;
    return ok({ start: following, end: end.value });
  }

  if (begin !== null) {
    const end = hunkEnd(text, begin, options);
    if (!end.ok) return end;
    return ok({ start: begin, end: end.value });
  }
  return err(new MalformedHunkError('No hunk found', pos));
}

export function parseHunk(text: string, pos: number, options: ParseOptions = {}): Result<Hunk, MalformedHunkError> {
  const parsed = parseHeader(text, pos);
  if (!parsed.ok) return parsed;
  const header = parsed.value;
  const end = endOfHunk(text, header, options);

  if (header.midHeader && header.midHeader.start >= end) {
    return err(new MalformedHunkError('Context hunk separator lies past the end of the hunk', header.start));
  }

  const validEmpty = options.validUnifiedEmptyLine ?? true;
  const width = prefixWidth(header.style);
  const lines: HunkLine[] = [];
  let block: HunkLine['block'] =
    header.style === 'unified' ? 'both' : header.command === 'a' ? 'new' : 'old';

  for (const line of linesBetween(text, header.end, end)) {
    if (header.midHeader && line.start === header.midHeader.start) {
      block = 'new';
      continue;
    }
    if (header.style === 'normal' && line.content === '---') {
      block = 'new';
      continue;
    }
    lines.push({
      kind: classifyLine(line.content, header.style, { emptyIsContext: validEmpty }),
      content: line.content.slice(width),
      raw: line.content,
      start: line.start,
      next: line.next,
      block,
    });
  }

  return ok({
    header: header.style === 'context' ? settleContextCounts(header, lines) : header,
    lines,
    start: header.start,
    end,
    raw: text.slice(header.start, end),
  });
}

/**
 * A context header with a single line number describes either one line or
 * an empty range; the body decides which.
 */
function settleContextCounts(header: HunkHeader, lines: HunkLine[]): HunkHeader {
  const oldBlock = lines.filter((l) => l.block === 'old');
  const newBlock = lines.filter((l) => l.block === 'new');
  const oldSide = (oldBlock.length > 0 ? oldBlock : newBlock).filter(
    (l) => l.kind === 'context' || l.kind === 'removed' || l.kind === 'changed'
  ).length;
  const newSide = (newBlock.length > 0 ? newBlock : oldBlock).filter(
    (l) => l.kind === 'context' || l.kind === 'added' || l.kind === 'changed'
  ).length;

  return {
    ...header,
    old: header.old.explicitCount ? header.old : { ...header.old, count: oldSide === 0 ? 0 : 1 },
    new: header.new.explicitCount ? header.new : { ...header.new, count: newSide === 0 ? 0 : 1 },
  };
}

export interface ExtractedText {
  text: string;
  /** Position in `text` corresponding to the requested hunk offset */
  offset: number;
}

/**
 * Literal source text of one side of a hunk. Prefixes are stripped, lines
 * of the other side dropped, and `\ No newline` markers removed together
 * with the newline of the line they follow. `charOffset` is an offset in
 * `hunkText`; the result carries the matching offset in the extracted text.
 */
export function extractHunkText(
  hunkText: string,
  side: HunkSide,
  charOffset?: number
): Result<ExtractedText, MalformedHunkError> {
  const style = hunkStyleAt(hunkText, 0);
  if (!style) {
    return err(new MalformedHunkError('Unknown diff hunk type', 0));
  }

  const first = lineAt(hunkText, 0);
  let src: number | null = null;
  let dst: number | null = null;
  let divider: number | null = null;

  switch (style) {
    case 'unified':
      src = first.next;
      dst = first.next;
      break;
    case 'context': {
      src = lineAt(hunkText, first.next).next;
      const mid = findMidHeader(hunkText, src);
      if (!mid) {
        return err(new MalformedHunkError("Can't find the hunk separator", 0));
      }
      divider = mid.line.start;
      dst = mid.line.next;
      break;
    }
    case 'normal': {
      const command = NORMAL_HEADER_RE.exec(first.content)?.[3];
      if (command === 'a') {
        dst = first.next;
      } else if (command === 'd') {
        src = first.next;
      } else {
        src = first.next;
        const line = findNormalDivider(hunkText, src);
        if (!line) {
          return err(new MalformedHunkError("Can't find the `---' divider", 0));
        }
        divider = line.start;
        dst = line.next;
      }
      break;
    }
  }

  if ((side === 'new' ? dst : src) === null) {
    return ok({ text: '', offset: 0 });
  }

  // Context diffs omit a block that has no changes of its own.
  if (src !== null && src === divider) {
    src = dst;
  } else if (dst === hunkText.length) {
    dst = src;
  }

  const keep = side === 'new' ? dst : src;
  if (keep === null) {
    return ok({ text: '', offset: 0 });
  }

  const regionEnd = divider !== null && divider > keep ? divider : hunkText.length;
  const dropChar = side === 'new' ? '-' : '+';
  const width = prefixWidth(style);
  let out = '';
  let offset: number | null = charOffset === undefined || charOffset < keep ? 0 : null;
  let prevKept = false;
  let pos = keep;

  while (pos < regionEnd) {
    const line = lineAt(hunkText, pos);
    const lead = line.content.charAt(0);
    const holdsOffset = offset === null && charOffset !== undefined && charOffset < line.next;

    if (lead === dropChar) {
      if (holdsOffset) offset = out.length;
      prevKept = false;
    } else if (lead === '\\') {
      if (prevKept && out.endsWith('\n')) out = out.slice(0, -1);
      if (holdsOffset) offset = out.length;
      prevKept = false;
    } else {
      const content = line.content.slice(width);
      if (holdsOffset && charOffset !== undefined) {
        offset = out.length + Math.max(0, Math.min(charOffset - line.start - width, content.length));
      }
      out += content + (line.hasNewline ? '\n' : '');
      prevKept = true;
    }

    if (!line.hasNewline) break;
    pos = line.next;
  }

  return ok({ text: out, offset: offset ?? out.length });
}
