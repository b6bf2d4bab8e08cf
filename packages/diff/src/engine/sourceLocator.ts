/**
 * Finding the text of a hunk in a target file
 */

import { NotFoundError, err, ok, type DiffError, type Result } from '../errors.js';
import { extractHunkText, type Hunk } from './hunkParser.js';
import { lineStartAt, lineNumberAt, positionOfLine, type Span } from './text.js';

export const DEFAULT_MAX_FUZZY_TOKENS = 2000;
export const DEFAULT_MAX_FUZZY_CHARS = 200_000;

export interface FuzzyOptions {
  enabled?: boolean;
  /** Texts splitting into more whitespace-separated tokens are not searched fuzzily */
  maxTokens?: number;
  /** Texts longer than this are not searched fuzzily */
  maxChars?: number;
}

export interface LocateOptions {
  /** Look for the new side and put back the old one */
  reverse?: boolean;
  /** Start the search at the old-side line of the header (default: `!reverse`) */
  preferOldSide?: boolean;
  fuzzy?: FuzzyOptions;
}

export interface LocateTarget {
  path: string;
  text: string;
}

export interface SourceLocation {
  path: string;
  /** Span of the text that was found */
  span: Span;
  /** Lines between the declared position and the match; negative when above */
  lineOffset: number;
  declaredLine: number;
  /** The new text was found instead of the old one: the hunk looks applied */
  switched: boolean;
  /** Found only by the whitespace-insensitive search */
  fuzzy: boolean;
  /** Text expected before applying, after the `reverse` swap */
  oldText: string;
  /** Text expected after applying, after the `reverse` swap */
  newText: string;
}

function closest(forward: Span | null, backward: Span | null, origin: number): Span | null {
  if (forward && backward) {
    return forward.start - origin > origin - backward.start ? backward : forward;
  }
  return forward ?? backward;
}

/** Nearest exact occurrence of `needle` around `origin`; ties go forward. */
export function findText(haystack: string, needle: string, origin: number): Span | null {
  const forwardAt = haystack.indexOf(needle, origin);
  const backwardAt = haystack.lastIndexOf(needle, origin);
  return closest(
    forwardAt >= 0 ? { start: forwardAt, end: forwardAt + needle.length } : null,
    backwardAt >= 0 ? { start: backwardAt, end: backwardAt + needle.length } : null,
    origin
  );
}

const WS = '[ \\t\\n\\r\\f\\v]';
const BLANK = '[ \\t\\r\\f\\v]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whitespace-insensitive pattern for `text`: every run of whitespace becomes
 * a flexible gap, and the match runs to the end of a line. Null when the
 * text exceeds the configured limits.
 */
export function buildApproxPattern(text: string, options: FuzzyOptions = {}): RegExp | null {
  if (text.length > (options.maxChars ?? DEFAULT_MAX_FUZZY_CHARS)) {
    return null;
  }
  const tokens = text.split(/[ \t\n\r\f\v]+/).filter(Boolean);
  if (tokens.length > (options.maxTokens ?? DEFAULT_MAX_FUZZY_TOKENS)) {
    return null;
  }
  const body = tokens.map(escapeRegExp).join(`${WS}+`);
  // Edges stay within the line so surrounding blank lines are not swallowed.
  return new RegExp(`^${BLANK}*${body}${BLANK}*(?:\\n|(?![\\s\\S]))`, 'gm');
}

/** Nearest whitespace-insensitive occurrence of `text` around `origin`. */
export function findApproxText(haystack: string, text: string, origin: number, options: FuzzyOptions = {}): Span | null {
  const pattern = buildApproxPattern(text, options);
  if (!pattern) return null;

  pattern.lastIndex = origin;
  const ahead = pattern.exec(haystack);
  const forward = ahead ? { start: ahead.index, end: ahead.index + ahead[0].length } : null;

  let backward: Span | null = null;
  const sticky = new RegExp(pattern.source, 'my');
  let lineStart = lineStartAt(haystack, origin);
  for (;;) {
    sticky.lastIndex = lineStart;
    const match = sticky.exec(haystack);
    if (match) {
      backward = { start: lineStart, end: lineStart + match[0].length };
      break;
    }
    if (lineStart === 0) break;
    lineStart = lineStartAt(haystack, lineStart - 1);
  }

  return closest(forward, backward, origin);
}

function strictlyContains(outer: Span, inner: Span): boolean {
  return (
    outer.start <= inner.start &&
    inner.end <= outer.end &&
    outer.end - outer.start > inner.end - inner.start
  );
}

interface Match {
  span: Span;
  switched: boolean;
  fuzzy: boolean;
}

function chooseExact(
  oldSpan: Span | null,
  newSpan: Span | null,
  reverse: boolean,
  empty: { old: boolean; new: boolean }
): Match | null {
  // An empty text matches at the origin, so only the other side's match says anything.
  if (empty.old && oldSpan) {
    return newSpan && strictlyContains(newSpan, oldSpan)
      ? { span: newSpan, switched: true, fuzzy: false }
      : { span: oldSpan, switched: false, fuzzy: false };
  }
  if (empty.new && newSpan) {
    return oldSpan ? { span: oldSpan, switched: false, fuzzy: false } : { span: newSpan, switched: true, fuzzy: false };
  }
  if (oldSpan && newSpan) {
    // A match of one text inside the match of the other is just a piece of it.
    if (strictlyContains(oldSpan, newSpan)) return { span: oldSpan, switched: false, fuzzy: false };
    if (strictlyContains(newSpan, oldSpan)) return { span: newSpan, switched: true, fuzzy: false };
    return reverse
      ? { span: oldSpan, switched: false, fuzzy: false }
      : { span: newSpan, switched: true, fuzzy: false };
  }
  if (oldSpan) return { span: oldSpan, switched: false, fuzzy: false };
  if (newSpan) return { span: newSpan, switched: true, fuzzy: false };
  return null;
}

/**
 * Locate `hunk` in `target`. The search starts at the line the header
 * declares and picks the nearest match; exact matches of either side come
 * before whitespace-insensitive ones.
 */
export function locate(hunk: Hunk, target: LocateTarget, options: LocateOptions = {}): Result<SourceLocation, DiffError> {
  const reverse = options.reverse ?? false;
  const oldResult = extractHunkText(hunk.raw, reverse ? 'new' : 'old');
  if (!oldResult.ok) return oldResult;
  const newResult = extractHunkText(hunk.raw, reverse ? 'old' : 'new');
  if (!newResult.ok) return newResult;
  const oldText = oldResult.value.text;
  const newText = newResult.value.text;

  const range = options.preferOldSide ?? !reverse ? hunk.header.old : hunk.header.new;
  // An empty range names the line before the insertion point.
  const declaredLine = Math.max(1, range.count === 0 ? range.start + 1 : range.start);
  const origin = positionOfLine(target.text, declaredLine);

  let match = chooseExact(findText(target.text, oldText, origin), findText(target.text, newText, origin), reverse, {
    old: oldText === '',
    new: newText === '',
  });

  const fuzzy = options.fuzzy ?? {};
  if (!match && fuzzy.enabled !== false) {
    const approxOld = findApproxText(target.text, oldText, origin, fuzzy);
    if (approxOld) {
      match = { span: approxOld, switched: false, fuzzy: true };
    } else {
      const approxNew = findApproxText(target.text, newText, origin, fuzzy);
      if (approxNew) match = { span: approxNew, switched: true, fuzzy: true };
    }
  }

  if (!match) {
    return err(new NotFoundError('Hunk text not found', target.path));
  }

  return ok({
    path: target.path,
    span: match.span,
    lineOffset: lineNumberAt(target.text, match.span.start) - lineNumberAt(target.text, origin),
    declaredLine,
    switched: match.switched,
    fuzzy: match.fuzzy,
    oldText,
    newText,
  });
}

/** Text that replaces the located span when the hunk is applied. */
export function replacementText(location: SourceLocation): string {
  return location.switched ? location.oldText : location.newText;
}
