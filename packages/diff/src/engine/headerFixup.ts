/**
 * Recomputing hunk header counts from hunk bodies
 */

import { DiffDocument, isGitDiff } from './document.js';
import {
  CONTEXT_MID_HEADER_RE,
  CONTEXT_OLD_HEADER_RE,
  UNIFIED_HEADER_RE,
  findHunkBounds,
  parseHeader,
  type Hunk,
  type HunkLine,
  type ParseOptions,
} from './hunkParser.js';
import { lineAt, type Span } from './text.js';

export interface FixupOptions {
  validUnifiedEmptyLine?: boolean;
}

export interface FixupResult {
  text: string;
  changed: boolean;
}

interface Edit {
  span: Span;
  text: string;
}

interface BodyCounts {
  space: number;
  plus: number;
  minus: number;
  bang: number;
}

function countLines(lines: HunkLine[], skipSignature: boolean): BodyCounts {
  const counts: BodyCounts = { space: 0, plus: 0, minus: 0, bang: 0 };
  for (const line of lines) {
    // `-- ` closes the body of a mail produced by git format-patch.
    if (skipSignature && line.raw === '-- ') continue;
    switch (line.kind) {
      case 'context':
        counts.space++;
        break;
      case 'added':
        counts.plus++;
        break;
      case 'removed':
        counts.minus++;
        break;
      case 'changed':
        counts.bang++;
        break;
    }
  }
  return counts;
}

function countText(written: string | undefined, count: number): string {
  if (written === undefined && count === 1) return '';
  return `,${count}`;
}

function fixUnifiedHeader(text: string, hunk: Hunk, skipSignature: boolean): Edit | null {
  const line = lineAt(text, hunk.start);
  const match = UNIFIED_HEADER_RE.exec(line.content);
  if (!match) return null;

  const counts = countLines(hunk.lines, skipSignature);
  const oldCount = counts.space + counts.minus;
  const newCount = counts.space + counts.plus;
  const rewritten =
    `@@ -${match[1]}${countText(match[2], oldCount)} ` +
    `+${match[3]}${countText(match[4], newCount)} @@${match[5]}`;

  return rewritten === line.content ? null : { span: { start: line.start, end: line.end }, text: rewritten };
}

/**
 * Rewrite the end of an `a,b` context range line, keeping its frame. A lone
 * `a` stands for one line and gains an end only when the body has more.
 */
function fixContextRange(text: string, pos: number, re: RegExp, total: number, frame: [string, string]): Edit | null {
  const line = lineAt(text, pos);
  const match = re.exec(line.content);
  if (!match || total <= 0) return null;
  if (match[2] === undefined && total === 1) return null;

  const start = parseInt(match[1], 10);
  const rewritten = `${frame[0]}${match[1]},${start + total - 1}${frame[1]}`;
  return rewritten === line.content ? null : { span: { start: line.start, end: line.end }, text: rewritten };
}

function fixContextHeaders(text: string, hunk: Hunk, skipSignature: boolean): Edit[] {
  const edits: Edit[] = [];
  const oldCounts = countLines(hunk.lines.filter((l) => l.block === 'old'), skipSignature);
  const newCounts = countLines(hunk.lines.filter((l) => l.block === 'new'), skipSignature);

  const oldHeader = fixContextRange(
    text,
    lineAt(text, hunk.start).next,
    CONTEXT_OLD_HEADER_RE,
    oldCounts.space + oldCounts.bang + oldCounts.minus,
    ['*** ', ' ****']
  );
  if (oldHeader) edits.push(oldHeader);

  if (hunk.header.midHeader) {
    const midHeader = fixContextRange(
      text,
      hunk.header.midHeader.start,
      CONTEXT_MID_HEADER_RE,
      newCounts.space + newCounts.bang + newCounts.plus,
      ['--- ', ' ----']
    );
    if (midHeader) edits.push(midHeader);
  }
  return edits;
}

function applyEdits(text: string, edits: Edit[]): string {
  let out = text;
  for (const edit of [...edits].sort((a, b) => b.span.start - a.span.start)) {
    out = out.slice(0, edit.span.start) + edit.text + out.slice(edit.span.end);
  }
  return out;
}

/**
 * Make the counts of every unified and context hunk touching `range` agree
 * with the lines actually in its body. Hunk ends are found by scanning, not
 * by the counts being repaired.
 */
export function fixupHeaders(text: string, range?: Span, options: FixupOptions = {}): FixupResult {
  const parseOptions: ParseOptions = {
    validUnifiedEmptyLine: options.validUnifiedEmptyLine,
    dontTrustHeader: true,
  };
  const skipSignature = isGitDiff(text);
  const edits: Edit[] = [];

  for (const hunk of new DiffDocument(text, parseOptions).hunks(range)) {
    switch (hunk.header.style) {
      case 'unified': {
        const edit = fixUnifiedHeader(text, hunk, skipSignature);
        if (edit) edits.push(edit);
        break;
      }
      case 'context':
        edits.push(...fixContextHeaders(text, hunk, skipSignature));
        break;
      case 'normal':
        break;
    }
  }

  if (edits.length === 0) {
    return { text, changed: false };
  }
  return { text: applyEdits(text, edits), changed: true };
}

/**
 * Collects the spans touched by edits of a diff and repairs the header of
 * the hunk they fall in. Edits of the header lines themselves are left
 * alone, since the user is then changing the numbers by hand.
 */
export class HeaderFixupTracker {
  private pending: Span | null = null;

  constructor(private readonly options: FixupOptions = {}) {}

  recordChange(start: number, end: number): void {
    const low = Math.min(start, end);
    const high = Math.max(start, end);
    this.pending = this.pending
      ? { start: Math.min(this.pending.start, low), end: Math.max(this.pending.end, high) }
      : { start: low, end: high };
  }

  get hasPendingChange(): boolean {
    return this.pending !== null;
  }

  flush(text: string): FixupResult {
    const change = this.pending;
    this.pending = null;
    if (!change) return { text, changed: false };

    const parseOptions: ParseOptions = {
      validUnifiedEmptyLine: this.options.validUnifiedEmptyLine,
      dontTrustHeader: true,
    };
    const bounds = findHunkBounds(text, change.start, parseOptions);
    if (!bounds.ok) return { text, changed: false };
    const header = parseHeader(text, bounds.value.start);
    if (!header.ok) return { text, changed: false };

    const { midHeader } = header.value;
    const inHeader = change.start < header.value.end;
    const inMidHeader = midHeader !== undefined && change.start < midHeader.end && change.end > midHeader.start;
    const pastEnd = change.end > bounds.value.end;
    if (inHeader || inMidHeader || pastEnd) {
      return { text, changed: false };
    }

    return fixupHeaders(text, { start: bounds.value.start, end: bounds.value.start }, this.options);
  }
}
