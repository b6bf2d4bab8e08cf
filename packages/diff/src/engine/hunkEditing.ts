/**
 * Structural edits of a diff: splitting and removing hunks and file
 * sections, and checking a hunk body against its header.
 */

import { MalformedHunkError, err, ok, type Result } from '../errors.js';
import { DiffDocument } from './document.js';
import { fixupHeaders } from './headerFixup.js';
import { classifyLine } from './lineKind.js';
import { findHunkBounds, parseHeader, type HunkHeader, type ParseOptions } from './hunkParser.js';
import { lineFrom, lineStartAt, type Span } from './text.js';

export interface EditResult {
  text: string;
  /** Span of the original text that was replaced or removed */
  span: Span;
}

/**
 * Split the unified hunk holding `pos` in two, the second one starting at
 * the line of `pos`.
 */
export function splitHunk(text: string, pos: number, options: ParseOptions = {}): Result<EditResult, MalformedHunkError> {
  const bounds = findHunkBounds(text, pos, options);
  if (!bounds.ok) return bounds;
  const header = parseHeader(text, bounds.value.start);
  if (!header.ok) return header;
  if (header.value.style !== 'unified') {
    return err(new MalformedHunkError('Can only split unified hunks', bounds.value.start));
  }

  const splitAt = lineStartAt(text, pos);
  if (splitAt <= header.value.end || splitAt >= bounds.value.end) {
    return err(new MalformedHunkError("Can't split the hunk at its first or past its last line", splitAt));
  }

  const validEmpty = options.validUnifiedEmptyLine ?? true;
  let oldLine = header.value.old.start;
  let newLine = header.value.new.start;
  let linePos = header.value.end;
  while (linePos < splitAt) {
    const line = lineFrom(text, linePos);
    if (!line) break;
    const kind = classifyLine(line.content, 'unified', { emptyIsContext: validEmpty });
    if (kind === 'context' || kind === 'removed') oldLine++;
    if (kind === 'context' || kind === 'added') newLine++;
    linePos = line.next;
  }

  const inserted = `@@ -${oldLine},1 +${newLine},1 @@\n`;
  const split = text.slice(0, splitAt) + inserted + text.slice(splitAt);
  const fixed = fixupHeaders(
    split,
    { start: bounds.value.start, end: bounds.value.end + inserted.length },
    { validUnifiedEmptyLine: options.validUnifiedEmptyLine }
  );
  return ok({ text: fixed.text, span: bounds.value });
}

function removeSpan(text: string, span: Span): EditResult {
  return { text: text.slice(0, span.start) + text.slice(span.end), span };
}

/** Remove the hunk holding `pos`, with its file header when it is the only hunk of the file. */
export function killHunk(text: string, pos: number, options: ParseOptions = {}): Result<EditResult, MalformedHunkError> {
  const doc = new DiffDocument(text, options);
  const hunk = doc.hunkAt(pos);
  if (!hunk.ok) return hunk;
  const section = doc.sectionOf(hunk.value);

  if (section && section.hunks.length === 1 && section.headerEnd > section.start) {
    return ok(removeSpan(text, { start: section.start, end: section.end }));
  }
  return ok(removeSpan(text, { start: hunk.value.start, end: hunk.value.end }));
}

/** Remove the whole file section holding `pos`. */
export function killFile(text: string, pos: number, options: ParseOptions = {}): Result<EditResult, MalformedHunkError> {
  const section = new DiffDocument(text, options).requireSectionAt(pos);
  if (!section.ok) return section;
  return ok(removeSpan(text, { start: section.value.start, end: section.value.end }));
}

export type HunkDamage = 'whitespace-loss' | 'word-wrap';

/**
 * Decides whether a damaged line gets repaired. `line` is the line's offset
 * in the text being checked.
 */
export type AutoFixPolicy = (damage: HunkDamage, line: number) => boolean;

export interface CheckOptions {
  autoFix?: AutoFixPolicy;
  /** Empty lines of unified hunks are context lines; nothing to repair */
  validUnifiedEmptyLine?: boolean;
}

export interface CheckResult {
  text: string;
  fixed: boolean;
}

interface Repair {
  span: Span;
  text: string;
}

interface BlockCheck {
  /** Prefix characters a body line of the block may start with */
  prefixes: string;
  /** Prefix restored on an empty line */
  padding: string;
  start: number;
  /** Where the block must end, when something follows it */
  end?: number;
  count: number;
}

function checkBlock(
  text: string,
  block: BlockCheck,
  header: HunkHeader,
  autoFix: AutoFixPolicy | undefined,
  repairs: Repair[]
): Result<void, MalformedHunkError> {
  let pos = block.start;
  let left = block.count;
  while (left > 0) {
    const line = lineFrom(text, pos);
    if (!line || line.start === block.end) {
      return err(new MalformedHunkError('Hunk is shorter than its header says', header.start));
    }
    if (line.content === '') {
      if (!autoFix?.('whitespace-loss', line.start)) {
        return err(new MalformedHunkError('Hunk seems to have lost the leading whitespace of a line', line.start));
      }
      repairs.push({ span: { start: line.start, end: line.start }, text: block.padding });
    } else if (line.content.startsWith('\\')) {
      pos = line.next;
      continue;
    } else if (!block.prefixes.includes(line.content[0])) {
      if (line.start === 0 || !autoFix?.('word-wrap', line.start)) {
        return err(new MalformedHunkError('Hunk seriously malformed', line.start));
      }
      // The line is the tail of the previous one, broken off by a mailer.
      repairs.push({ span: { start: line.start - 1, end: line.start }, text: '' });
      pos = line.next;
      continue;
    }
    left--;
    pos = line.next;
  }

  const trailing = lineFrom(text, pos);
  if (block.end !== undefined && trailing?.content.startsWith('\\')) {
    pos = trailing.next;
  }
  if (block.end !== undefined && pos !== block.end) {
    return err(new MalformedHunkError('Hunk has more lines than its header says', pos));
  }
  return ok(undefined);
}

/** Whether the line at `pos` can start the new block of a context hunk. */
function startsNewBlock(text: string, pos: number): boolean {
  const line = lineFrom(text, pos);
  return line !== null && (line.content === '' || ' +!\\'.includes(line.content[0]));
}

function contextCheck(text: string, header: HunkHeader, autoFix: AutoFixPolicy | undefined, repairs: Repair[]): Result<void, MalformedHunkError> {
  const mid = header.midHeader;
  if (!mid) {
    return err(new MalformedHunkError("Can't find the hunk separator", header.start));
  }
  // A range given as a single number may stand for one line or none.
  const oldCount = mid.start === header.end || !header.old.explicitCount ? 0 : header.old.count;
  const newCount = !startsNewBlock(text, mid.end) || !header.new.explicitCount ? 0 : header.new.count;

  const oldBlock = checkBlock(
    text,
    { prefixes: ' -!', padding: '  ', start: header.end, end: oldCount > 0 ? mid.start : undefined, count: oldCount },
    header,
    autoFix,
    repairs
  );
  if (!oldBlock.ok) return oldBlock;
  return checkBlock(text, { prefixes: ' +!', padding: '  ', start: mid.end, count: newCount }, header, autoFix, repairs);
}

function unifiedCheck(
  text: string,
  header: HunkHeader,
  validEmpty: boolean,
  autoFix: AutoFixPolicy | undefined,
  repairs: Repair[]
): Result<void, MalformedHunkError> {
  let oldLeft = header.old.count;
  let newLeft = header.new.count;
  let pos = header.end;

  while (oldLeft > 0 || newLeft > 0) {
    const line = lineFrom(text, pos);
    if (!line) {
      return err(new MalformedHunkError('Hunk is shorter than its header says', header.start));
    }
    let lead = line.content.charAt(0);

    if (line.content === '') {
      if (!validEmpty) {
        if (!autoFix?.('whitespace-loss', line.start)) {
          return err(new MalformedHunkError('Hunk seems to have lost the leading whitespace of a line', line.start));
        }
        repairs.push({ span: { start: line.start, end: line.start }, text: ' ' });
      }
      lead = ' ';
    } else if (!' -+\\'.includes(lead)) {
      if (line.start === 0 || !autoFix?.('word-wrap', line.start)) {
        return err(new MalformedHunkError('Hunk seriously malformed', line.start));
      }
      repairs.push({ span: { start: line.start - 1, end: line.start }, text: '' });
      pos = line.next;
      continue;
    }

    if (lead === ' ' || lead === '-') {
      if (oldLeft === 0) return err(new MalformedHunkError('Hunk has more old lines than its header says', line.start));
      oldLeft--;
    }
    if (lead === ' ' || lead === '+') {
      if (newLeft === 0) return err(new MalformedHunkError('Hunk has more new lines than its header says', line.start));
      newLeft--;
    }
    pos = line.next;
  }
  return ok(undefined);
}

/**
 * Check that the body of the hunk at `hunkStart` holds the lines its header
 * declares. Damage that `autoFix` agrees to repair is repaired in the
 * returned text.
 */
export function checkHunk(text: string, hunkStart: number, options: CheckOptions = {}): Result<CheckResult, MalformedHunkError> {
  const parsed = parseHeader(text, hunkStart);
  if (!parsed.ok) return parsed;
  const header = parsed.value;
  const repairs: Repair[] = [];

  let checked: Result<void, MalformedHunkError>;
  switch (header.style) {
    case 'unified':
      checked = unifiedCheck(text, header, options.validUnifiedEmptyLine ?? true, options.autoFix, repairs);
      break;
    case 'context':
      checked = contextCheck(text, header, options.autoFix, repairs);
      break;
    case 'normal':
      checked = ok(undefined);
      break;
  }
  if (!checked.ok) return checked;

  let out = text;
  for (const repair of [...repairs].sort((a, b) => b.span.start - a.span.start)) {
    out = out.slice(0, repair.span.start) + repair.text + out.slice(repair.span.end);
  }
  return ok({ text: out, fixed: repairs.length > 0 });
}
