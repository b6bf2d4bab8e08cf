/**
 * Conversions between diff styles and reversal of a diff's direction.
 *
 * Every conversion is a single left-to-right pass: hunks and file headers in
 * range are rewritten into a fresh string, everything else is copied as is.
 * The result carries a mapping from each rewritten source span to its
 * replacement in the output.
 */

import { GIT_HEADER_RE } from './document.js';
import {
  CONTEXT_OLD_HEADER_RE,
  NORMAL_HEADER_RE,
  hunkStyleAt,
  parseHunk,
  type Hunk,
  type HunkLine,
  type LineRange,
  type ParseOptions,
} from './hunkParser.js';
import { lineAt, lineFrom, spanTouches, type Span, type TextLine } from './text.js';

export interface SpanMapping {
  from: Span;
  to: Span;
}

export interface ConversionResult {
  text: string;
  /** Whether the inverse conversion gives back the original text */
  reversible: boolean;
  mappings: SpanMapping[];
}

interface Rewrite {
  text: string;
  reversible: boolean;
}

interface HeaderRewrite {
  text: string;
  next: number;
}

interface Rewriters {
  hunk(hunk: Hunk): Rewrite | null;
  header(text: string, line: TextLine): HeaderRewrite | null;
}

function rewriteDocument(text: string, range: Span | undefined, options: ParseOptions, rewriters: Rewriters): ConversionResult {
  const mappings: SpanMapping[] = [];
  let out = '';
  let reversible = true;
  let pos = 0;

  const emit = (from: Span, replacement: string) => {
    mappings.push({ from, to: { start: out.length, end: out.length + replacement.length } });
    out += replacement;
  };

  while (pos < text.length) {
    if (hunkStyleAt(text, pos)) {
      const parsed = parseHunk(text, pos, options);
      if (parsed.ok && parsed.value.end > pos) {
        const hunk = parsed.value;
        const rewritten = spanTouches(hunk.start, hunk.end, range) ? rewriters.hunk(hunk) : null;
        if (rewritten) {
          emit({ start: hunk.start, end: hunk.end }, rewritten.text);
          reversible = reversible && rewritten.reversible;
        } else {
          out += hunk.raw;
        }
        pos = hunk.end;
        continue;
      }
    }

    const line = lineAt(text, pos);
    const header = rewriters.header(text, line);
    if (header && spanTouches(line.start, header.next, range)) {
      emit({ start: pos, end: header.next }, header.text);
      pos = header.next;
      continue;
    }
    out += text.slice(pos, line.next);
    pos = line.next;
  }

  return { text: out, reversible, mappings };
}

/** Join rewritten lines, ending with a newline when the source hunk did. */
function assemble(lines: string[], source: string): string {
  return lines.join('\n') + (source.endsWith('\n') ? '\n' : '');
}

function contextRangeText(range: LineRange): string {
  if (!range.explicitCount || range.count === 0) {
    return `${range.start}`;
  }
  return `${range.start},${range.start + range.count - 1}`;
}

function unifiedRangeText(range: LineRange): string {
  return range.explicitCount ? `${range.start},${range.count}` : `${range.start}`;
}

/** Kind of the nearest line before `index` that is not a `\` marker. */
function ownerKind(lines: HunkLine[], index: number): HunkLine['kind'] | null {
  for (let i = index - 1; i >= 0; i--) {
    if (lines[i].kind !== 'no-newline') return lines[i].kind;
  }
  return null;
}

function followedBy(lines: HunkLine[], index: number, skip: HunkLine['kind'], wanted: HunkLine['kind']): boolean {
  for (let i = index + 1; i < lines.length; i++) {
    const kind = lines[i].kind;
    if (kind === skip || kind === 'no-newline') continue;
    return kind === wanted;
  }
  return false;
}

function precededBy(lines: HunkLine[], index: number, skip: HunkLine['kind'], wanted: HunkLine['kind']): boolean {
  for (let i = index - 1; i >= 0; i--) {
    const kind = lines[i].kind;
    if (kind === skip || kind === 'no-newline') continue;
    return kind === wanted;
  }
  return false;
}

function unifiedHunkToContext(hunk: Hunk): Rewrite | null {
  const { header, lines } = hunk;
  if (header.style !== 'unified' || lines.some((l) => l.kind === 'other' || l.kind === 'changed')) {
    return null;
  }

  let reversible = true;
  let hasRemoved = false;
  let hasAdded = false;
  const oldBlock: string[] = [];
  const newBlock: string[] = [];

  lines.forEach((line, i) => {
    switch (line.kind) {
      case 'context':
        if (line.raw === '') reversible = false;
        oldBlock.push(`  ${line.content}`);
        newBlock.push(`  ${line.content}`);
        break;
      case 'removed':
        hasRemoved = true;
        oldBlock.push(`${followedBy(lines, i, 'removed', 'added') ? '!' : '-'} ${line.content}`);
        break;
      case 'added':
        hasAdded = true;
        newBlock.push(`${precededBy(lines, i, 'added', 'removed') ? '!' : '+'} ${line.content}`);
        if (lines[i + 1]?.kind === 'removed') reversible = false;
        break;
      case 'no-newline': {
        const owner = ownerKind(lines, i);
        if (owner !== 'added') oldBlock.push(line.raw);
        if (owner !== 'removed') newBlock.push(line.raw);
        break;
      }
    }
  });

  const out = [`***************${header.section}`, `*** ${contextRangeText(header.old)} ****`];
  // A hunk made only of context keeps it in the old block.
  if (hasRemoved || !hasAdded) out.push(...oldBlock);
  out.push(`--- ${contextRangeText(header.new)} ----`);
  if (hasAdded) out.push(...newBlock);

  return { text: assemble(out, hunk.raw), reversible };
}

function contextHunkToUnified(hunk: Hunk): Rewrite | null {
  const { header } = hunk;
  if (header.style !== 'context') return null;

  const oldLines = hunk.lines.filter((l) => l.block === 'old');
  const newLines = hunk.lines.filter((l) => l.block === 'new');
  const body: string[] = [];
  let oldCount = 0;
  let newCount = 0;
  let reversible = true;

  const push = (prefix: ' ' | '-' | '+', line: HunkLine) => {
    if (line.kind === 'no-newline') {
      body.push(line.raw);
      return;
    }
    body.push(prefix + line.content);
    if (prefix !== '+') oldCount++;
    if (prefix !== '-') newCount++;
  };

  if (oldLines.length === 0 || newLines.length === 0) {
    const only = oldLines.length === 0 ? newLines : oldLines;
    const changed = oldLines.length === 0 ? '+' : '-';
    for (const line of only) push(line.kind === 'context' ? ' ' : changed, line);
  } else {
    let j = 0;
    for (let i = 0; i < oldLines.length; i++) {
      const line = oldLines[i];
      if (line.kind !== 'context') {
        push('-', line);
        continue;
      }
      while (j < newLines.length && newLines[j].kind !== 'context') {
        push('+', newLines[j]);
        j++;
      }
      const counterpart = newLines[j];
      if (counterpart) {
        if (counterpart.content !== line.content) reversible = false;
        j++;
        // The marker after shared context is printed in both blocks.
        if (oldLines[i + 1]?.kind === 'no-newline' && newLines[j]?.kind === 'no-newline') j++;
      } else {
        reversible = false;
      }
      push(' ', line);
    }
    for (; j < newLines.length; j++) {
      const line = newLines[j];
      if (line.kind === 'context') reversible = false;
      push(line.kind === 'context' ? ' ' : '+', line);
    }
  }

  const oldRange = {
    start: header.old.start,
    count: oldCount,
    explicitCount: header.old.explicitCount || oldCount !== 1,
  };
  const newRange = {
    start: header.new.start,
    count: newCount,
    explicitCount: header.new.explicitCount || newCount !== 1,
  };
  const out = [`@@ -${unifiedRangeText(oldRange)} +${unifiedRangeText(newRange)} @@${header.section}`, ...body];
  return { text: assemble(out, hunk.raw), reversible };
}

function flipPrefix(raw: string, from: string, to: string): string {
  if (raw.startsWith(from)) return to + raw.slice(from.length);
  if (raw.startsWith(to)) return from + raw.slice(to.length);
  return raw;
}

function reverseUnifiedHunk(hunk: Hunk): Rewrite {
  const { header, lines } = hunk;
  const out = [`@@ -${unifiedRangeText(header.new)} +${unifiedRangeText(header.old)} @@${header.section}`];
  let reversible = true;
  let nowRemoved: string[] = [];
  let nowAdded: string[] = [];

  // Each change run is printed removals first, as diff tools do.
  const flush = () => {
    out.push(...nowRemoved, ...nowAdded);
    nowRemoved = [];
    nowAdded = [];
  };

  let target: string[] = out;
  lines.forEach((line, i) => {
    switch (line.kind) {
      case 'no-newline':
        target.push(line.raw);
        return;
      case 'added':
        if (lines[i + 1]?.kind === 'removed') reversible = false;
        target = nowRemoved;
        target.push(flipPrefix(line.raw, '+', '-'));
        return;
      case 'removed':
        target = nowAdded;
        target.push(flipPrefix(line.raw, '+', '-'));
        return;
      default:
        flush();
        target = out;
        out.push(line.raw);
    }
  });
  flush();

  return { text: assemble(out, hunk.raw), reversible };
}

function reverseContextHunk(hunk: Hunk): Rewrite | null {
  const { header } = hunk;
  if (!header.midHeader) return null;
  const first = lineAt(hunk.raw, 0);
  const oldHeader = lineAt(hunk.raw, first.next).content;
  const midHeader = lineAt(hunk.raw, header.midHeader.start - hunk.start).content;
  const flip = (l: HunkLine) => flipPrefix(l.raw, '+', '-');

  const out = [
    first.content,
    `*** ${midHeader.slice(4, -5)} ****`,
    ...hunk.lines.filter((l) => l.block === 'new').map(flip),
    `--- ${oldHeader.slice(4, -5)} ----`,
    ...hunk.lines.filter((l) => l.block === 'old').map(flip),
  ];
  return { text: assemble(out, hunk.raw), reversible: true };
}

function reverseNormalHunk(hunk: Hunk): Rewrite | null {
  const match = NORMAL_HEADER_RE.exec(lineAt(hunk.raw, 0).content);
  if (!match) return null;
  const oldText = match[2] === undefined ? match[1] : `${match[1]},${match[2]}`;
  const newText = match[5] === undefined ? match[4] : `${match[4]},${match[5]}`;
  const command = match[3] === 'a' ? 'd' : match[3] === 'd' ? 'a' : 'c';
  const flip = (l: HunkLine) => flipPrefix(l.raw, '<', '>');

  const out = [`${newText}${command}${oldText}`, ...hunk.lines.filter((l) => l.block === 'new').map(flip)];
  if (command === 'c') out.push('---');
  out.push(...hunk.lines.filter((l) => l.block === 'old').map(flip));
  return { text: assemble(out, hunk.raw), reversible: true };
}

function reverseHunk(hunk: Hunk): Rewrite | null {
  switch (hunk.header.style) {
    case 'unified':
      return reverseUnifiedHunk(hunk);
    case 'context':
      return reverseContextHunk(hunk);
    case 'normal':
      return reverseNormalHunk(hunk);
  }
}

/** Rewrite a two-line header whose lines start with `first` and `second`. */
function pairedHeader(
  text: string,
  line: TextLine,
  first: string,
  second: string,
  build: (firstRest: string, secondRest: string) => [string, string]
): HeaderRewrite | null {
  if (!line.content.startsWith(first)) return null;
  const next = lineFrom(text, line.next);
  if (!next || !next.content.startsWith(second)) return null;
  const [a, b] = build(line.content.slice(first.length), next.content.slice(second.length));
  return { text: `${a}\n${b}${next.hasNewline ? '\n' : ''}`, next: next.next };
}

function isContextFileHeader(line: TextLine): boolean {
  return line.content.startsWith('*** ') && !CONTEXT_OLD_HEADER_RE.test(line.content);
}

function unifiedFileHeaderToContext(text: string, line: TextLine): HeaderRewrite | null {
  return pairedHeader(text, line, '--- ', '+++ ', (oldName, newName) => [`*** ${oldName}`, `--- ${newName}`]);
}

function contextFileHeaderToUnified(text: string, line: TextLine): HeaderRewrite | null {
  if (!isContextFileHeader(line)) return null;
  return pairedHeader(text, line, '*** ', '--- ', (oldName, newName) => [`--- ${oldName}`, `+++ ${newName}`]);
}

const SWAPPED_PAIRS: Array<[string, string]> = [
  ['--- ', '+++ '],
  ['*** ', '--- '],
  ['rename from ', 'rename to '],
  ['copy from ', 'copy to '],
  ['old mode ', 'new mode '],
];

function swapGitLine(content: string): string | null {
  if (content.startsWith('new file mode ')) return `deleted file mode ${content.slice(14)}`;
  if (content.startsWith('deleted file mode ')) return `new file mode ${content.slice(18)}`;

  const index = /^index ([0-9a-f]+)\.\.([0-9a-f]+)(.*)$/.exec(content);
  if (index) return `index ${index[2]}..${index[1]}${index[3]}`;

  const git = GIT_HEADER_RE.exec(content);
  if (git) {
    const [, oldName, newName] = git;
    if (oldName.startsWith('a/') && newName.startsWith('b/')) {
      return `diff --git a/${newName.slice(2)} b/${oldName.slice(2)}`;
    }
    return `diff --git ${newName} ${oldName}`;
  }
  return null;
}

function reverseFileHeader(text: string, line: TextLine): HeaderRewrite | null {
  for (const [first, second] of SWAPPED_PAIRS) {
    if (first === '*** ' && !isContextFileHeader(line)) continue;
    const swapped = pairedHeader(text, line, first, second, (a, b) => [first + b, second + a]);
    if (swapped) return swapped;
  }
  const single = swapGitLine(line.content);
  return single === null ? null : { text: single + (line.hasNewline ? '\n' : ''), next: line.next };
}

export function unifiedToContext(text: string, range?: Span, options: ParseOptions = {}): ConversionResult {
  return rewriteDocument(text, range, options, {
    hunk: unifiedHunkToContext,
    header: unifiedFileHeaderToContext,
  });
}

export function contextToUnified(text: string, range?: Span, options: ParseOptions = {}): ConversionResult {
  return rewriteDocument(text, range, options, {
    hunk: contextHunkToUnified,
    header: contextFileHeaderToUnified,
  });
}

/** Swap the old and new sides of every hunk and file header in range. */
export function reverseDirection(text: string, range?: Span, options: ParseOptions = {}): ConversionResult {
  return rewriteDocument(text, range, options, {
    hunk: reverseHunk,
    header: reverseFileHeader,
  });
}
