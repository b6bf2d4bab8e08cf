/**
 * Word and character level differences inside the changed lines of a hunk.
 * The diff text is only read; the result is a list of regions to highlight.
 */

import { diffChars, diffWordsWithSpace, type Change } from 'diff';
import { ok, type MalformedHunkError, type Result } from '../errors.js';
import { prefixWidth } from './lineKind.js';
import { parseHunk, type Hunk, type HunkLine, type ParseOptions } from './hunkParser.js';

export type Granularity = 'word' | 'char';

export type Differ = (oldText: string, newText: string) => Change[];

export type RefineKind = 'removed' | 'added' | 'removed-line' | 'added-line';

export interface RefineRegion {
  kind: RefineKind;
  start: number;
  end: number;
}

export interface RefineOptions extends ParseOptions {
  differ?: Differ;
  granularity?: Granularity;
  /** Also mark lines that were wholly added or removed */
  nonModified?: boolean;
}

interface Pairing {
  old: HunkLine[];
  new: HunkLine[];
}

/** Text of a run of lines, with the document offset of each line's content. */
class SideText {
  readonly text: string;
  private readonly lineStarts: number[] = [];
  private readonly docStarts: number[] = [];
  private readonly lengths: number[] = [];

  constructor(lines: HunkLine[], width: number) {
    let text = '';
    for (const line of lines) {
      this.lineStarts.push(text.length);
      this.docStarts.push(line.start + Math.min(width, line.raw.length));
      this.lengths.push(line.content.length);
      text += `${line.content}\n`;
    }
    this.text = text;
  }

  /** Document spans of `[from, to)`, split at line ends. */
  *spans(from: number, to: number): Generator<[number, number]> {
    for (let i = 0; i < this.lineStarts.length; i++) {
      const lineStart = this.lineStarts[i];
      const start = Math.max(from, lineStart);
      const end = Math.min(to, lineStart + this.lengths[i]);
      if (end > start) {
        yield [this.docStarts[i] + start - lineStart, this.docStarts[i] + end - lineStart];
      }
    }
  }
}

function withoutMarkers(lines: HunkLine[]): HunkLine[] {
  return lines.filter((line) => line.kind !== 'no-newline');
}

/** Runs of consecutive lines of `kind` in `lines`, markers skipped. */
function runsOf(lines: HunkLine[], kind: HunkLine['kind']): HunkLine[][] {
  const runs: HunkLine[][] = [];
  let current: HunkLine[] = [];
  for (const line of withoutMarkers(lines)) {
    if (line.kind === kind) {
      current.push(line);
    } else if (current.length > 0) {
      runs.push(current);
      current = [];
    }
  }
  if (current.length > 0) runs.push(current);
  return runs;
}

function unifiedPairings(hunk: Hunk): Pairing[] {
  const pairings: Pairing[] = [];
  let removed: HunkLine[] = [];
  let added: HunkLine[] = [];

  const flush = () => {
    if (removed.length > 0 || added.length > 0) pairings.push({ old: removed, new: added });
    removed = [];
    added = [];
  };

  for (const line of withoutMarkers(hunk.lines)) {
    if (line.kind === 'removed') {
      if (added.length > 0) flush();
      removed.push(line);
    } else if (line.kind === 'added') {
      added.push(line);
    } else {
      flush();
    }
  }
  flush();
  return pairings;
}

function contextPairings(hunk: Hunk): Pairing[] {
  const oldLines = hunk.lines.filter((l) => l.block === 'old');
  const newLines = hunk.lines.filter((l) => l.block === 'new');
  const oldRuns = runsOf(oldLines, 'changed');
  const newRuns = runsOf(newLines, 'changed');
  const pairings: Pairing[] = [];

  for (let i = 0; i < Math.max(oldRuns.length, newRuns.length); i++) {
    pairings.push({ old: oldRuns[i] ?? [], new: newRuns[i] ?? [] });
  }
  for (const run of runsOf(oldLines, 'removed')) pairings.push({ old: run, new: [] });
  for (const run of runsOf(newLines, 'added')) pairings.push({ old: [], new: run });
  return pairings;
}

function normalPairings(hunk: Hunk): Pairing[] {
  return [
    {
      old: withoutMarkers(hunk.lines.filter((l) => l.block === 'old')),
      new: withoutMarkers(hunk.lines.filter((l) => l.block === 'new')),
    },
  ];
}

export function defaultDiffer(granularity: Granularity = 'word'): Differ {
  return granularity === 'char'
    ? (oldText, newText) => diffChars(oldText, newText)
    : (oldText, newText) => diffWordsWithSpace(oldText, newText);
}

function wholeLines(lines: HunkLine[], kind: 'removed-line' | 'added-line'): RefineRegion[] {
  return lines
    .filter((line) => line.raw.length > 0)
    .map((line) => ({ kind, start: line.start, end: line.start + line.raw.length }));
}

function refinePair(pairing: Pairing, width: number, differ: Differ): RefineRegion[] {
  const oldSide = new SideText(pairing.old, width);
  const newSide = new SideText(pairing.new, width);
  const regions: RefineRegion[] = [];
  let oldPos = 0;
  let newPos = 0;

  for (const change of differ(oldSide.text, newSide.text)) {
    const length = change.value.length;
    if (change.removed) {
      for (const [start, end] of oldSide.spans(oldPos, oldPos + length)) regions.push({ kind: 'removed', start, end });
      oldPos += length;
    } else if (change.added) {
      for (const [start, end] of newSide.spans(newPos, newPos + length)) regions.push({ kind: 'added', start, end });
      newPos += length;
    } else {
      oldPos += length;
      newPos += length;
    }
  }
  return regions;
}

export function refineParsedHunk(hunk: Hunk, options: RefineOptions = {}): RefineRegion[] {
  const differ = options.differ ?? defaultDiffer(options.granularity);
  const width = prefixWidth(hunk.header.style);
  const pairings =
    hunk.header.style === 'unified'
      ? unifiedPairings(hunk)
      : hunk.header.style === 'context'
        ? contextPairings(hunk)
        : normalPairings(hunk);

  const regions: RefineRegion[] = [];
  for (const pairing of pairings) {
    if (pairing.old.length > 0 && pairing.new.length > 0) {
      regions.push(...refinePair(pairing, width, differ));
    } else if (options.nonModified) {
      regions.push(...wholeLines(pairing.old, 'removed-line'), ...wholeLines(pairing.new, 'added-line'));
    }
  }
  return regions.sort((a, b) => a.start - b.start);
}

/** Refinement regions of the hunk starting at `hunkStart`, as offsets into `text`. */
export function refineHunk(text: string, hunkStart: number, options: RefineOptions = {}): Result<RefineRegion[], MalformedHunkError> {
  const hunk = parseHunk(text, hunkStart, options);
  if (!hunk.ok) return hunk;
  return ok(refineParsedHunk(hunk.value, options));
}
