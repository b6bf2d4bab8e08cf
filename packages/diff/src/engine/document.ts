/**
 * File sections of a diff: the junk and header lines in front of a run of
 * hunks, and the hunks themselves. Sections are computed lazily and never
 * outlive the text they were computed from.
 */

import { MalformedHunkError, err, ok, type Result } from '../errors.js';
import { findHunkBounds, hunkStyleAt, parseHunk, type Hunk, type HunkSide, type ParseOptions } from './hunkParser.js';
import { lineAt, lineFrom, spanTouches, type Span } from './text.js';

export const NULL_DEVICE = '/dev/null';

export interface FileSection {
  start: number;
  /** Offset of the first hunk (or the section end when it has none) */
  headerEnd: number;
  end: number;
  oldName?: string;
  newName?: string;
  /** Name from an `Index:` line */
  indexName?: string;
  isGit: boolean;
  gitOldName?: string;
  gitNewName?: string;
  newFileMode?: string;
  deletedFileMode?: string;
  oldMode?: string;
  newMode?: string;
  renameFrom?: string;
  renameTo?: string;
  hunks: Hunk[];
}

export const GIT_HEADER_RE = /^diff --git (\S+|"(?:[^"\\]|\\.)*") (\S+|"(?:[^"\\]|\\.)*")$/;
const GIT_METADATA: Array<[RegExp, keyof Pick<FileSection, 'newFileMode' | 'deletedFileMode' | 'oldMode' | 'newMode' | 'renameFrom' | 'renameTo' | 'indexName'>]> = [
  [/^new file mode (\S+)$/, 'newFileMode'],
  [/^deleted file mode (\S+)$/, 'deletedFileMode'],
  [/^old mode (\S+)$/, 'oldMode'],
  [/^new mode (\S+)$/, 'newMode'],
  [/^rename from (.+)$/, 'renameFrom'],
  [/^rename to (.+)$/, 'renameTo'],
  [/^Index: (.+)$/, 'indexName'],
];

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', '"': '"', '\\': '\\' };

function unquote(name: string): string {
  if (!name.startsWith('"') || !name.endsWith('"') || name.length < 2) {
    return name;
  }
  return name.slice(1, -1).replace(/\\(.)/g, (_match: string, ch: string) => ESCAPES[ch] ?? ch);
}

/** File name from a `--- name<TAB>date` style header line body. */
export function parseHeaderFileName(rest: string): string {
  const trimmed = rest.trimEnd();
  if (trimmed.startsWith('"')) {
    const closing = /^"(?:[^"\\]|\\.)*"/.exec(trimmed);
    if (closing) return unquote(closing[0]);
  }
  const tab = trimmed.indexOf('\t');
  return tab >= 0 ? trimmed.slice(0, tab) : trimmed;
}

function emptySection(start: number): FileSection {
  return { start, headerEnd: start, end: start, isGit: false, hunks: [] };
}

/**
 * Read the header line at `pos` into `section`. Returns the offset of the
 * line after the consumed header lines.
 */
function readHeaderLine(text: string, pos: number, section: FileSection): number {
  const line = lineAt(text, pos);
  const content = line.content;
  const next = lineFrom(text, line.next);

  if (content.startsWith('--- ') && next?.content.startsWith('+++ ')) {
    section.oldName = parseHeaderFileName(content.slice(4));
    section.newName = parseHeaderFileName(next.content.slice(4));
    return next.next;
  }
  if (content.startsWith('*** ') && next?.content.startsWith('--- ')) {
    section.oldName = parseHeaderFileName(content.slice(4));
    section.newName = parseHeaderFileName(next.content.slice(4));
    return next.next;
  }

  const git = GIT_HEADER_RE.exec(content);
  if (git) {
    section.isGit = true;
    section.gitOldName = unquote(git[1]);
    section.gitNewName = unquote(git[2]);
    return line.next;
  }

  for (const [re, field] of GIT_METADATA) {
    const match = re.exec(content);
    if (match) {
      section[field] = match[1];
      break;
    }
  }
  return line.next;
}

export function scanSections(text: string, options: ParseOptions = {}): FileSection[] {
  const sections: FileSection[] = [];
  let current: FileSection | null = null;
  let pos = 0;

  while (pos < text.length) {
    if (hunkStyleAt(text, pos)) {
      const hunk = parseHunk(text, pos, options);
      if (hunk.ok && hunk.value.end > pos) {
        if (!current) {
          current = emptySection(pos);
          sections.push(current);
        }
        current.hunks.push(hunk.value);
        pos = hunk.value.end;
        current.end = pos;
        continue;
      }
    }

    if (!current || current.hunks.length > 0) {
      current = emptySection(pos);
      sections.push(current);
    }
    pos = readHeaderLine(text, pos, current);
    current.headerEnd = pos;
    current.end = pos;
  }

  for (let i = 0; i < sections.length - 1; i++) {
    sections[i].end = sections[i + 1].start;
  }
  if (sections.length > 0) {
    sections[sections.length - 1].end = text.length;
  }
  return sections;
}

/** Names of the section's files, the one for `side` first. */
export function sectionFileNames(section: FileSection, side: HunkSide): Array<string | undefined> {
  const oldName = section.oldName ?? section.gitOldName ?? section.renameFrom;
  const newName = section.newName ?? section.gitNewName ?? section.renameTo;
  return side === 'old' ? [oldName, newName] : [newName, oldName];
}

export function isNullDevice(name: string | undefined): boolean {
  return name === NULL_DEVICE;
}

/** Whether the section creates (side `old` is null) or deletes (side `new` is null) its file. */
export function sideIsNull(section: FileSection, side: HunkSide): boolean {
  if (side === 'old' && section.newFileMode !== undefined) return true;
  if (side === 'new' && section.deletedFileMode !== undefined) return true;
  return isNullDevice(side === 'old' ? section.oldName : section.newName);
}

export function stripLeadingDirs(name: string, count: number): string | null {
  const parts = name.split('/').filter(Boolean);
  if (count >= parts.length) return null;
  return parts.slice(count).join('/');
}

/**
 * Paths to try for the target of `section`: names of `side` then the other
 * side then `Index:`, each as written and with leading directories dropped
 * one at a time. An explicit strip count is tried first.
 */
export function candidatePaths(section: FileSection, side: HunkSide, strip?: number): string[] {
  const names = [...sectionFileNames(section, side), section.indexName].filter(
    (name): name is string => name !== undefined && !isNullDevice(name)
  );
  const candidates: string[] = [];
  const add = (candidate: string | null) => {
    if (candidate && !candidates.includes(candidate)) candidates.push(candidate);
  };

  if (strip !== undefined) {
    for (const name of names) add(stripLeadingDirs(name, strip));
  }
  for (const name of names) {
    let remaining: string | null = name;
    while (remaining) {
      add(remaining);
      const slash: number = remaining.indexOf('/');
      remaining = slash >= 0 ? remaining.slice(slash + 1) : null;
    }
  }
  return candidates;
}

/**
 * Path a newly created file should get: the new name, stripped by `strip`,
 * or by one directory for git-style `b/` names.
 */
export function creationPath(section: FileSection, side: HunkSide, strip?: number): string | null {
  const [name] = sectionFileNames(section, side);
  if (!name || isNullDevice(name)) return null;
  const count = strip ?? (section.isGit ? 1 : 0);
  return stripLeadingDirs(name, count) ?? name;
}

export function isGitDiff(text: string): boolean {
  return /^diff --git /m.test(text) || /^From [0-9a-f]{40} /m.test(text);
}

export class DiffDocument {
  private cachedSections: FileSection[] | null = null;

  constructor(
    readonly text: string,
    readonly options: ParseOptions = {}
  ) {}

  get sections(): FileSection[] {
    if (!this.cachedSections) {
      this.cachedSections = scanSections(this.text, this.options);
    }
    return this.cachedSections;
  }

  get isGit(): boolean {
    return isGitDiff(this.text);
  }

  /** All hunks overlapping `range`, in document order. */
  hunks(range?: Span): Hunk[] {
    const all = this.sections.flatMap((section) => section.hunks);
    return all.filter((hunk) => spanTouches(hunk.start, hunk.end, range));
  }

  /** The hunk enclosing `pos`, or the next one. */
  hunkAt(pos: number): Result<Hunk, MalformedHunkError> {
    const bounds = findHunkBounds(this.text, pos, this.options);
    if (!bounds.ok) return bounds;
    const known = this.hunks().find((hunk) => hunk.start === bounds.value.start);
    if (known) return ok(known);
    return parseHunk(this.text, bounds.value.start, this.options);
  }

  sectionOf(hunk: Hunk): FileSection | undefined {
    return this.sections.find((section) => section.hunks.includes(hunk)) ?? this.sectionAt(hunk.start);
  }

  sectionAt(pos: number): FileSection | undefined {
    return this.sections.find((section) => pos >= section.start && pos < section.end);
  }

  requireSectionAt(pos: number): Result<FileSection, MalformedHunkError> {
    const section = this.sectionAt(pos);
    return section ? ok(section) : err(new MalformedHunkError('No file section here', pos));
  }
}
