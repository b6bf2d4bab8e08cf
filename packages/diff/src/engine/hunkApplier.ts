/**
 * Applying, reversing and testing hunks against workspace buffers
 */

import { NotFoundError, TargetIOError, err, ok, type DiffError, type Result } from '../errors.js';
import type { TextBuffer, Workspace } from '../workspace/Workspace.js';
import { candidatePaths, creationPath, sideIsNull, type DiffDocument, type FileSection } from './document.js';
import { extractHunkText, type Hunk, type HunkSide } from './hunkParser.js';
import { locate, replacementText, type FuzzyOptions, type SourceLocation } from './sourceLocator.js';
import type { Span } from './text.js';

export type HunkStatus = 'applied' | 'undone' | 'already-applied' | 'not-yet-applied' | 'deleted' | 'created';

export interface ApplyOptions {
  reverse?: boolean;
  /** Apply even when the hunk looks applied, which undoes it */
  force?: boolean;
  /** Leading directories to drop from diff file names before the usual candidates */
  strip?: number;
  /** Use this file instead of the names in the diff */
  target?: string;
  fuzzy?: FuzzyOptions;
}

export interface TestOptions extends Omit<ApplyOptions, 'force'> {
  /** Test against this revision of the target instead of the buffer */
  revision?: string;
}

export interface BatchOptions extends Omit<ApplyOptions, 'force'> {
  range?: Span;
}

export interface ApplyOutcome {
  status: HunkStatus;
  path: string;
  lineOffset: number;
  fuzzy: boolean;
  location: SourceLocation | null;
}

export interface HunkFailure {
  hunkStart: number;
  path?: string;
  error: DiffError;
}

export interface PlannedHunk {
  hunkStart: number;
  path: string;
  status: HunkStatus;
  lineOffset: number;
}

export interface BatchReport {
  failures: number;
  failed: HunkFailure[];
  /** Every hunk that was located, in document order */
  planned: PlannedHunk[];
  /** Targets saved or deleted */
  touched: string[];
  ioErrors: TargetIOError[];
  /** Hunks whose edits reached the store */
  applied: number;
}

export interface HunkTestResult {
  hunkStart: number;
  result: Result<ApplyOutcome, DiffError>;
}

export interface TestReport {
  results: HunkTestResult[];
  ioErrors: TargetIOError[];
}

interface Target {
  path: string;
  exists: boolean;
  /** The side the hunk starts from is the null device */
  creates: boolean;
  /** The side the hunk leads to is the null device */
  deletes: boolean;
}

interface PlannedEdit {
  hunkStart: number;
  path: string;
  lineOffset: number;
  span: Span;
  text: string;
  creates: boolean;
  deletes: boolean;
}

function sides(reverse: boolean): { from: HunkSide; to: HunkSide } {
  return reverse ? { from: 'new', to: 'old' } : { from: 'old', to: 'new' };
}

async function resolveTarget(
  section: FileSection | undefined,
  workspace: Workspace,
  options: ApplyOptions
): Promise<Result<Target, TargetIOError>> {
  const { from, to } = sides(options.reverse ?? false);
  const creates = section ? sideIsNull(section, from) : false;
  const deletes = section ? sideIsNull(section, to) : false;

  if (options.target !== undefined) {
    const exists = await workspace.exists(options.target);
    if (!exists && !creates) {
      return err(new TargetIOError(`Cannot find file ${options.target}`, options.target));
    }
    return ok({ path: options.target, exists, creates, deletes });
  }
  if (!section) {
    return err(new TargetIOError('No file header for this hunk', ''));
  }

  const candidates = candidatePaths(section, to, options.strip);
  for (const candidate of candidates) {
    if (await workspace.exists(candidate)) {
      return ok({ path: candidate, exists: true, creates, deletes });
    }
  }
  if (creates) {
    const path = creationPath(section, to, options.strip);
    if (path) return ok({ path, exists: false, creates, deletes });
  }

  const first = candidates[0];
  return err(
    first === undefined
      ? new TargetIOError('No file name in the diff header', '')
      : new TargetIOError(`Cannot find file ${first}`, first)
  );
}

function sideText(hunk: Hunk, side: HunkSide): Result<string, DiffError> {
  const extracted = extractHunkText(hunk.raw, side);
  return extracted.ok ? ok(extracted.value.text) : extracted;
}

function outcome(status: HunkStatus, location: SourceLocation): ApplyOutcome {
  return {
    status,
    path: location.path,
    lineOffset: location.lineOffset,
    fuzzy: location.fuzzy,
    location,
  };
}

/**
 * Apply the hunk at `hunkPos` to its target buffer. The buffer is edited
 * but not saved.
 */
export async function applyHunk(
  doc: DiffDocument,
  hunkPos: number,
  workspace: Workspace,
  options: ApplyOptions = {}
): Promise<Result<ApplyOutcome, DiffError>> {
  const hunk = doc.hunkAt(hunkPos);
  if (!hunk.ok) return hunk;
  const target = await resolveTarget(doc.sectionOf(hunk.value), workspace, options);
  if (!target.ok) return target;

  const reverse = options.reverse ?? false;
  const { path } = target.value;

  if (!target.value.exists) {
    const text = sideText(hunk.value, sides(reverse).to);
    if (!text.ok) return text;
    workspace.create(path, text.value);
    return ok({ status: 'created', path, lineOffset: 0, fuzzy: false, location: null });
  }

  const buffer = await workspace.open(path);
  if (!buffer.ok) return buffer;
  const location = locate(hunk.value, { path, text: buffer.value.text }, { reverse, fuzzy: options.fuzzy });
  if (!location.ok) return location;
  const found = location.value;

  if (found.switched && !options.force) {
    return ok(outcome(reverse ? 'not-yet-applied' : 'already-applied', found));
  }

  workspace.replace(buffer.value, found.span, replacementText(found));
  if (target.value.deletes && !found.switched) {
    workspace.markDeleted(buffer.value);
    return ok(outcome('deleted', found));
  }
  return ok(outcome(found.switched !== reverse ? 'undone' : 'applied', found));
}

async function testParsedHunk(
  doc: DiffDocument,
  hunk: Hunk,
  workspace: Workspace,
  options: TestOptions
): Promise<Result<ApplyOutcome, DiffError>> {
  const target = await resolveTarget(doc.sectionOf(hunk), workspace, options);
  if (!target.ok) return target;
  const reverse = options.reverse ?? false;
  const { path } = target.value;

  if (!target.value.exists && options.revision === undefined) {
    // Statuses describe the diff in its forward direction.
    return ok({ status: reverse ? 'already-applied' : 'not-yet-applied', path, lineOffset: 0, fuzzy: false, location: null });
  }

  let text: string;
  if (options.revision !== undefined) {
    const read = await workspace.readRevision(path, options.revision);
    if (!read.ok) return read;
    text = read.value;
  } else {
    const buffer = await workspace.open(path);
    if (!buffer.ok) return buffer;
    text = buffer.value.text;
  }

  const location = locate(hunk, { path, text }, { reverse, fuzzy: options.fuzzy });
  if (!location.ok) return location;
  return ok(outcome(location.value.switched !== reverse ? 'already-applied' : 'not-yet-applied', location.value));
}

/** Locate the hunk at `hunkPos` without editing anything. */
export async function testHunk(
  doc: DiffDocument,
  hunkPos: number,
  workspace: Workspace,
  options: TestOptions = {}
): Promise<Result<ApplyOutcome, DiffError>> {
  const hunk = doc.hunkAt(hunkPos);
  if (!hunk.ok) return hunk;
  return testParsedHunk(doc, hunk.value, workspace, options);
}

export async function testAll(doc: DiffDocument, workspace: Workspace, options: TestOptions & { range?: Span } = {}): Promise<TestReport> {
  const results: HunkTestResult[] = [];
  const ioErrors: TargetIOError[] = [];
  for (const hunk of doc.hunks(options.range)) {
    const result = await testParsedHunk(doc, hunk, workspace, options);
    if (!result.ok && result.error instanceof TargetIOError) {
      ioErrors.push(result.error);
    }
    results.push({ hunkStart: hunk.start, result });
  }
  return { results, ioErrors };
}

async function planHunk(
  doc: DiffDocument,
  hunk: Hunk,
  workspace: Workspace,
  options: BatchOptions
): Promise<Result<PlannedEdit, DiffError>> {
  const target = await resolveTarget(doc.sectionOf(hunk), workspace, options);
  if (!target.ok) return target;
  const reverse = options.reverse ?? false;
  const { path, deletes } = target.value;

  if (!target.value.exists) {
    const text = sideText(hunk, sides(reverse).to);
    if (!text.ok) return text;
    return ok({
      hunkStart: hunk.start,
      path,
      lineOffset: 0,
      span: { start: 0, end: 0 },
      text: text.value,
      creates: true,
      deletes: false,
    });
  }

  const buffer = await workspace.open(path);
  if (!buffer.ok) return buffer;
  const location = locate(hunk, { path, text: buffer.value.text }, { reverse, fuzzy: options.fuzzy });
  if (!location.ok) return location;
  if (location.value.switched) {
    return err(new NotFoundError(reverse ? 'Hunk not yet applied' : 'Hunk already applied', path));
  }

  return ok({
    hunkStart: hunk.start,
    path,
    lineOffset: location.value.lineOffset,
    span: location.value.span,
    text: replacementText(location.value),
    creates: false,
    deletes,
  });
}

/**
 * Apply every hunk in range, all or nothing: each hunk is located against
 * the buffers as they are, and only when every one of them was found are
 * the edits made and the targets saved.
 */
export async function applyAll(doc: DiffDocument, workspace: Workspace, options: BatchOptions = {}): Promise<BatchReport> {
  const failed: HunkFailure[] = [];
  const plans = new Map<string, PlannedEdit[]>();

  for (const hunk of doc.hunks(options.range)) {
    const plan = await planHunk(doc, hunk, workspace, options);
    if (!plan.ok) {
      const path = plan.error instanceof TargetIOError || plan.error instanceof NotFoundError ? plan.error.path : undefined;
      failed.push({ hunkStart: hunk.start, path, error: plan.error });
      continue;
    }
    const edits = plans.get(plan.value.path) ?? [];
    edits.push(plan.value);
    plans.set(plan.value.path, edits);
  }

  for (const [path, edits] of plans) {
    edits.sort((a, b) => a.span.start - b.span.start);
    for (let i = 1; i < edits.length; i++) {
      if (edits[i].span.start < edits[i - 1].span.end) {
        failed.push({
          hunkStart: edits[i].hunkStart,
          path,
          error: new NotFoundError('Hunk overlaps an earlier hunk', path),
        });
      }
    }
  }

  const reverse = options.reverse ?? false;
  const planned: PlannedHunk[] = [...plans.values()]
    .flat()
    .map((edit): PlannedHunk => ({
      hunkStart: edit.hunkStart,
      path: edit.path,
      status: edit.creates ? 'created' : edit.deletes ? 'deleted' : reverse ? 'undone' : 'applied',
      lineOffset: edit.lineOffset,
    }))
    .sort((a, b) => a.hunkStart - b.hunkStart);

  if (failed.length > 0) {
    failed.sort((a, b) => a.hunkStart - b.hunkStart);
    return { failures: failed.length, failed, planned, touched: [], ioErrors: [], applied: 0 };
  }

  const touched: string[] = [];
  const ioErrors: TargetIOError[] = [];
  let applied = 0;

  for (const [path, edits] of plans) {
    let buffer: TextBuffer;
    if (edits.some((edit) => edit.creates)) {
      buffer = workspace.create(path);
    } else {
      const opened = await workspace.open(path);
      if (!opened.ok) {
        ioErrors.push(opened.error);
        continue;
      }
      buffer = opened.value;
    }

    for (const edit of [...edits].reverse()) {
      workspace.replace(buffer, edit.span, edit.text);
    }
    if (edits.some((edit) => edit.deletes)) {
      workspace.markDeleted(buffer);
    }

    const saved = await workspace.save(buffer);
    if (saved.ok) {
      touched.push(path);
      applied += edits.length;
    } else {
      ioErrors.push(saved.error);
    }
  }

  return { failures: 0, failed, planned, touched, ioErrors, applied };
}

const STATUS_MESSAGES: Record<HunkStatus, string> = {
  applied: 'Hunk applied',
  undone: 'Hunk reversed',
  'already-applied': 'Hunk already applied',
  'not-yet-applied': 'Hunk not yet applied',
  deleted: 'File deleted',
  created: 'File created',
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${Math.abs(count) === 1 ? '' : 's'}`;
}

export function formatHunkStatus(status: HunkStatus, lineOffset = 0): string {
  const message = STATUS_MESSAGES[status];
  if (lineOffset === 0 || status === 'created') {
    return message;
  }
  return `${message} at offset ${plural(lineOffset, 'line')}`;
}

export function formatBatchReport(report: BatchReport): string {
  if (report.failures > 0) {
    return `${plural(report.failures, 'hunk')} failed; no buffers changed`;
  }
  const saved = `Saved ${plural(report.touched.length, 'buffer')}`;
  return report.ioErrors.length > 0 ? `${saved}; ${plural(report.ioErrors.length, 'target')} could not be written` : saved;
}
