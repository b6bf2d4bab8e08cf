import { describe, it, expect } from 'vitest';
import { MemoryFileStore } from '../workspace/fileStore.js';
import { Workspace } from '../workspace/Workspace.js';
import { DiffDocument } from './document.js';
import { applyAll, applyHunk, formatBatchReport, formatHunkStatus, testAll, type BatchReport } from './hunkApplier.js';

const ORIGINAL = Array.from({ length: 30 }, (_, i) => `row ${i + 1}`).join('\n') + '\n';
const PATCHED = ORIGINAL.replace('row 2\n', 'LINE 2\n').replace('row 10\n', 'LINE 10\n').replace('row 20\n', 'LINE 20\n');

const THREE_HUNKS = [
  '--- a/src/main.txt',
  '+++ b/src/main.txt',
  '@@ -2 +2 @@',
  '-row 2',
  '+LINE 2',
  '@@ -10 +10 @@',
  '-row 10',
  '+LINE 10',
  '@@ -20 +20 @@',
  '-row 20',
  '+LINE 20',
  '',
].join('\n');

function workspaceWith(files: Record<string, string>): { store: MemoryFileStore; workspace: Workspace } {
  const store = new MemoryFileStore(files);
  return { store, workspace: new Workspace(store) };
}

describe('applyAll', () => {
  it('should apply every hunk and save the target', async () => {
    const { store, workspace } = workspaceWith({ 'src/main.txt': ORIGINAL });
    const report = await applyAll(new DiffDocument(THREE_HUNKS), workspace);

    expect(report.failures).toBe(0);
    expect(report.touched).toEqual(['src/main.txt']);
    expect(report.applied).toBe(3);
    expect(report.planned.map((hunk) => [hunk.status, hunk.lineOffset])).toEqual([
      ['applied', 0],
      ['applied', 0],
      ['applied', 0],
    ]);
    expect(store.snapshot()).toEqual({ 'src/main.txt': PATCHED });
  });

  it('should change nothing when one hunk cannot be found', async () => {
    const broken = THREE_HUNKS.replace('-row 10\n', '-missing row\n');
    const { store, workspace } = workspaceWith({ 'src/main.txt': ORIGINAL });
    const report = await applyAll(new DiffDocument(broken), workspace);

    expect(report.failures).toBe(1);
    expect(report.failed[0].hunkStart).toBe(broken.indexOf('@@ -10'));
    expect(report.failed[0].path).toBe('src/main.txt');
    expect(report.failed[0].error.message).toBe('Hunk text not found');
    expect(report.planned).toHaveLength(2);
    expect(report.applied).toBe(0);
    expect(store.snapshot()).toEqual({ 'src/main.txt': ORIGINAL });
  });

  it('should restore the original text when reverse-applied', async () => {
    const store = new MemoryFileStore({ 'src/main.txt': ORIGINAL });
    const doc = new DiffDocument(THREE_HUNKS);
    await applyAll(doc, new Workspace(store));
    const report = await applyAll(doc, new Workspace(store), { reverse: true });

    expect(report.planned.every((hunk) => hunk.status === 'undone')).toBe(true);
    expect(store.snapshot()).toEqual({ 'src/main.txt': ORIGINAL });
  });

  it('should refuse hunks that are applied already', async () => {
    const { store, workspace } = workspaceWith({ 'src/main.txt': PATCHED });
    const report = await applyAll(new DiffDocument(THREE_HUNKS), workspace);

    expect(report.failures).toBe(3);
    expect(report.failed.map((failure) => failure.error.message)).toEqual([
      'Hunk already applied',
      'Hunk already applied',
      'Hunk already applied',
    ]);
    expect(store.snapshot()).toEqual({ 'src/main.txt': PATCHED });
  });

  it('should create a file whose old side is the null device', async () => {
    const patch = [
      'diff --git a/docs/new.txt b/docs/new.txt',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/docs/new.txt',
      '@@ -0,0 +1,2 @@',
      '+hello',
      '+world',
      '',
    ].join('\n');
    const { store, workspace } = workspaceWith({});
    const report = await applyAll(new DiffDocument(patch), workspace);

    expect(report.planned.map((hunk) => hunk.status)).toEqual(['created']);
    expect(store.snapshot()).toEqual({ 'docs/new.txt': 'hello\nworld\n' });
  });

  it('should delete a file whose new side is the null device', async () => {
    const patch = '--- a/old.txt\n+++ /dev/null\n@@ -1,2 +0,0 @@\n-a\n-b\n';
    const { store, workspace } = workspaceWith({ 'old.txt': 'a\nb\n', 'keep.txt': 'x\n' });
    const report = await applyAll(new DiffDocument(patch), workspace);

    expect(report.planned.map((hunk) => hunk.status)).toEqual(['deleted']);
    expect(report.touched).toEqual(['old.txt']);
    expect(store.snapshot()).toEqual({ 'keep.txt': 'x\n' });
  });

  it('should not create a missing explicit target from an ordinary hunk', async () => {
    const { store, workspace } = workspaceWith({});
    const report = await applyAll(new DiffDocument(THREE_HUNKS), workspace, { target: 'missing.txt' });

    expect(report.failures).toBe(3);
    expect(report.failed[0].path).toBe('missing.txt');
    expect(report.failed[0].error.message).toBe('Cannot find file missing.txt');
    expect(store.snapshot()).toEqual({});
  });

  it('should insert a pure addition whose line also occurs further down', async () => {
    const { store, workspace } = workspaceWith({ 'f.txt': 'a\nb\nc\n}\n' });
    const report = await applyAll(new DiffDocument('1a2\n> }\n'), workspace, { target: 'f.txt' });

    expect(report.failures).toBe(0);
    expect(store.snapshot()).toEqual({ 'f.txt': 'a\n}\nb\nc\n}\n' });

    const again = await applyAll(new DiffDocument('1a2\n> }\n'), workspace, { target: 'f.txt' });
    expect(again.failed.map((failure) => failure.error.message)).toEqual(['Hunk already applied']);
  });

  it('should report a target that does not exist', async () => {
    const { workspace } = workspaceWith({});
    const report = await applyAll(new DiffDocument(THREE_HUNKS), workspace);

    expect(report.failures).toBe(3);
    expect(report.failed[0].error.message).toBe('Cannot find file b/src/main.txt');
  });
});

describe('applyHunk', () => {
  it('should leave an applied hunk alone unless forced', async () => {
    const { store, workspace } = workspaceWith({ 'src/main.txt': PATCHED });
    const doc = new DiffDocument(THREE_HUNKS);
    const first = THREE_HUNKS.indexOf('@@ -2');

    const skipped = await applyHunk(doc, first, workspace);
    expect(skipped.ok && skipped.value.status).toBe('already-applied');
    expect(workspace.modifiedBuffers).toHaveLength(0);

    const forced = await applyHunk(doc, first, workspace, { force: true });
    expect(forced.ok && forced.value.status).toBe('undone');
    await workspace.saveAll();
    expect(store.snapshot()['src/main.txt']).toBe(PATCHED.replace('LINE 2\n', 'row 2\n'));
  });

  it('should apply to an explicit target file', async () => {
    const { store, workspace } = workspaceWith({ 'copy.txt': ORIGINAL });
    const doc = new DiffDocument(THREE_HUNKS);
    const result = await applyHunk(doc, THREE_HUNKS.indexOf('@@ -20'), workspace, { target: 'copy.txt' });

    expect(result.ok && result.value.path).toBe('copy.txt');
    await workspace.saveAll();
    expect(store.snapshot()['copy.txt']).toBe(ORIGINAL.replace('row 20\n', 'LINE 20\n'));
  });

  it('should refuse a missing explicit target unless the hunk creates it', async () => {
    const { store, workspace } = workspaceWith({});
    const result = await applyHunk(new DiffDocument(THREE_HUNKS), THREE_HUNKS.indexOf('@@ -2'), workspace, { target: 'missing.txt' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('TARGET_IO');
    expect(result.error.message).toBe('Cannot find file missing.txt');
    expect(workspace.modifiedBuffers).toHaveLength(0);

    const creation = 'new file mode 100644\n--- /dev/null\n+++ b/docs/new.txt\n@@ -0,0 +1 @@\n+hello\n';
    const created = await applyHunk(new DiffDocument(creation), creation.indexOf('@@'), workspace, { target: 'other.txt' });
    expect(created.ok && created.value.status).toBe('created');
    await workspace.saveAll();
    expect(store.snapshot()).toEqual({ 'other.txt': 'hello\n' });
  });

  it('should report the line offset of a moved hunk', async () => {
    const shifted = 'extra\nextra\n' + ORIGINAL;
    const { workspace } = workspaceWith({ 'src/main.txt': shifted });
    const result = await applyHunk(new DiffDocument(THREE_HUNKS), THREE_HUNKS.indexOf('@@ -10'), workspace);

    expect(result.ok && result.value.lineOffset).toBe(2);
    expect(result.ok && formatHunkStatus(result.value.status, result.value.lineOffset)).toBe('Hunk applied at offset 2 lines');
  });
});

describe('testAll', () => {
  it('should report statuses in the forward direction', async () => {
    const { workspace } = workspaceWith({ 'src/main.txt': ORIGINAL });
    const doc = new DiffDocument(THREE_HUNKS);

    const forward = await testAll(doc, workspace);
    expect(forward.results.map(({ result }) => result.ok && result.value.status)).toEqual([
      'not-yet-applied',
      'not-yet-applied',
      'not-yet-applied',
    ]);

    const reverse = await testAll(doc, workspace, { reverse: true });
    expect(reverse.results.map(({ result }) => result.ok && result.value.status)).toEqual([
      'not-yet-applied',
      'not-yet-applied',
      'not-yet-applied',
    ]);
  });

  it('should test against a revision', async () => {
    const store = new MemoryFileStore({ 'src/main.txt': PATCHED });
    const workspace = new Workspace(store, { read: async () => ORIGINAL });
    const report = await testAll(new DiffDocument(THREE_HUNKS), workspace, { revision: 'HEAD~1' });

    expect(report.results.map(({ result }) => result.ok && result.value.status)).toEqual([
      'not-yet-applied',
      'not-yet-applied',
      'not-yet-applied',
    ]);
  });

  it('should collect unreadable targets', async () => {
    const { workspace } = workspaceWith({});
    const report = await testAll(new DiffDocument(THREE_HUNKS), workspace);

    expect(report.ioErrors).toHaveLength(3);
    expect(report.ioErrors[0].path).toBe('b/src/main.txt');
  });
});

describe('messages', () => {
  it('should format hunk statuses', () => {
    expect(formatHunkStatus('applied')).toBe('Hunk applied');
    expect(formatHunkStatus('already-applied', 1)).toBe('Hunk already applied at offset 1 line');
    expect(formatHunkStatus('undone', -3)).toBe('Hunk reversed at offset -3 lines');
    expect(formatHunkStatus('created', 5)).toBe('File created');
  });

  it('should summarize a batch', () => {
    const report: BatchReport = { failures: 0, failed: [], planned: [], touched: ['a', 'b'], ioErrors: [], applied: 2 };
    expect(formatBatchReport(report)).toBe('Saved 2 buffers');
    expect(formatBatchReport({ ...report, failures: 1 })).toBe('1 hunk failed; no buffers changed');
  });
});
