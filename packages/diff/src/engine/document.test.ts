import { describe, it, expect } from 'vitest';
import {
  DiffDocument,
  candidatePaths,
  creationPath,
  isGitDiff,
  parseHeaderFileName,
  sideIsNull,
  stripLeadingDirs,
} from './document.js';

const GIT_PATCH = [
  'diff --git a/src/app.c b/src/app.c',
  'index 1111111..2222222 100644',
  '--- a/src/app.c',
  '+++ b/src/app.c',
  '@@ -1,2 +1,2 @@',
  '-old',
  '+new',
  ' keep',
  'diff --git a/docs/new.txt b/docs/new.txt',
  'new file mode 100644',
  '--- /dev/null',
  '+++ b/docs/new.txt',
  '@@ -0,0 +1 @@',
  '+hello',
  '',
].join('\n');

describe('file sections', () => {
  const doc = new DiffDocument(GIT_PATCH);

  it('should split a git patch into sections with their hunks', () => {
    expect(doc.isGit).toBe(true);
    expect(doc.sections).toHaveLength(2);
    expect(doc.sections[0]).toMatchObject({
      isGit: true,
      gitOldName: 'a/src/app.c',
      gitNewName: 'b/src/app.c',
      oldName: 'a/src/app.c',
      newName: 'b/src/app.c',
    });
    expect(doc.sections[0].hunks).toHaveLength(1);
    expect(doc.sections[1].newFileMode).toBe('100644');
  });

  it('should know which side is the null device', () => {
    expect(sideIsNull(doc.sections[1], 'old')).toBe(true);
    expect(sideIsNull(doc.sections[0], 'new')).toBe(false);
  });

  it('should select hunks by position', () => {
    const second = GIT_PATCH.indexOf('@@ -0,0');
    expect(doc.hunks()).toHaveLength(2);
    expect(doc.hunks({ start: second + 3, end: second + 3 }).map((hunk) => hunk.start)).toEqual([second]);

    const first = doc.hunkAt(0);
    expect(first.ok && first.value.start).toBe(GIT_PATCH.indexOf('@@ -1,2'));

    const hunk = doc.hunks()[1];
    expect(doc.sectionOf(hunk)).toBe(doc.sections[1]);
  });

  it('should report positions outside every section', () => {
    const section = doc.requireSectionAt(GIT_PATCH.length);
    expect(!section.ok && section.error.message).toBe('No file section here');
  });
});

describe('target names', () => {
  const doc = new DiffDocument(GIT_PATCH);

  it('should list candidates with leading directories dropped one at a time', () => {
    expect(candidatePaths(doc.sections[0], 'new')).toEqual(['b/src/app.c', 'src/app.c', 'app.c', 'a/src/app.c']);
  });

  it('should try an explicit strip count first', () => {
    expect(candidatePaths(doc.sections[0], 'new', 1)).toEqual(['src/app.c', 'b/src/app.c', 'app.c', 'a/src/app.c']);
  });

  it('should skip the null device', () => {
    expect(candidatePaths(doc.sections[1], 'new')).toEqual(['b/docs/new.txt', 'docs/new.txt', 'new.txt']);
  });

  it('should strip the git prefix from the name of a created file', () => {
    expect(creationPath(doc.sections[1], 'new')).toBe('docs/new.txt');
    expect(creationPath(doc.sections[1], 'old')).toBeNull();
  });

  it('should parse header file names', () => {
    expect(parseHeaderFileName('a/x.c\t2024-01-01 10:00:00')).toBe('a/x.c');
    expect(parseHeaderFileName('"a/sp ace.c"')).toBe('a/sp ace.c');
    expect(parseHeaderFileName('"a/t\\tb"')).toBe('a/t\tb');
    expect(stripLeadingDirs('a/b/c', 2)).toBe('c');
    expect(stripLeadingDirs('a/b', 2)).toBeNull();
  });

  it('should tell git patches from plain ones', () => {
    expect(isGitDiff('--- a\n+++ b\n')).toBe(false);
  });
});
