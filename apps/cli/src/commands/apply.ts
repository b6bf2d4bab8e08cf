/**
 * apply and test commands
 */

import { Command } from 'commander';
import {
  DiffDocument,
  applyAll,
  applyHunk,
  formatBatchReport,
  formatHunkStatus,
  positionOfLine,
  testAll,
  type ApplyOutcome,
  type Hunk,
} from '@hunkwise/diff';
import type { CliContext } from '../context.js';
import { guarded, hunkNumber, parseCount, parseLineNumber, rangeAtLine, type LineOption } from './shared.js';

interface TargetOptions extends LineOption {
  reverse?: boolean;
  strip?: number;
  directory: string;
  file?: string;
  fuzzy?: boolean;
}

interface ApplyCliOptions extends TargetOptions {
  force?: boolean;
  dryRun?: boolean;
}

interface TestCliOptions extends TargetOptions {
  rev?: string;
}

function targetOptions(command: Command): Command {
  return command
    .option('-R, --reverse', 'undo the diff instead of applying it')
    .option('-p, --strip <count>', 'leading directories to drop from file names', parseCount)
    .option('-d, --directory <dir>', 'directory the file names are relative to', '.')
    .option('--file <path>', 'use this target file instead of the names in the diff')
    .option('-l, --line <n>', 'only the hunk holding this line of the patch', parseLineNumber)
    .option('--fuzzy', 'match hunk text ignoring whitespace when no exact match exists')
    .option('--no-fuzzy', 'only exact matches');
}

function statusLine(path: string, index: number, outcome: Pick<ApplyOutcome, 'status' | 'lineOffset'> & { fuzzy?: boolean }): string {
  const fuzzy = outcome.fuzzy ? ' (whitespace differs)' : '';
  return `${path}: hunk #${index}: ${formatHunkStatus(outcome.status, outcome.lineOffset)}${fuzzy}`;
}

async function applyOne(context: CliContext, doc: DiffDocument, hunks: Hunk[], hunk: Hunk, options: ApplyCliOptions): Promise<void> {
  const { config, reporter } = context;
  const workspace = context.openWorkspace(options.directory, { dryRun: options.dryRun });
  const result = await applyHunk(doc, hunk.start, workspace, {
    reverse: options.reverse,
    force: options.force,
    strip: config.strip(options.strip),
    target: options.file,
    fuzzy: config.fuzzyOptions(options.fuzzy),
  });
  const index = hunkNumber(hunks, hunk.start);
  if (!result.ok) {
    reporter.error(`hunk #${index}: ${result.error.message}`);
    context.exitCode = 1;
    return;
  }

  const outcome = result.value;
  reporter.result(statusLine(outcome.path, index, outcome));
  if (outcome.status === 'already-applied' || outcome.status === 'not-yet-applied') {
    context.exitCode = 1;
    return;
  }

  const { errors } = await workspace.saveAll();
  for (const error of errors) {
    reporter.error(error.message);
  }
  if (errors.length > 0) context.exitCode = 1;
}

async function applyBatch(context: CliContext, doc: DiffDocument, hunks: Hunk[], options: ApplyCliOptions): Promise<void> {
  const { config, reporter } = context;
  const workspace = context.openWorkspace(options.directory, { dryRun: options.dryRun });
  const report = await applyAll(doc, workspace, {
    reverse: options.reverse,
    strip: config.strip(options.strip),
    target: options.file,
    fuzzy: config.fuzzyOptions(options.fuzzy),
  });

  for (const failure of report.failed) {
    reporter.error(`${failure.path ?? '?'}: hunk #${hunkNumber(hunks, failure.hunkStart)}: ${failure.error.message}`);
  }
  if (report.failures === 0) {
    for (const planned of report.planned) {
      reporter.result(statusLine(planned.path, hunkNumber(hunks, planned.hunkStart), planned));
    }
  }
  for (const error of report.ioErrors) {
    reporter.error(error.message);
  }

  const summary = formatBatchReport(report);
  if (report.failures > 0 || report.ioErrors.length > 0) {
    reporter.error(summary);
    context.exitCode = 1;
  } else {
    reporter.info(options.dryRun ? `${summary} (dry run)` : summary);
  }
}

export function applyCommands(program: Command, context: CliContext): void {
  targetOptions(
    program
      .command('apply <patch>')
      .description('Apply the hunks of a patch to the files it names; all hunks or none')
  )
    .option('-f, --force', 'with --line: apply even when the hunk looks applied already')
    .option('-n, --dry-run', 'locate the hunks and report, but write nothing')
    .action((patch: string, options: ApplyCliOptions) =>
      guarded(context, async () => {
        await context.config.load();
        const text = await context.io.read(patch);
        const doc = new DiffDocument(text, context.config.parseOptions());
        const hunks = doc.hunks();

        if (options.line === undefined) {
          if (options.force) {
            throw new Error('--force needs --line: a whole patch is only applied when no hunk is applied yet');
          }
          await applyBatch(context, doc, hunks, options);
          return;
        }

        // A file header line selects the first hunk after it.
        const hunk = doc.hunkAt(positionOfLine(text, options.line));
        if (!hunk.ok) {
          throw new Error(`No hunk at line ${options.line}: ${hunk.error.message}`);
        }
        await applyOne(context, doc, hunks, hunk.value, options);
      })
    );

  targetOptions(
    program
      .command('test <patch>')
      .description('Report for each hunk whether it is applied, not applied, or cannot be found')
  )
    .option('--rev <revision>', 'test against the files at this git revision')
    .action((patch: string, options: TestCliOptions) =>
      guarded(context, async () => {
        const { config, reporter } = context;
        await config.load();
        const text = await context.io.read(patch);
        const doc = new DiffDocument(text, config.parseOptions());
        const hunks = doc.hunks();
        const workspace = context.openWorkspace(options.directory);

        const report = await testAll(doc, workspace, {
          reverse: options.reverse,
          strip: config.strip(options.strip),
          target: options.file,
          fuzzy: config.fuzzyOptions(options.fuzzy),
          revision: options.rev,
          range: rangeAtLine(text, options.line),
        });

        for (const { hunkStart, result } of report.results) {
          const index = hunkNumber(hunks, hunkStart);
          if (result.ok) {
            reporter.result(statusLine(result.value.path, index, result.value));
          } else {
            reporter.error(`hunk #${index}: ${result.error.message}`);
            context.exitCode = 1;
          }
        }
      })
    );
}
