/**
 * Commands that edit the patch itself: fixup, split, kill-hunk, kill-file, check
 */

import { Command } from 'commander';
import {
  checkHunk,
  fixupHeaders,
  killFile,
  killHunk,
  lineAt,
  lineNumberAt,
  nextHunkStart,
  positionOfLine,
  splitHunk,
  type EditResult,
  type MalformedHunkError,
  type ParseOptions,
  type Result,
} from '@hunkwise/diff';
import type { CliContext } from '../context.js';
import { guarded, parseLineNumber, rangeAtLine, writePatch, type LineOption, type OutputOptions } from './shared.js';

type EditCliOptions = OutputOptions & LineOption;

interface AtLineCliOptions extends OutputOptions {
  line: number;
}

interface CheckCliOptions extends EditCliOptions {
  fix?: boolean;
}

type EditOperation = (text: string, pos: number, options: ParseOptions) => Result<EditResult, MalformedHunkError>;

function outputOptions(command: Command): Command {
  return command
    .option('-o, --output <file>', 'write the result here instead of stdout')
    .option('-i, --in-place', 'rewrite the patch file');
}

/** Header offsets of every hunk, found line by line so damaged hunks are included. */
export function hunkHeaderStarts(text: string): number[] {
  const starts: number[] = [];
  let pos = nextHunkStart(text, 0);
  while (pos !== null) {
    starts.push(pos);
    pos = nextHunkStart(text, lineAt(text, pos).next);
  }
  return starts;
}

function editAtLine(program: Command, context: CliContext, name: string, description: string, operation: EditOperation): void {
  outputOptions(
    program
      .command(`${name} <patch>`)
      .description(description)
      .requiredOption('-l, --line <n>', 'line of the patch to act on', parseLineNumber)
  ).action((patch: string, options: AtLineCliOptions) =>
    guarded(context, async () => {
      await context.config.load();
      const text = await context.io.read(patch);
      const result = operation(text, positionOfLine(text, options.line), context.config.parseOptions());
      if (!result.ok) {
        context.reporter.error(result.error.message);
        context.exitCode = 1;
        return;
      }
      await writePatch(context, patch, result.value.text, options);
    })
  );
}

export function editCommands(program: Command, context: CliContext): void {
  outputOptions(
    program
      .command('fixup <patch>')
      .description('Recompute hunk header line counts from the hunk bodies')
      .option('-l, --line <n>', 'only the hunk holding this line of the patch', parseLineNumber)
  ).action((patch: string, options: EditCliOptions) =>
    guarded(context, async () => {
      await context.config.load();
      const text = await context.io.read(patch);
      const result = fixupHeaders(text, rangeAtLine(text, options.line), context.config.parseOptions());
      context.reporter.debug(result.changed ? 'Hunk headers updated' : 'Hunk headers already match their bodies');
      await writePatch(context, patch, result.text, options);
    })
  );

  editAtLine(program, context, 'split', 'Split the unified hunk at a line into two hunks', splitHunk);
  editAtLine(program, context, 'kill-hunk', 'Remove the hunk holding a line', killHunk);
  editAtLine(program, context, 'kill-file', 'Remove the file section holding a line', killFile);

  outputOptions(
    program
      .command('check <patch>')
      .description('Check that hunk bodies match their headers')
      .option('-l, --line <n>', 'only the hunk holding this line of the patch', parseLineNumber)
      .option('--fix', 'repair lines that lost their leading space or were wrapped')
  ).action((patch: string, options: CheckCliOptions) =>
    guarded(context, async () => {
      const { reporter } = context;
      const config = await context.config.load();
      let text = await context.io.read(patch);
      const range = rangeAtLine(text, options.line);
      const starts = hunkHeaderStarts(text).filter((start, i, all) => {
        if (!range) return true;
        const end = all[i + 1] ?? text.length;
        return range.start >= start && range.start < end;
      });

      let problems = 0;
      let repaired = 0;
      // Last hunk first, so repairs leave the earlier offsets in place.
      for (const start of [...starts].reverse()) {
        const line = lineNumberAt(text, start);
        const checked = checkHunk(text, start, {
          autoFix: options.fix ? () => true : undefined,
          validUnifiedEmptyLine: config.parse.validUnifiedEmptyLine,
        });
        if (!checked.ok) {
          problems++;
          reporter.error(`hunk at line ${line}: ${checked.error.message}`);
          continue;
        }
        if (checked.value.fixed) {
          repaired++;
          reporter.info(`hunk at line ${line}: repaired`);
          text = checked.value.text;
        }
      }

      if (problems > 0) context.exitCode = 1;
      reporter.debug(`${starts.length} hunk(s) checked`);
      if (options.fix && (repaired > 0 || options.output !== undefined)) {
        await writePatch(context, patch, text, options);
      }
    })
  );
}
