/**
 * convert and reverse commands
 */

import { Command, Option } from 'commander';
import { contextToUnified, reverseDirection, unifiedToContext, type ConversionResult } from '@hunkwise/diff';
import type { CliContext } from '../context.js';
import { guarded, parseLineNumber, rangeAtLine, writePatch, type LineOption, type OutputOptions } from './shared.js';

type TargetFormat = 'unified' | 'context';

interface ConvertCliOptions extends OutputOptions, LineOption {
  to: TargetFormat;
}

type RewriteCliOptions = OutputOptions & LineOption;

function outputOptions(command: Command): Command {
  return command
    .option('-l, --line <n>', 'only the hunk holding this line of the patch', parseLineNumber)
    .option('-o, --output <file>', 'write the result here instead of stdout')
    .option('-i, --in-place', 'rewrite the patch file');
}

async function emitConversion(context: CliContext, patch: string, result: ConversionResult, options: OutputOptions): Promise<void> {
  const { reporter } = context;
  if (!result.reversible) {
    reporter.warn('the result cannot be converted back to the same text');
  }
  reporter.debug(`${result.mappings.length} header(s) rewritten`);
  await writePatch(context, patch, result.text, options);
}

export function convertCommands(program: Command, context: CliContext): void {
  outputOptions(
    program
      .command('convert <patch>')
      .description('Rewrite hunks between unified and context format')
      .addOption(new Option('-t, --to <format>', 'format to convert to').choices(['unified', 'context']).makeOptionMandatory())
  ).action((patch: string, options: ConvertCliOptions) =>
    guarded(context, async () => {
      await context.config.load();
      const text = await context.io.read(patch);
      const range = rangeAtLine(text, options.line);
      const parse = context.config.parseOptions();
      const result = options.to === 'context' ? unifiedToContext(text, range, parse) : contextToUnified(text, range, parse);
      await emitConversion(context, patch, result, options);
    })
  );

  outputOptions(
    program.command('reverse <patch>').description('Swap the old and new sides of the hunks and file headers')
  ).action((patch: string, options: RewriteCliOptions) =>
    guarded(context, async () => {
      await context.config.load();
      const text = await context.io.read(patch);
      const result = reverseDirection(text, rangeAtLine(text, options.line), context.config.parseOptions());
      await emitConversion(context, patch, result, options);
    })
  );
}
