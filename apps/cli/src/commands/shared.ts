/**
 * Option parsing and patch input/output shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import { describeError, positionOfLine, type Hunk, type Span } from '@hunkwise/diff';
import type { CliContext } from '../context.js';

export interface OutputOptions {
  output?: string;
  inPlace?: boolean;
}

export interface LineOption {
  line?: number;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parseInt(value, 10);
}

export function parseLineNumber(value: string): number {
  const line = parseCount(value);
  if (line < 1) {
    throw new InvalidArgumentError('Line numbers start at 1.');
  }
  return line;
}

/** Empty range at the start of `line`, which selects the hunk holding it. */
export function rangeAtLine(text: string, line?: number): Span | undefined {
  if (line === undefined) return undefined;
  const pos = positionOfLine(text, line);
  return { start: pos, end: pos };
}

/** 1-based index of `hunk` among `hunks`, for messages. */
export function hunkNumber(hunks: Hunk[], hunkStart: number): number {
  return hunks.findIndex((hunk) => hunk.start === hunkStart) + 1;
}

export async function writePatch(context: CliContext, input: string, text: string, options: OutputOptions): Promise<void> {
  if (options.inPlace) {
    if (input === '-') {
      throw new Error('Cannot rewrite standard input in place');
    }
    await context.io.write(input, text);
    context.reporter.debug(`Wrote ${input}`);
  } else if (options.output !== undefined) {
    await context.io.write(options.output, text);
    context.reporter.debug(`Wrote ${options.output}`);
  } else {
    context.reporter.print(text);
  }
}

/** Run a command body, turning a thrown error into a message and exit code 1. */
export async function guarded(context: CliContext, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    context.reporter.error(describeError(error));
    context.exitCode = 1;
  }
}
