/**
 * Read-only views of a patch: hunks and refine
 */

import { Command, Option } from 'commander';
import {
  DiffDocument,
  lineAt,
  lineNumberAt,
  refineParsedHunk,
  sectionFileNames,
  type FileSection,
  type Granularity,
} from '@hunkwise/diff';
import type { CliContext } from '../context.js';
import { DiffRenderer } from '../display/DiffRenderer.js';
import { guarded, parseLineNumber, rangeAtLine, type LineOption } from './shared.js';

interface RefineCliOptions extends LineOption {
  granularity?: Granularity;
  all?: boolean;
}

function sectionTitle(section: FileSection): string {
  const [oldName, newName] = sectionFileNames(section, 'old');
  if (oldName === undefined && newName === undefined) return '(no file header)';
  if (oldName === newName || newName === undefined) return oldName ?? '';
  if (oldName === undefined) return newName;
  return `${oldName} -> ${newName}`;
}

/** One line per file section and one indented line per hunk. */
export function describeDocument(doc: DiffDocument): string[] {
  const lines: string[] = [];
  let index = 0;
  for (const section of doc.sections) {
    if (section.hunks.length === 0) continue;
    lines.push(sectionTitle(section));
    for (const hunk of section.hunks) {
      index++;
      const { header } = hunk;
      // Context hunks open with a banner; their first range line says more.
      const first = lineAt(doc.text, hunk.start);
      const shown = header.style === 'context' ? lineAt(doc.text, first.next).content : first.content;
      lines.push(
        `  #${index} line ${lineNumberAt(doc.text, hunk.start)}: ${shown} (-${header.old.count} +${header.new.count}, ${header.style})`
      );
    }
  }
  return lines;
}

export function inspectCommands(program: Command, context: CliContext): void {
  program
    .command('hunks <patch>')
    .description('List the file sections and hunks of a patch')
    .action((patch: string) =>
      guarded(context, async () => {
        await context.config.load();
        const text = await context.io.read(patch);
        const doc = new DiffDocument(text, context.config.parseOptions());
        for (const line of describeDocument(doc)) {
          context.reporter.result(line);
        }
      })
    );

  program
    .command('refine <patch>')
    .description('Show the patch with the changed words of each hunk highlighted')
    .addOption(new Option('-g, --granularity <unit>', 'compare words or characters').choices(['word', 'char']))
    .option('-a, --all', 'also highlight lines that were wholly added or removed')
    .option('-l, --line <n>', 'only the hunk holding this line of the patch', parseLineNumber)
    .action((patch: string, options: RefineCliOptions) =>
      guarded(context, async () => {
        const { config, reporter } = context;
        await config.load();
        const text = await context.io.read(patch);
        const doc = new DiffDocument(text, config.parseOptions());
        const settings = config.refineSettings(options.granularity);
        const regions = doc.hunks(rangeAtLine(text, options.line)).flatMap((hunk) =>
          refineParsedHunk(hunk, {
            granularity: settings.granularity,
            nonModified: options.all ?? settings.nonModified,
          })
        );
        reporter.debug(`${regions.length} region(s) to highlight`);
        reporter.print(new DiffRenderer(reporter.chalk).renderRefined(text, regions));
      })
    );
}
