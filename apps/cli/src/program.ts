/**
 * The hunkwise command tree
 */

import { Command } from 'commander';
import { ConfigManager } from './config/ConfigManager.js';
import type { CliContext } from './context.js';
import { applyCommands } from './commands/apply.js';
import { configCommands } from './commands/config.js';
import { convertCommands } from './commands/convert.js';
import { editCommands } from './commands/edit.js';
import { inspectCommands } from './commands/inspect.js';

interface GlobalOptions {
  verbose?: boolean;
  color: boolean;
  config?: string;
}

export function createProgram(context: CliContext, version: string): Command {
  const program = new Command();

  program
    .name('hunkwise')
    .description('Apply, test, convert and edit the hunks of unified, context and normal diffs')
    .version(version)
    .option('-v, --verbose', 'print debug messages')
    .option('--no-color', 'plain output')
    .option('-c, --config <path>', 'config file to use');

  program.hook('preAction', async () => {
    const options = program.opts<GlobalOptions>();
    if (options.config !== undefined) {
      context.config = new ConfigManager(options.config);
    }
    context.reporter.setVerbose(options.verbose ?? false);
    const config = await context.config.load();
    context.reporter.setColor(options.color && config.cli.color);
    if (context.config.loadProblem !== undefined) {
      context.reporter.warn(`ignoring ${context.config.getPath()}: ${context.config.loadProblem}`);
    }
    context.reporter.debug(`Config: ${context.config.getPath()}`);
  });

  applyCommands(program, context);
  convertCommands(program, context);
  editCommands(program, context);
  inspectCommands(program, context);
  configCommands(program, context);

  return program;
}
