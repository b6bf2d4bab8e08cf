/**
 * Config commands
 */

import { Command } from 'commander';
import * as yaml from 'js-yaml';
import { CONFIG_KEYS, getConfigValue, isConfigKey } from '@hunkwise/config';
import type { CliContext } from '../context.js';
import { guarded } from './shared.js';

export function configCommands(program: Command, context: CliContext): void {
  const configCmd = program.command('config').description('Manage configuration');

  configCmd
    .command('show')
    .description('Show current configuration')
    .action(() =>
      guarded(context, async () => {
        const config = await context.config.load();
        context.reporter.print(yaml.dump(config, { indent: 2, lineWidth: 120 }));
      })
    );

  configCmd
    .command('path')
    .description('Show config file path')
    .action(() =>
      guarded(context, async () => {
        context.reporter.result(context.config.getPath());
      })
    );

  configCmd
    .command('init')
    .description('Initialize config with defaults')
    .action(() =>
      guarded(context, async () => {
        await context.config.init();
        context.reporter.info(`Config initialized at: ${context.config.getPath()}`);
      })
    );

  configCmd
    .command('get <key>')
    .description(`Print one config value (${CONFIG_KEYS.join(', ')})`)
    .action((key: string) =>
      guarded(context, async () => {
        if (!isConfigKey(key)) {
          throw new Error(`Unknown config key: ${key}`);
        }
        const value = getConfigValue(await context.config.load(), key);
        context.reporter.result(value === undefined ? '' : String(value));
      })
    );

  configCmd
    .command('set <key> <value>')
    .description('Set a config value (e.g., locate.fuzzy false)')
    .action((key: string, value: string) =>
      guarded(context, async () => {
        await context.config.set(key, value);
        context.reporter.info(`Set ${key} = ${value}`);
      })
    );
}
