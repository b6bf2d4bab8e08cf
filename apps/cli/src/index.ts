#!/usr/bin/env node
/**
 * Main CLI entry point
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigManager } from './config/ConfigManager.js';
import { nodePatchIO, nodeWorkspace, type CliContext } from './context.js';
import { StatusReporter } from './display/StatusReporter.js';
import { createProgram } from './program.js';

const PackageSchema = z.object({ version: z.string() });

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg = PackageSchema.parse(JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf8')));

const context: CliContext = {
  config: new ConfigManager(),
  reporter: new StatusReporter(),
  io: nodePatchIO,
  openWorkspace: nodeWorkspace,
  exitCode: 0,
};

await createProgram(context, pkg.version).parseAsync();
process.exitCode = context.exitCode;
