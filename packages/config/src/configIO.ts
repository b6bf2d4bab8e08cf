import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { DEFAULT_CONFIG, HunkwiseConfigSchema, type HunkwiseConfig } from './configSchema.js';

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.hunkwise', 'config.yaml');

export type ConfigSource = 'file' | 'defaults';

export interface LoadedConfig {
  config: HunkwiseConfig;
  path: string;
  source: ConfigSource;
  /** Why the file was present but not used */
  problem?: string;
}

export function getConfigPath(configPath?: string): string {
  return configPath ?? DEFAULT_CONFIG_PATH;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** One line naming each rejected setting, or the parser's message. */
export function describeConfigProblem(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read and validate the YAML config. A missing file gives the defaults
 * quietly; an unreadable or invalid one gives the defaults and a problem.
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const resolvedPath = getConfigPath(configPath);

  let content: string;
  try {
    content = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return { config: DEFAULT_CONFIG, path: resolvedPath, source: 'defaults' };
    }
    return { config: DEFAULT_CONFIG, path: resolvedPath, source: 'defaults', problem: describeConfigProblem(error) };
  }

  try {
    const config = HunkwiseConfigSchema.parse(yaml.load(content) ?? {});
    return { config, path: resolvedPath, source: 'file' };
  } catch (error) {
    return { config: DEFAULT_CONFIG, path: resolvedPath, source: 'defaults', problem: describeConfigProblem(error) };
  }
}

export async function saveConfig(config: HunkwiseConfig, configPath?: string): Promise<string> {
  const resolvedPath = getConfigPath(configPath);
  const validated = HunkwiseConfigSchema.parse(config);

  await fs.mkdir(path.dirname(resolvedPath), { recursive: true });
  await fs.writeFile(resolvedPath, yaml.dump(validated, { indent: 2, lineWidth: 120 }), 'utf-8');

  return resolvedPath;
}
