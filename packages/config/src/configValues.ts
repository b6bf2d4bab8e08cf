/**
 * Reading and writing single settings by dotted key
 */

import { HunkwiseConfigSchema, type HunkwiseConfig } from './configSchema.js';

export const CONFIG_KEYS = [
  'parse.validUnifiedEmptyLine',
  'locate.fuzzy',
  'locate.maxFuzzyTokens',
  'locate.maxFuzzyChars',
  'apply.strip',
  'refine.granularity',
  'refine.nonModified',
  'cli.color',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

function sections(config: HunkwiseConfig): Record<string, Record<string, unknown>> {
  return config;
}

function splitKey(key: ConfigKey): [string, string] {
  const dot = key.indexOf('.');
  return [key.slice(0, dot), key.slice(dot + 1)];
}

/** Value typed on a command line: booleans and integers, anything else stays a string. */
export function parseConfigValue(raw: string): unknown {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (/^-?\d+$/.test(raw)) return parseInt(raw, 10);
  return raw;
}

export function getConfigValue(config: HunkwiseConfig, key: ConfigKey): unknown {
  const [section, field] = splitKey(key);
  return sections(config)[section]?.[field];
}

/**
 * Copy of `config` with `key` set to the parsed `raw` value. Throws for an
 * unknown key, and a ZodError for a value the schema rejects.
 */
export function setConfigValue(config: HunkwiseConfig, key: string, raw: string): HunkwiseConfig {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key} (known keys: ${CONFIG_KEYS.join(', ')})`);
  }
  const [section, field] = splitKey(key);
  const current = sections(config);
  return HunkwiseConfigSchema.parse({
    ...current,
    [section]: { ...current[section], [field]: parseConfigValue(raw) },
  });
}
