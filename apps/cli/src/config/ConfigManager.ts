/**
 * Configuration manager: loads the YAML config and folds in environment
 * and command-line overrides
 */

import {
  DEFAULT_CONFIG,
  getConfigPath,
  loadConfig,
  saveConfig,
  setConfigValue,
  type HunkwiseConfig,
} from '@hunkwise/config';
import type { FuzzyOptions, Granularity, ParseOptions } from '@hunkwise/diff';

export const ENV_FUZZY = 'HUNKWISE_FUZZY';
export const ENV_STRIP = 'HUNKWISE_STRIP';

type EnvParser<T> = (raw: string) => T | undefined;

export const parseBooleanEnv: EnvParser<boolean> = (raw) => {
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'on', 'yes'].includes(value)) return true;
  if (['0', 'false', 'off', 'no'].includes(value)) return false;
  return undefined;
};

export const parseCountEnv: EnvParser<number> = (raw) => {
  const value = raw.trim();
  return /^\d+$/.test(value) ? parseInt(value, 10) : undefined;
};

export interface RefineSettings {
  granularity: Granularity;
  nonModified: boolean;
}

export class ConfigManager {
  private readonly configPath: string;
  private config: HunkwiseConfig | null = null;
  private problem: string | undefined;

  constructor(configPath?: string, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.configPath = getConfigPath(configPath);
  }

  async load(): Promise<HunkwiseConfig> {
    if (!this.config) {
      const loaded = await loadConfig(this.configPath);
      this.config = loaded.config;
      this.problem = loaded.problem;
    }
    return this.config;
  }

  /** Why the config file was ignored on load, if it was */
  get loadProblem(): string | undefined {
    return this.problem;
  }

  async save(config: HunkwiseConfig): Promise<void> {
    await saveConfig(config, this.configPath);
    this.config = config;
    this.problem = undefined;
  }

  /** Set one dotted key and write the file back */
  async set(key: string, value: string): Promise<HunkwiseConfig> {
    const next = setConfigValue(await this.load(), key, value);
    await this.save(next);
    return next;
  }

  async init(): Promise<void> {
    await this.save(DEFAULT_CONFIG);
  }

  get<K extends keyof HunkwiseConfig>(key: K): HunkwiseConfig[K] {
    if (!this.config) {
      throw new Error('Config not loaded. Call load() first.');
    }
    return this.config[key];
  }

  getEffectiveValue<T>(configValue: T, envVarName: string | null, cliValue: T | undefined, parse: EnvParser<T>): T {
    if (cliValue !== undefined) return cliValue;
    if (envVarName) {
      const raw = this.env[envVarName];
      if (raw !== undefined) {
        const parsed = parse(raw);
        if (parsed !== undefined) return parsed;
      }
    }
    return configValue;
  }

  parseOptions(): ParseOptions {
    return { validUnifiedEmptyLine: this.get('parse').validUnifiedEmptyLine };
  }

  fuzzyOptions(cliFuzzy?: boolean): FuzzyOptions {
    const locate = this.get('locate');
    return {
      enabled: this.getEffectiveValue(locate.fuzzy, ENV_FUZZY, cliFuzzy, parseBooleanEnv),
      maxTokens: locate.maxFuzzyTokens,
      maxChars: locate.maxFuzzyChars,
    };
  }

  strip(cliStrip?: number): number | undefined {
    return this.getEffectiveValue<number | undefined>(this.get('apply').strip, ENV_STRIP, cliStrip, parseCountEnv);
  }

  refineSettings(cliGranularity?: Granularity): RefineSettings {
    const refine = this.get('refine');
    return { granularity: cliGranularity ?? refine.granularity, nonModified: refine.nonModified };
  }

  getPath(): string {
    return this.configPath;
  }
}
