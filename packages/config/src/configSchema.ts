/**
 * Configuration schemas using Zod
 */

import { z } from 'zod';

const DEFAULT_PARSE_CONFIG = {
  validUnifiedEmptyLine: true,
} as const;

const DEFAULT_LOCATE_CONFIG = {
  fuzzy: true,
  maxFuzzyTokens: 2000,
  maxFuzzyChars: 200_000,
} as const;

const DEFAULT_REFINE_CONFIG = {
  granularity: 'word',
  nonModified: false,
} as const;

const DEFAULT_CLI_CONFIG = {
  color: true,
} as const;

// Reading diff text
export const ParseConfigSchema = z.object({
  validUnifiedEmptyLine: z.boolean().default(true),
});

// Finding hunk text in target files
export const LocateConfigSchema = z.object({
  fuzzy: z.boolean().default(true),
  maxFuzzyTokens: z.number().int().positive().default(2000),
  maxFuzzyChars: z.number().int().positive().default(200_000),
});

// Applying hunks
export const ApplyConfigSchema = z.object({
  strip: z.number().int().nonnegative().optional(),
});

// Word-level highlighting of changed lines
export const RefineConfigSchema = z.object({
  granularity: z.enum(['word', 'char']).default('word'),
  nonModified: z.boolean().default(false),
});

// CLI configuration
export const CLIConfigSchema = z.object({
  color: z.boolean().default(true),
});

export const HunkwiseConfigObject = z.object({
  parse: ParseConfigSchema.default(DEFAULT_PARSE_CONFIG),
  locate: LocateConfigSchema.default(DEFAULT_LOCATE_CONFIG),
  apply: ApplyConfigSchema.default({}),
  refine: RefineConfigSchema.default(DEFAULT_REFINE_CONFIG),
  cli: CLIConfigSchema.default(DEFAULT_CLI_CONFIG),
});

// Main hunkwise configuration
export const HunkwiseConfigSchema = HunkwiseConfigObject.default({
  parse: DEFAULT_PARSE_CONFIG,
  locate: DEFAULT_LOCATE_CONFIG,
  apply: {},
  refine: DEFAULT_REFINE_CONFIG,
  cli: DEFAULT_CLI_CONFIG,
});

// Export types
export type ParseConfig = z.infer<typeof ParseConfigSchema>;
export type LocateConfig = z.infer<typeof LocateConfigSchema>;
export type ApplyConfig = z.infer<typeof ApplyConfigSchema>;
export type RefineConfig = z.infer<typeof RefineConfigSchema>;
export type CLIConfig = z.infer<typeof CLIConfigSchema>;
export type HunkwiseConfig = z.infer<typeof HunkwiseConfigSchema>;

// Default configuration
export const DEFAULT_CONFIG: HunkwiseConfig = {
  parse: DEFAULT_PARSE_CONFIG,
  locate: DEFAULT_LOCATE_CONFIG,
  apply: {},
  refine: DEFAULT_REFINE_CONFIG,
  cli: DEFAULT_CLI_CONFIG,
};
