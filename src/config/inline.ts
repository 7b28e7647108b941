/**
 * Inline configuration parsing and merging utilities
 */

import * as path from "node:path";
import type { ZipshotConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { validateConfig } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Directory tree to back up */
  source?: string;
  /** Directory archives are written to */
  backupRoot?: string;
  /** Minutes between passes */
  interval?: number;
  /** Compression level (0-9) */
  compression?: number;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  source: { type: "string" as const, short: "s" },
  "backup-root": { type: "string" as const, short: "b" },
  interval: { type: "string" as const, short: "i" },
  compression: { type: "string" as const },
} as const;

/**
 * Parsed values of INLINE_CONFIG_OPTIONS
 */
export interface InlineConfigValues {
  source?: string;
  "backup-root"?: string;
  interval?: string;
  compression?: string;
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineConfigValues): InlineConfigOptions {
  return {
    source: values.source,
    backupRoot: values["backup-root"],
    interval: parseNumber(values.interval),
    compression: parseNumber(values.compression),
  };
}

/**
 * Build a partial config from inline options. Paths are resolved against
 * the working directory.
 */
export function buildInlineConfig(options: InlineConfigOptions): Partial<ZipshotConfig> {
  const config: Partial<ZipshotConfig> = {};

  if (options.source) {
    config.sourceRoot = path.resolve(options.source);
  }

  if (options.backupRoot) {
    config.backupRoot = path.resolve(options.backupRoot);
  }

  if (options.interval !== undefined) {
    config.intervalMinutes = options.interval;
  }

  if (options.compression !== undefined) {
    config.archive = { compression: options.compression };
  }

  return config;
}

/**
 * Merge inline config options into an existing config and re-validate
 */
export function mergeInlineConfig(
  baseConfig: ZipshotConfig,
  inlineOptions: InlineConfigOptions,
): ZipshotConfig {
  const merged = deepMerge({ ...baseConfig }, { ...buildInlineConfig(inlineOptions) });
  validateConfig(merged);
  return merged;
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return (
    !!options.source ||
    !!options.backupRoot ||
    options.interval !== undefined ||
    options.compression !== undefined
  );
}

/**
 * Validation result for inline options
 */
export interface InlineValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check if inline options are sufficient to run without a config file.
 * Requires --source and --backup-root.
 */
export function validateInlineOptionsForConfigFreeMode(
  options: InlineConfigOptions,
): InlineValidationResult {
  const errors: string[] = [];

  if (!options.source) {
    errors.push("--source is required when running without a config file");
  }

  if (!options.backupRoot) {
    errors.push("--backup-root is required when running without a config file");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if inline options can support config-free mode
 */
export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return validateInlineOptionsForConfigFreeMode(options).valid;
}

/**
 * Create a complete config from inline options only (no base config file).
 */
export function createConfigFromInlineOptions(options: InlineConfigOptions): ZipshotConfig {
  const validation = validateInlineOptionsForConfigFreeMode(options);
  if (!validation.valid) {
    throw new Error(validation.errors.join("\n"));
  }

  const config = deepMerge({ version: "1.0", ...DEFAULT_CONFIG }, { ...buildInlineConfig(options) });
  validateConfig(config);
  return config;
}
