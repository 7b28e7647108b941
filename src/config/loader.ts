/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage } from "../core/errors";
import type { ZipshotConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

// Re-export inline config utilities
export {
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineConfigValues,
  type InlineValidationResult,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = ["zipshot.config.yaml", "zipshot.config.yml", "zipshot.config.json"];

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<ZipshotConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const parsed = parseConfigContent(content, ext);

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }

  // Merge with defaults
  const merged = deepMerge({ ...DEFAULT_CONFIG }, parsed);

  validateConfig(merged);

  return resolvePaths(merged, absolutePath);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    try {
      if (fs.statSync(configPath).isFile()) {
        return configPath;
      }
    } catch {
      // Not there, try the next name
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<ZipshotConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create zipshot.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
