/**
 * Config resolution shared by the CLI commands
 */

import {
  ConfigError,
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  findAndLoadConfig,
  findConfigFile,
  hasInlineOptions,
  type InlineConfigValues,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "../config/loader";
import type { ZipshotConfig } from "../types";
import { ui } from "./ui";

export interface CommandConfigValues extends InlineConfigValues {
  config?: string;
}

/**
 * Load the config file (or build one from inline flags when there is no
 * file) and apply inline overrides. Returns null after printing what is
 * missing when neither source is usable.
 */
export async function resolveCommandConfig(values: CommandConfigValues): Promise<ZipshotConfig | null> {
  const inlineOptions = extractInlineOptions(values);

  if (!values.config && findConfigFile() === null) {
    if (canRunWithoutConfigFile(inlineOptions)) {
      return createConfigFromInlineOptions(inlineOptions);
    }

    const validation = validateInlineOptionsForConfigFreeMode(inlineOptions);
    ui.error("No config file found and inline options are insufficient:");
    for (const err of validation.errors) {
      ui.message(`  - ${err}`);
    }
    ui.info("Either create zipshot.config.yaml or provide --source and --backup-root.");
    return null;
  }

  const config = await findAndLoadConfig(values.config);
  return hasInlineOptions(inlineOptions) ? mergeInlineConfig(config, inlineOptions) : config;
}

export { ConfigError };
