/**
 * Configuration validation
 */

import type { ZipshotConfig } from "../types";
import { isPlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function requirePath(c: Record<string, unknown>, key: "sourceRoot" | "backupRoot"): void {
  const value = c[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${key} must be a non-empty path`);
  }
}

const validators: Record<"version" | "paths" | "interval" | "archive", Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  paths: (c) => {
    requirePath(c, "sourceRoot");
    requirePath(c, "backupRoot");
  },

  interval: (c) => {
    const interval = c.intervalMinutes;
    if (typeof interval !== "number" || !Number.isInteger(interval) || interval < 1) {
      throw new ConfigError("intervalMinutes must be a positive integer");
    }
  },

  archive: (c) => {
    if (c.archive === undefined) {
      return;
    }
    if (!isPlainObject(c.archive)) {
      throw new ConfigError("archive must be an object");
    }
    const compression = c.archive.compression;
    if (
      compression !== undefined &&
      (typeof compression !== "number" ||
        !Number.isInteger(compression) ||
        compression < 0 ||
        compression > 9)
    ) {
      throw new ConfigError("archive.compression must be an integer from 0 to 9");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is ZipshotConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  validators.version(config);
  validators.paths(config);
  validators.interval(config);
  validators.archive(config);
}
