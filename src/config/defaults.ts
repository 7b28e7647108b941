/**
 * Default configuration values
 */

import type { ZipshotConfig } from "../types";

// version, sourceRoot and backupRoot have no defaults - they must be specified
export const DEFAULT_CONFIG = {
  intervalMinutes: 30,
  archive: {
    compression: 6,
  },
} satisfies Partial<ZipshotConfig>;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Undefined values
 * in source leave the target value in place.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}
