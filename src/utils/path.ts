/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(ensureTrailingSep(normalizedDir)) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Ensure a path ends with a separator
 */
export function ensureTrailingSep(dirPath: string): string {
  return dirPath.endsWith(path.sep) ? dirPath : dirPath + path.sep;
}

/**
 * Convert a platform-relative path to the forward-slash form used for
 * archive entry names.
 */
export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}
