/**
 * Archive naming utilities
 */

// Pattern: backup_yyyyMMdd_HHmmss.zip, local time of the pass start
export const ARCHIVE_NAME_PATTERN = /^backup_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.zip$/;

export interface ParsedArchiveName {
  stamp: string;
  createdAt: Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * yyyyMMdd_HHmmss
 */
export function formatArchiveTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * yyyy-MM-dd HH:mm:ss, used in progress messages
 */
export function formatLogTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function generateArchiveName(date: Date): string {
  return `backup_${formatArchiveTimestamp(date)}.zip`;
}

export function parseArchiveName(archiveName: string): ParsedArchiveName | null {
  const match = archiveName.match(ARCHIVE_NAME_PATTERN);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }

  const createdAt = new Date(year, month - 1, day, hours, minutes, seconds);

  // Reject values Date would silently roll over, e.g. month 13
  if (formatArchiveTimestamp(createdAt) !== archiveName.slice(7, 22)) {
    return null;
  }

  return { stamp: archiveName.slice(7, 22), createdAt };
}

export function isValidArchiveName(archiveName: string): boolean {
  return parseArchiveName(archiveName) !== null;
}
