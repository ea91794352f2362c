const ARCHIVE_EXTENSION = '.zip';

/** Prefix of the per-run scratch directories inside the backup directory */
export const STAGING_PREFIX = '.staging-';

/**
 * Format a date as YYYY-MM-DD using local time
 */
export function formatArchiveDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');

  return `${year}-${month}-${day}`;
}

/**
 * Build the archive file name for a generation, e.g. backup-2024-01-02.zip
 */
export function buildArchiveFileName(prefix: string, date: Date): string {
  return `${prefix}-${formatArchiveDate(date)}${ARCHIVE_EXTENSION}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function archivePattern(prefix: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}-(\\d{4})-(\\d{2})-(\\d{2})\\.zip$`);
}

/**
 * Extract the generation date from an archive file name.
 * Returns null for names that are not archives or carry an impossible date.
 */
export function parseArchiveDate(prefix: string, fileName: string): Date | null {
  const match = archivePattern(prefix).exec(fileName);
  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));

  // Reject dates that Date silently rolls over, such as 2024-02-31
  if (formatArchiveDate(date) !== `${year}-${month}-${day}`) {
    return null;
  }

  return date;
}

export function isArchiveFileName(prefix: string, fileName: string): boolean {
  return archivePattern(prefix).test(fileName);
}

/**
 * Join a remote directory and a file name with exactly one slash
 */
export function buildRemotePath(remoteDirectory: string, fileName: string): string {
  const normalized = remoteDirectory.replace(/\/+$/, '');
  return `${normalized}/${fileName}`;
}
