import { PersistenceError } from '@newscheck/shared/src/utils/errors.js';

const SNAPSHOT_NAME_PATTERN = /^[A-Za-z0-9_.-]+\.json$/;

export const RESULTS_FILE_PREFIX = 'categorization_results_';
export const DEBUG_FILE_PREFIX = 'scraped_data_';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatFileTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function isValidSnapshotName(filename: string): boolean {
  return SNAPSHOT_NAME_PATTERN.test(filename) && !filename.startsWith('.');
}

export function assertValidSnapshotName(filename: string): void {
  if (!isValidSnapshotName(filename)) {
    throw new PersistenceError(`Invalid snapshot file name: ${filename}`);
  }
}

/** `base.json`, then `base_1.json`, `base_2.json`, ... for repeated saves within one second. */
export function candidateName(base: string, attempt: number): string {
  return attempt === 0 ? `${base}.json` : `${base}_${String(attempt)}.json`;
}
