import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { candidateName } from '../repositories/snapshot-names.js';

const MAX_NAME_ATTEMPTS = 100;

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Writes `content` to `<dir>/<base>.json` without replacing an existing file,
 * falling back to `<base>_1.json`, `<base>_2.json`, ... Returns the file name.
 */
export async function writeExclusive(dir: string, base: string, content: string): Promise<string> {
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const filename = candidateName(base, attempt);
    try {
      await writeFile(join(dir, filename), content, { encoding: 'utf-8', flag: 'wx' });
      return filename;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
  throw new Error(`No free file name for ${base} after ${String(MAX_NAME_ATTEMPTS)} attempts`);
}
