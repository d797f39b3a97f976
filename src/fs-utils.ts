/**
 * Write-then-rename helpers
 *
 * Readers polling a directory must never observe a half-written file, so every
 * artifact the harness produces lands under a temporary name first.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { nanoid } from 'nanoid';

export const TEMP_MARKER = '.tmp-';

export function tempPathFor(filePath: string): string {
  return `${filePath}${TEMP_MARKER}${nanoid(8)}`;
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Replace `filePath` atomically with `content`.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  const tmp = tempPathFor(filePath);
  try {
    await fs.writeFile(tmp, content);
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

/**
 * Create `filePath` atomically, failing with EEXIST if it is already there.
 * A hard link cannot replace an existing entry, unlike rename.
 */
export async function writeFileExclusive(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  const tmp = tempPathFor(filePath);
  await fs.writeFile(tmp, content);
  try {
    await fs.link(tmp, filePath);
  } finally {
    await fs.rm(tmp, { force: true });
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2) + '\n');
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
