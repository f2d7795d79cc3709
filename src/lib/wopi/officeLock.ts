/**
 * LibreOffice-compatible lock files.
 *
 * While an Office document is locked through WOPI, a `.~lock.<name>#` file
 * is kept next to it so that desktop applications opening the same file
 * from a sync client see it as being edited, and vice versa.
 */

import path from 'path';
import { wopiLogger as logger } from '../logger.js';
import { isStorageError, readStream } from '../storage/index.js';
import type { WopiFileRef } from './lockManager.js';

// Marks the lock files this server wrote
const LOCK_FILE_OWNER = 'WOPIServer';
const LOCK_FILE_APP = 'Collaborative Online Editor';

/**
 * Office documents are those whose extension is not listed as non-Office
 */
export function isOfficeFile(filename: string, nonofficetypes: readonly string[]): boolean {
  const ext = path.posix.extname(filename).toLowerCase();
  return ext !== '' && !nonofficetypes.includes(ext);
}

export function officeLockName(filename: string): string {
  return path.posix.join(path.posix.dirname(filename), `.~lock.${path.posix.basename(filename)}#`);
}

const pad = (value: number): string => String(value).padStart(2, '0');

export function officeLockContent(wopiUrl: string, when: Date = new Date()): string {
  const stamp =
    `${pad(when.getDate())}.${pad(when.getMonth() + 1)}.${when.getFullYear()} ` +
    `${pad(when.getHours())}:${pad(when.getMinutes())}`;
  return `,${LOCK_FILE_APP},${wopiUrl},${stamp},${LOCK_FILE_OWNER};`;
}

async function readOfficeLock(file: WopiFileRef): Promise<string | null> {
  try {
    return (await readStream(await file.storage.readFile(officeLockName(file.filename), file.userid))).toString('utf-8');
  } catch (error) {
    if (isStorageError(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

const isOwnOfficeLock = (content: string): boolean => content.includes(LOCK_FILE_OWNER);

/**
 * Content of a lock file held by someone else (typically a desktop
 * application), or null when there is none or it is ours.
 */
export async function getForeignOfficeLock(file: WopiFileRef): Promise<string | null> {
  const content = await readOfficeLock(file);
  return content === null || isOwnOfficeLock(content) ? null : content.trim();
}

export async function createOfficeLock(file: WopiFileRef, wopiUrl: string): Promise<void> {
  const lockName = officeLockName(file.filename);
  try {
    await file.storage.writeFile(lockName, file.userid, Buffer.from(officeLockContent(wopiUrl)), { islock: true });
    logger.debug('Office lock file created', { filename: file.filename, lockName });
  } catch (error) {
    // Already there from a previous LOCK of this editing session
    if (isStorageError(error, 'EEXIST')) {
      return;
    }
    throw error;
  }
}

/**
 * Remove the lock file of a document, unless another application wrote it
 */
export async function removeOfficeLock(file: WopiFileRef): Promise<void> {
  const content = await readOfficeLock(file);
  if (content === null) {
    return;
  }
  if (!isOwnOfficeLock(content)) {
    logger.debug('Keeping lock file of another application', { filename: file.filename });
    return;
  }
  try {
    await file.storage.removeFile(officeLockName(file.filename), file.userid);
  } catch (error) {
    if (isStorageError(error, 'ENOENT')) {
      return;
    }
    throw error;
  }
}
