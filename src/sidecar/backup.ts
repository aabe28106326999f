import fs from 'fs/promises';
import { constants } from 'fs';
import { SidecarBackupError } from '../types';
import { logger } from '../utils/logger';

const MAX_SUFFIX = 99;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDDHHMMSS */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupPathFor(filePath: string, date: Date): string {
  return `${filePath}.backup_${formatBackupTimestamp(date)}`;
}

function isAlreadyExists(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
}

/**
 * Copy the sidecar to `<path>.backup_<YYYYMMDDHHMMSS>` and make the copy read-only.
 * Never overwrites an earlier backup: a second backup within the same second
 * gets a `_1`, `_2`, ... suffix.
 */
export async function createBackup(filePath: string, date: Date): Promise<string> {
  const basePath = backupPathFor(filePath, date);

  for (let attempt = 0; attempt <= MAX_SUFFIX; attempt++) {
    const backupPath = attempt === 0 ? basePath : `${basePath}_${attempt}`;
    try {
      await fs.copyFile(filePath, backupPath, constants.COPYFILE_EXCL);
      await fs.chmod(backupPath, 0o444);
      logger.debug({ filePath, backupPath }, 'Created sidecar backup');
      return backupPath;
    } catch (error) {
      if (isAlreadyExists(error)) continue;
      throw new SidecarBackupError(filePath, backupPath, error);
    }
  }

  throw new SidecarBackupError(filePath, basePath, `more than ${MAX_SUFFIX} backups share this timestamp`);
}
