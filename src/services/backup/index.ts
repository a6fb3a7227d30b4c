/**
 * Timestamped backups
 *
 * Copies live under <vault>/<backup dir>/<relative folder>/
 * as {stem}_{YYYYMMDD_HHMMSS}{ext}, one per file per second.
 */

import { copyFileSync, mkdirSync, statSync, chmodSync, utimesSync } from 'fs';
import { join, dirname, basename, extname, relative, isAbsolute, sep } from 'path';
import { DEFAULT_BACKUP_DIR } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function buildBackupFilename(filePath: string, date: Date): string {
  const ext = extname(filePath);
  const stem = basename(filePath, ext);
  return `${stem}_${formatBackupTimestamp(date)}${ext}`;
}

/**
 * Folder a file's backup goes in, mirroring its place in the vault.
 * Files outside the vault go straight into the backup root.
 */
export function getBackupDir(
  filePath: string,
  rootPath: string,
  backupDirName = DEFAULT_BACKUP_DIR
): string {
  const backupRoot = join(rootPath, backupDirName);
  const relativePath = relative(rootPath, filePath);

  if (isAbsolute(relativePath) || relativePath.split(sep)[0] === '..') {
    return backupRoot;
  }
  return join(backupRoot, dirname(relativePath));
}

/**
 * Copy a file, with its mode and timestamps, into the backup area
 */
export function createBackup(
  filePath: string,
  rootPath: string,
  backupDirName = DEFAULT_BACKUP_DIR,
  now: Date = new Date()
): string {
  const backupDir = getBackupDir(filePath, rootPath, backupDirName);
  mkdirSync(backupDir, { recursive: true });

  const backupPath = join(backupDir, buildBackupFilename(filePath, now));
  const stats = statSync(filePath);

  copyFileSync(filePath, backupPath);
  chmodSync(backupPath, stats.mode & 0o7777);
  utimesSync(backupPath, stats.atime, stats.mtime);

  logger.debug(`Backup created: ${backupPath}`);
  return backupPath;
}
