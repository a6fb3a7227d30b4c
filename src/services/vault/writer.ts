/**
 * Vault file writing operations
 *
 * Notes are replaced through a temp file in the same folder and a rename,
 * so a reader sees either the old bytes or the new ones.
 */

import {
  openSync,
  writeFileSync,
  fsyncSync,
  closeSync,
  renameSync,
  unlinkSync,
  statSync,
} from 'fs';
import { randomBytes } from 'crypto';
import { join, dirname, basename } from 'path';
import { logger } from '../../utils/logger.js';
import { encodeText } from './encoding.js';
import type { TextEncodingName } from '../../types/index.js';

const DEFAULT_FILE_MODE = 0o644;

/**
 * Unique hidden temp path beside the target
 */
export function tempPathFor(filePath: string): string {
  const suffix = randomBytes(6).toString('hex');
  return join(dirname(filePath), `.${basename(filePath)}_${suffix}.tmp`);
}

function removeTempFile(tempPath: string): void {
  try {
    unlinkSync(tempPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      logger.warn(`Could not remove temp file: ${tempPath}`, {
        code: (error as NodeJS.ErrnoException).code,
      });
    }
  }
}

/**
 * Write content to a file atomically, keeping the target's permissions.
 * On failure the temp file is removed and the error rethrown.
 */
export function writeFileAtomic(
  filePath: string,
  content: string,
  encoding: TextEncodingName = 'utf-8'
): void {
  const data = encodeText(content, encoding);
  const mode = (statSync(filePath, { throwIfNoEntry: false })?.mode ?? DEFAULT_FILE_MODE) & 0o7777;
  const tempPath = tempPathFor(filePath);
  let fd: number | null = null;

  try {
    fd = openSync(tempPath, 'wx', mode);
    writeFileSync(fd, data);
    fsyncSync(fd);
    closeSync(fd);
    fd = null;

    renameSync(tempPath, filePath);
    logger.debug(`Replaced file: ${filePath}`, { bytes: data.length, encoding });
  } catch (error) {
    if (fd !== null) {
      closeSync(fd);
    }
    removeTempFile(tempPath);
    throw error;
  }
}
