/**
 * Per-file conversion
 *
 * Read → decode → convert → (backup) → atomic write. Every failure is
 * captured on the returned record so the run can move on to the next file.
 */

import { readFileSync } from 'fs';
import { relative, basename } from 'path';
import { convertHeadings } from '../headings/index.js';
import { decodeText, writeFileAtomic } from '../vault/index.js';
import { createBackup } from '../backup/index.js';
import { errorMessage } from '../../config/errors.js';
import { logger } from '../../utils/logger.js';
import type { FileRecord, OutputFn, RunOptions } from '../../types/index.js';

export const UNDECODABLE_MESSAGE = 'Could not decode file with supported encodings';

type ProcessOptions = Pick<
  RunOptions,
  'rootPath' | 'dryRun' | 'createBackups' | 'verbose' | 'backupDirName'
>;

function failed(filePath: string, error: string): FileRecord {
  logger.warn(`Failed to process ${filePath}: ${error}`);
  return { filePath, replacements: 0, modified: false, error };
}

/**
 * Process a single Markdown file
 */
export function processFile(
  filePath: string,
  options: ProcessOptions,
  output: OutputFn
): FileRecord {
  try {
    const decoded = decodeText(readFileSync(filePath));
    if (!decoded) {
      return failed(filePath, UNDECODABLE_MESSAGE);
    }

    const { content, replacements } = convertHeadings(decoded.content);
    if (replacements === 0) {
      return { filePath, replacements: 0, modified: false };
    }

    if (options.verbose) {
      output(`  ${relative(options.rootPath, filePath)}: ${replacements} H1 heading(s) found`);
    }

    if (options.dryRun) {
      return { filePath, replacements, modified: false };
    }

    if (options.createBackups) {
      const backupPath = createBackup(filePath, options.rootPath, options.backupDirName);
      if (options.verbose) {
        output(`    Backup created: ${basename(backupPath)}`);
      }
    }

    writeFileAtomic(filePath, content, decoded.encoding);
    logger.debug(`Converted ${replacements} heading(s) in ${filePath}`, {
      encoding: decoded.encoding,
    });

    return { filePath, replacements, modified: true };
  } catch (error) {
    return failed(filePath, errorMessage(error));
  }
}
