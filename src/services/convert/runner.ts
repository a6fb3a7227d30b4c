/**
 * Whole-vault conversion run
 */

import { findMarkdownFiles } from '../vault/index.js';
import { logger } from '../../utils/logger.js';
import { processFile } from './processor.js';
import { renderBanner, renderSummary } from './report.js';
import type { FileRecord, OutputFn, RunOptions, RunSummary } from '../../types/index.js';

export const EMPTY_SUMMARY: RunSummary = {
  filesScanned: 0,
  filesChanged: 0,
  totalReplacements: 0,
  errors: [],
};

const stdout: OutputFn = (line) => console.log(line);

/**
 * Fold one file's outcome into the running totals
 */
export function addRecord(summary: RunSummary, record: FileRecord): RunSummary {
  return {
    filesScanned: summary.filesScanned + 1,
    filesChanged: summary.filesChanged + (record.replacements > 0 ? 1 : 0),
    totalReplacements: summary.totalReplacements + record.replacements,
    errors: record.error
      ? [...summary.errors, `${record.filePath}: ${record.error}`]
      : summary.errors,
  };
}

/**
 * Non-zero when any file failed, whatever was converted
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.errors.length > 0 ? 1 : 0;
}

/**
 * Run the H1 → H2 conversion over the whole vault
 */
export function runConversion(options: RunOptions, output: OutputFn = stdout): RunSummary {
  renderBanner(options).forEach((line) => output(line));

  // The backup folder is never scanned, whatever it is called
  const excludes = new Set([...options.extraExcludes, options.backupDirName]);
  const files = findMarkdownFiles(options.rootPath, excludes, options.extension);

  output(`Found ${files.length} Markdown file(s) to scan.`);
  output('');
  if (options.verbose) {
    output('Processing files:');
  }

  let summary = EMPTY_SUMMARY;
  for (const filePath of files) {
    summary = addRecord(summary, processFile(filePath, options, output));
  }

  renderSummary(summary, options).forEach((line) => output(line));

  logger.info('Conversion finished', {
    filesScanned: summary.filesScanned,
    filesChanged: summary.filesChanged,
    totalReplacements: summary.totalReplacements,
    errors: summary.errors.length,
    dryRun: options.dryRun,
  });

  return summary;
}
