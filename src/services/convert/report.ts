/**
 * Run report rendering (banner, summary)
 */

import { join } from 'path';
import type { RunOptions, RunSummary } from '../../types/index.js';

const RULE = '='.repeat(60);

export const TITLE = 'Vault H1 → H2 Converter';

export function renderBanner(
  options: Pick<RunOptions, 'rootPath' | 'dryRun' | 'createBackups' | 'extraExcludes'>
): string[] {
  const lines = [
    '',
    RULE,
    TITLE,
    RULE,
    `Vault path: ${options.rootPath}`,
    `Mode: ${options.dryRun ? 'DRY RUN (no files will be modified)' : 'WRITE MODE'}`,
  ];

  if (!options.dryRun) {
    lines.push(`Backups: ${options.createBackups ? 'Enabled' : 'Disabled'}`);
  }
  if (options.extraExcludes.size > 0) {
    lines.push(`Extra excludes: ${[...options.extraExcludes].sort().join(', ')}`);
  }

  lines.push(RULE, '');
  return lines;
}

export function renderSummary(
  summary: RunSummary,
  options: Pick<RunOptions, 'rootPath' | 'dryRun' | 'createBackups' | 'backupDirName'>
): string[] {
  const lines = [
    '',
    RULE,
    'SUMMARY',
    RULE,
    `Files scanned:      ${summary.filesScanned}`,
    `Files with H1s:     ${summary.filesChanged}`,
    `Total H1 headings:  ${summary.totalReplacements}`,
  ];

  if (summary.filesChanged === 0) {
    lines.push('', '✅ No H1 headings found. No changes needed.');
  } else if (options.dryRun) {
    lines.push('', '⚠️  DRY RUN: No files were modified.', '   Run with --write to apply changes.');
  } else {
    lines.push('', `✅ ${summary.filesChanged} file(s) modified.`);
    if (options.createBackups) {
      lines.push(`   Backups saved to: ${join(options.rootPath, options.backupDirName)}`);
    }
  }

  if (summary.errors.length > 0) {
    lines.push('', `⚠️  Errors (${summary.errors.length}):`);
    for (const error of summary.errors) {
      lines.push(`   - ${error}`);
    }
  }

  lines.push(RULE, '');
  return lines;
}
