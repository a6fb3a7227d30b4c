/**
 * Vault file discovery
 * Recursive walk that prunes hidden and excluded folders before descending
 */

import { readdirSync, statSync, type Dirent } from 'fs';
import { join, relative, isAbsolute, sep } from 'path';
import { logger } from '../../utils/logger.js';

/**
 * Folder (and file) names never scanned, at any depth
 */
export const DEFAULT_EXCLUDES: ReadonlySet<string> = new Set([
  '.obsidian',
  '.git',
  'node_modules',
  '.trash',
  '.DS_Store',
  '_backups',
]);

/**
 * Check a single path segment against the hidden-name rule and exclusion sets
 */
export function isExcludedName(name: string, extraExcludes: ReadonlySet<string>): boolean {
  return name.startsWith('.') || DEFAULT_EXCLUDES.has(name) || extraExcludes.has(name);
}

/**
 * Determine if a file path should be skipped.
 * Paths outside the root are always skipped.
 */
export function shouldExclude(
  filePath: string,
  rootPath: string,
  extraExcludes: ReadonlySet<string> = new Set()
): boolean {
  const relativePath = relative(rootPath, filePath);
  if (relativePath === '' || isAbsolute(relativePath)) {
    return true;
  }

  const segments = relativePath.split(sep);
  if (segments[0] === '..') {
    return true;
  }

  return segments.some((segment) => isExcludedName(segment, extraExcludes));
}

/**
 * Parse a comma-separated list of folder names
 */
export function parseExcludeList(value: string | undefined): Set<string> {
  if (!value) {
    return new Set();
  }
  return new Set(
    value
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  );
}

/**
 * Order paths segment by segment, so a folder's files stay together
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split(sep);
  const right = b.split(sep);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? '';
    const r = right[i] ?? '';
    if (l !== r) {
      return l < r ? -1 : 1;
    }
  }

  return left.length - right.length;
}

/**
 * Whether a symlink resolves to a folder. Broken links count as files.
 */
function isLinkToDirectory(entryPath: string): boolean {
  try {
    return statSync(entryPath).isDirectory();
  } catch (error) {
    logger.debug(`Unresolved link: ${entryPath}`, {
      code: (error as NodeJS.ErrnoException).code,
    });
    return false;
  }
}

/**
 * Recursively find all Markdown files under the root, sorted.
 * Symlinked directories are listed but not followed.
 */
export function findMarkdownFiles(
  rootPath: string,
  extraExcludes: ReadonlySet<string> = new Set(),
  extension = '.md'
): string[] {
  const files: string[] = [];
  const pending: string[] = [rootPath];

  while (pending.length > 0) {
    const dirPath = pending.pop();
    if (dirPath === undefined) break;

    let entries: Dirent[];
    try {
      entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      if (dirPath === rootPath) {
        throw error;
      }
      logger.warn(`Skipping unreadable folder: ${dirPath}`, {
        code: (error as NodeJS.ErrnoException).code,
      });
      continue;
    }

    for (const entry of entries) {
      const entryPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        if (isExcludedName(entry.name, extraExcludes)) {
          logger.debug(`Pruned folder: ${relative(rootPath, entryPath)}`);
          continue;
        }
        pending.push(entryPath);
        continue;
      }

      if (entry.isSymbolicLink() && isLinkToDirectory(entryPath)) {
        continue;
      }

      if (!entry.name.endsWith(extension) || entry.name.startsWith('.')) {
        continue;
      }

      if (!shouldExclude(entryPath, rootPath, extraExcludes)) {
        files.push(entryPath);
      }
    }
  }

  return files.sort(comparePaths);
}
