/**
 * End-to-end conversion tests: whole-vault runs and the CLI command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync, readFileSync, readdirSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { tmpdir } from 'os';
import { resolveRunOptions } from '../../src/config/index.js';
import { runConversion } from '../../src/services/convert/index.js';
import { createProgram, executeConvert } from '../../src/commands/convert.js';
import { logger } from '../../src/utils/logger.js';

describe('Vault conversion', () => {
  const testDir = join(tmpdir(), `vault-headings-e2e-${Date.now()}`);
  const vaultPath = join(testDir, 'vault');
  let lines: string[];
  let errorLines: string[];
  const output = (line: string): void => {
    lines.push(line);
  };
  const errorOutput = (line: string): void => {
    errorLines.push(line);
  };

  function writeNote(relativePath: string, content: string): void {
    const fullPath = join(vaultPath, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }

  function readNote(relativePath: string): string {
    return readFileSync(join(vaultPath, relativePath), 'utf-8');
  }

  beforeEach(() => {
    lines = [];
    errorLines = [];
    writeNote('Home.md', '---\ntitle: # Home\n---\n# Home\n\n```\n# shell comment\n```\n');
    writeNote('projects/Plan.md', '# Plan\n## Steps\n# Notes\n');
    writeNote('projects/Clean.md', '## Already fine\n');
    writeNote('.obsidian/workspace.md', '# Settings\n');
    writeNote('templates/Daily.md', '# {{date}}\n');
  });

  afterEach(() => {
    logger.setLevel('warn');
    try {
      rmSync(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('runConversion', () => {
    it('previews changes without writing', () => {
      const options = resolveRunOptions({ vaultPath, exclude: 'templates' }, {});
      const summary = runConversion(options, output);

      expect(summary).toEqual({
        filesScanned: 3,
        filesChanged: 2,
        totalReplacements: 3,
        errors: [],
      });
      expect(readNote('projects/Plan.md')).toBe('# Plan\n## Steps\n# Notes\n');
      expect(existsSync(join(vaultPath, '_backups'))).toBe(false);
      expect(lines).toContain('Found 3 Markdown file(s) to scan.');
      expect(lines).toContain('Extra excludes: templates');
    });

    it('writes changes with backups', () => {
      const options = resolveRunOptions({ vaultPath, write: true, verbose: true }, {});
      const summary = runConversion(options, output);

      expect(summary.filesScanned).toBe(4);
      expect(summary.filesChanged).toBe(3);
      expect(summary.totalReplacements).toBe(4);
      expect(readNote('Home.md')).toBe('---\ntitle: # Home\n---\n## Home\n\n```\n# shell comment\n```\n');
      expect(readNote('projects/Plan.md')).toBe('## Plan\n## Steps\n## Notes\n');
      expect(readNote('projects/Clean.md')).toBe('## Already fine\n');
      expect(readNote('.obsidian/workspace.md')).toBe('# Settings\n');

      const backups = readdirSync(join(vaultPath, '_backups', 'projects'));
      expect(backups).toHaveLength(1);
      expect(readFileSync(join(vaultPath, '_backups', 'projects', backups[0] ?? ''), 'utf-8')).toBe(
        '# Plan\n## Steps\n# Notes\n'
      );
      expect(lines).toContain('Processing files:');
      expect(lines).toContain(`  ${join('projects', 'Plan.md')}: 2 H1 heading(s) found`);
    });

    it('finds nothing on a second run and never scans backups', () => {
      runConversion(resolveRunOptions({ vaultPath, write: true }, {}), output);
      lines = [];

      const summary = runConversion(resolveRunOptions({ vaultPath, write: true }, {}), output);
      expect(summary).toEqual({ filesScanned: 4, filesChanged: 0, totalReplacements: 0, errors: [] });
      expect(lines).toContain('✅ No H1 headings found. No changes needed.');
    });

    it('records per-file errors and keeps going', () => {
      writeFileSync(join(vaultPath, '_backups'), 'blocks the backup folder');
      const options = resolveRunOptions({ vaultPath, write: true, exclude: 'templates' }, {});
      const summary = runConversion(options, output);

      expect(summary.filesScanned).toBe(3);
      expect(summary.errors).toHaveLength(2);
      expect(summary.errors[0]?.startsWith(`${join(vaultPath, 'Home.md')}: `)).toBe(true);
      expect(summary.errors[1]?.startsWith(`${join(vaultPath, 'projects', 'Plan.md')}: `)).toBe(true);
      expect(readNote('Home.md')).toBe('---\ntitle: # Home\n---\n# Home\n\n```\n# shell comment\n```\n');
    });
  });

  describe('executeConvert', () => {
    it('exits 0 when every file is processed', () => {
      expect(executeConvert(vaultPath, {}, { output, errorOutput, env: {} })).toBe(0);
      expect(errorLines).toEqual([]);
    });

    it('exits 1 for a missing vault without scanning', () => {
      const missing = join(testDir, 'missing');
      expect(executeConvert(missing, { write: true }, { output, errorOutput, env: {} })).toBe(1);
      expect(errorLines).toEqual([`❌ Error: Vault path does not exist: ${missing}`]);
      expect(lines).toEqual([]);
    });

    it('exits 1 for a vault path that is a file', () => {
      const filePath = join(vaultPath, 'Home.md');
      expect(executeConvert(filePath, {}, { output, errorOutput, env: {} })).toBe(1);
      expect(errorLines).toEqual([`❌ Error: Vault path is not a directory: ${filePath}`]);
    });

    it('exits 1 when any file fails', () => {
      writeFileSync(join(vaultPath, '_backups'), 'blocks the backup folder');
      expect(executeConvert(vaultPath, { write: true }, { output, errorOutput, env: {} })).toBe(1);
    });

    it('applies the log level from the environment', () => {
      executeConvert(vaultPath, {}, { output, errorOutput, env: { VAULT_HEADINGS_LOG_LEVEL: 'error' } });
      expect(logger.getLevel()).toBe('error');
    });
  });

  describe('createProgram', () => {
    function run(args: string[]): number | undefined {
      let exitCode: number | undefined;
      createProgram(
        (code) => {
          exitCode = code;
        },
        { output, errorOutput, env: {} }
      ).parse(['node', 'vault-headings', ...args]);
      return exitCode;
    }

    it('previews by default', () => {
      expect(run([vaultPath])).toBe(0);
      expect(readNote('projects/Plan.md')).toBe('# Plan\n## Steps\n# Notes\n');
      expect(lines).toContain('Mode: DRY RUN (no files will be modified)');
    });

    it('treats --dry-run as the default mode', () => {
      expect(run([vaultPath, '--dry-run'])).toBe(0);
      expect(readNote('projects/Plan.md')).toBe('# Plan\n## Steps\n# Notes\n');
    });

    it('writes without backups', () => {
      expect(run([vaultPath, '--write', '--no-backup', '--exclude', 'templates'])).toBe(0);
      expect(readNote('projects/Plan.md')).toBe('## Plan\n## Steps\n## Notes\n');
      expect(readNote('templates/Daily.md')).toBe('# {{date}}\n');
      expect(existsSync(join(vaultPath, '_backups'))).toBe(false);
      expect(lines).toContain('Backups: Disabled');
    });

    it('lets --write win over --dry-run', () => {
      expect(run([vaultPath, '--dry-run', '--write', '-v'])).toBe(0);
      expect(readNote('projects/Plan.md')).toBe('## Plan\n## Steps\n## Notes\n');
      expect(existsSync(join(vaultPath, '_backups', 'projects'))).toBe(true);
    });
  });
});
