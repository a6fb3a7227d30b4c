/**
 * The `vault-headings` command
 */

import { Command } from 'commander';
import { resolveRunOptions, ConfigError } from '../config/index.js';
import { runConversion, exitCodeFor } from '../services/convert/index.js';
import { logger } from '../utils/logger.js';
import type { OutputFn, RunOptions } from '../types/index.js';

export const VERSION = '0.1.0';

const EXAMPLES = `
Examples:
  vault-headings /path/to/vault                          # Dry run
  vault-headings /path/to/vault --write                  # Apply changes
  vault-headings /path/to/vault --write -v               # Verbose
  vault-headings /path/to/vault --exclude "drafts,archive"

Safety:
  - Dry run is the default. Use --write to modify files.
  - Backups are created in <vault>/_backups/ with timestamps.
  - Files are written atomically (temp file, then rename).`;

export interface ConvertCommandOptions {
  dryRun?: boolean;
  write?: boolean;
  backup?: boolean;
  verbose?: boolean;
  exclude?: string;
  config?: string;
}

export interface ConvertContext {
  output?: OutputFn;
  errorOutput?: OutputFn;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve options, run the conversion and return the exit code
 */
export function executeConvert(
  vaultPath: string,
  commandOptions: ConvertCommandOptions,
  context: ConvertContext = {}
): number {
  const errorOutput = context.errorOutput ?? ((line: string) => console.error(line));

  let options: RunOptions;
  try {
    options = resolveRunOptions(
      {
        vaultPath,
        write: commandOptions.write,
        backup: commandOptions.backup,
        verbose: commandOptions.verbose,
        exclude: commandOptions.exclude,
        config: commandOptions.config,
      },
      context.env
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      errorOutput(`❌ Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  logger.setLevel(options.logLevel);
  logger.debug('Resolved run options', {
    ...options,
    extraExcludes: [...options.extraExcludes],
  });

  return exitCodeFor(runConversion(options, context.output));
}

/**
 * Build the CLI program. The exit code is handed to onExit once the run ends.
 */
export function createProgram(
  onExit: (code: number) => void,
  context: ConvertContext = {}
): Command {
  return new Command('vault-headings')
    .description('Convert Markdown H1 headings to H2 headings in an Obsidian vault.')
    .version(VERSION)
    .argument('<vault-path>', 'Path to the Obsidian vault root')
    .option('--dry-run', 'Preview changes without modifying (default)')
    .option('--write', 'Actually modify files')
    .option('--backup', 'Create backups before modifying (default)')
    .option('--no-backup', 'Skip creating backups')
    .option('-v, --verbose', 'Print per-file details')
    .option('--exclude <names>', 'Comma-separated folder names to exclude')
    .option('--config <file>', 'Config file (default: <vault>/.vault-headings.yaml)')
    .addHelpText('after', EXAMPLES)
    .action((vaultPath: string, commandOptions: ConvertCommandOptions) => {
      onExit(executeConvert(vaultPath, commandOptions, context));
    });
}
