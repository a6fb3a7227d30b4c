/**
 * Configuration loading and validation
 *
 * Precedence: CLI flags > environment > config file > defaults
 */

import { z } from 'zod';
import { resolve } from 'path';
import { statSync } from 'fs';
import { parseExcludeList } from '../services/vault/discovery.js';
import { ConfigError } from './errors.js';
import { findConfigPath, loadFileConfig, formatIssues, logLevelSchema } from './file-config.js';
import type { FileConfig } from './file-config.js';
import type { RunOptions } from '../types/index.js';

export const DEFAULT_EXTENSION = '.md';
export const DEFAULT_BACKUP_DIR = '_backups';
export const DEFAULT_LOG_LEVEL = 'warn';

const envSchema = z.object({
  VAULT_HEADINGS_LOG_LEVEL: logLevelSchema.optional(),
  VAULT_HEADINGS_CONFIG: z.string().min(1).optional(),
});

/**
 * Raw values as they arrive from the command line
 */
export interface CliInput {
  vaultPath: string;
  write?: boolean | undefined;
  backup?: boolean | undefined; // undefined: not given on the command line
  verbose?: boolean | undefined;
  exclude?: string | undefined;
  config?: string | undefined;
}

/**
 * Resolve the vault path and make sure it is a directory
 */
export function validateRootPath(vaultPath: string): string {
  const rootPath = resolve(vaultPath);
  const stats = statSync(rootPath, { throwIfNoEntry: false });

  if (!stats) {
    throw new ConfigError(`Vault path does not exist: ${rootPath}`);
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`Vault path is not a directory: ${rootPath}`);
  }

  return rootPath;
}

function parseEnv(env: NodeJS.ProcessEnv): z.infer<typeof envSchema> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Configuration error:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Merge every configuration source into one validated set of run options
 */
export function resolveRunOptions(
  input: CliInput,
  env: NodeJS.ProcessEnv = process.env
): RunOptions {
  const envConfig = parseEnv(env);
  const rootPath = validateRootPath(input.vaultPath);

  const configPath = findConfigPath(rootPath, input.config ?? envConfig.VAULT_HEADINGS_CONFIG);
  const fileConfig: FileConfig = configPath ? loadFileConfig(configPath) : { exclude: [] };

  const extraExcludes = new Set([...fileConfig.exclude, ...parseExcludeList(input.exclude)]);

  return Object.freeze({
    rootPath,
    dryRun: !input.write,
    createBackups: input.backup ?? fileConfig.backups ?? true,
    verbose: input.verbose ?? false,
    extraExcludes,
    extension: fileConfig.extension ?? DEFAULT_EXTENSION,
    backupDirName: fileConfig.backup_dir ?? DEFAULT_BACKUP_DIR,
    logLevel: envConfig.VAULT_HEADINGS_LOG_LEVEL ?? fileConfig.log_level ?? DEFAULT_LOG_LEVEL,
  });
}

export { ConfigError, errorMessage } from './errors.js';
export { CONFIG_FILENAME, findConfigPath, loadFileConfig, schemas } from './file-config.js';
export type { FileConfig } from './file-config.js';
