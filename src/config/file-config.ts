/**
 * Per-vault configuration file
 * Loads from VAULT_HEADINGS_CONFIG, --config, or <vault>/.vault-headings.yaml
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import { ConfigError, errorMessage } from './errors.js';

export const CONFIG_FILENAME = '.vault-headings.yaml';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// A single folder name: exclusion matches path segments, not paths
const folderNameSchema = z
  .string()
  .min(1)
  .regex(/^[^/\\]+$/, 'must be a single folder name')
  .refine((name) => name !== '.' && name !== '..', 'must be a single folder name');

const fileConfigSchema = z
  .object({
    exclude: z.array(folderNameSchema).default([]),
    backups: z.boolean().optional(),
    backup_dir: folderNameSchema.optional(),
    extension: z
      .string()
      .regex(/^\.[^/\\.]+$/, 'must look like ".md"')
      .optional(),
    log_level: logLevelSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Format zod issues the same way for every config source
 */
export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Pick the config file to load, if any.
 * An explicitly requested file must exist; the per-vault default is optional.
 */
export function findConfigPath(rootPath: string, explicitPath?: string): string | null {
  if (explicitPath) {
    const configPath = resolve(explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file does not exist: ${configPath}`);
    }
    return configPath;
  }

  const defaultPath = join(rootPath, CONFIG_FILENAME);
  return existsSync(defaultPath) ? defaultPath : null;
}

/**
 * Load and validate a YAML config file. An empty file is an empty config.
 */
export function loadFileConfig(configPath: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${configPath}: ${errorMessage(error)}`);
  }

  const result = fileConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${configPath}:\n${formatIssues(result.error.issues)}`);
  }

  logger.debug(`Loaded config from ${configPath}`);
  return result.data;
}

// Export schemas for testing
export const schemas = {
  fileConfig: fileConfigSchema,
  folderName: folderNameSchema,
};
