#!/usr/bin/env node

/**
 * Vault Headings CLI
 *
 * Demotes every H1 heading in an Obsidian vault to H2, leaving frontmatter
 * and fenced code blocks alone.
 */

import { createProgram } from './commands/convert.js';
import { errorMessage } from './config/errors.js';
import { logger } from './utils/logger.js';

const program = createProgram((code) => {
  process.exitCode = code;
});

try {
  program.parse(process.argv);
} catch (error) {
  logger.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
}
