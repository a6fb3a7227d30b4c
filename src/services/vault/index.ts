/**
 * Vault services exports
 */

export {
  findMarkdownFiles,
  shouldExclude,
  isExcludedName,
  parseExcludeList,
  comparePaths,
  DEFAULT_EXCLUDES,
} from './discovery.js';

export { decodeText, encodeText, TEXT_ENCODINGS } from './encoding.js';
export type { TextEncoding } from './encoding.js';

export { writeFileAtomic, tempPathFor } from './writer.js';
