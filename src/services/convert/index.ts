/**
 * Conversion run exports
 */

export { processFile, UNDECODABLE_MESSAGE } from './processor.js';
export { runConversion, addRecord, exitCodeFor, EMPTY_SUMMARY } from './runner.js';
export { renderBanner, renderSummary, TITLE } from './report.js';
