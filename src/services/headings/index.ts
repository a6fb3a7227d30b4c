/**
 * Heading conversion exports
 */

export {
  convertHeadings,
  demoteHeading,
  isH1Heading,
  nextScanState,
  fenceMarkerOf,
  INITIAL_SCAN_STATE,
} from './converter.js';
export type { LineStep } from './converter.js';
