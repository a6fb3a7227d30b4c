/**
 * H1 → H2 heading converter
 *
 * Single forward pass over the lines of a note. Frontmatter and fenced code
 * blocks are copied through untouched; every other line matching the H1
 * pattern gains one more `#`.
 */

import type { ConversionOutput, FenceMarker, ScanState } from '../../types/index.js';

const FRONTMATTER_DELIMITER = '---';
const FENCE_MARKERS: readonly FenceMarker[] = ['```', '~~~'];

// 0-3 leading spaces, "# ", then the rest of the line (which may end in \r)
const H1_PATTERN = /^( {0,3})# (.*)$/s;

export const INITIAL_SCAN_STATE: ScanState = { kind: 'normal' };

export interface LineStep {
  state: ScanState;
  /** Whether the line may be checked for a heading */
  scannable: boolean;
}

/**
 * Fence marker a line opens with, ignoring leading whitespace
 */
export function fenceMarkerOf(line: string): FenceMarker | null {
  const stripped = line.trimStart();
  return FENCE_MARKERS.find((marker) => stripped.startsWith(marker)) ?? null;
}

/**
 * Advance the scanner past one line
 */
export function nextScanState(state: ScanState, line: string, index: number): LineStep {
  switch (state.kind) {
    case 'frontmatter':
      return {
        state: line.trim() === FRONTMATTER_DELIMITER ? INITIAL_SCAN_STATE : state,
        scannable: false,
      };

    case 'fenced':
      return {
        state: line.trimStart().startsWith(state.marker) ? INITIAL_SCAN_STATE : state,
        scannable: false,
      };

    case 'normal': {
      if (index === 0 && line.trim() === FRONTMATTER_DELIMITER) {
        return { state: { kind: 'frontmatter' }, scannable: false };
      }

      const marker = fenceMarkerOf(line);
      if (marker) {
        return { state: { kind: 'fenced', marker }, scannable: false };
      }

      return { state, scannable: true };
    }
  }
}

/**
 * Check whether a line is a level-1 heading
 */
export function isH1Heading(line: string): boolean {
  return H1_PATTERN.test(line);
}

/**
 * Demote a level-1 heading line, or return null if it is not one
 */
export function demoteHeading(line: string): string | null {
  const match = line.match(H1_PATTERN);
  if (!match) {
    return null;
  }
  const [, leadingSpaces = '', rest = ''] = match;
  return `${leadingSpaces}## ${rest}`;
}

/**
 * Convert every H1 outside frontmatter and fences to an H2.
 * Lines are split and re-joined on "\n" only; line endings are left as found.
 */
export function convertHeadings(content: string): ConversionOutput {
  const lines = content.split('\n');
  const result: string[] = [];
  let state = INITIAL_SCAN_STATE;
  let replacements = 0;

  lines.forEach((line, index) => {
    const step = nextScanState(state, line, index);
    state = step.state;

    const demoted = step.scannable ? demoteHeading(line) : null;
    if (demoted === null) {
      result.push(line);
      return;
    }

    result.push(demoted);
    replacements++;
  });

  return { content: result.join('\n'), replacements };
}
