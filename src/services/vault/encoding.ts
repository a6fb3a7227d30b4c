/**
 * Text encodings tried, in priority order, when reading a note
 */

import type { DecodedText, TextEncodingName } from '../../types/index.js';

const BOM = '\uFEFF';

interface TextEncoding {
  name: TextEncodingName;
  /** Returns null when the bytes are not valid in this encoding */
  decode(bytes: Uint8Array): string | null;
  encode(content: string): Buffer;
}

function strictUtf8(bytes: Uint8Array, keepBom: boolean): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: keepBom }).decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

const utf8: TextEncoding = {
  name: 'utf-8',
  decode: (bytes) => strictUtf8(bytes, true),
  encode: (content) => Buffer.from(content, 'utf-8'),
};

const utf8Sig: TextEncoding = {
  name: 'utf-8-sig',
  decode: (bytes) => strictUtf8(bytes, false),
  encode: (content) => Buffer.from(BOM + content, 'utf-8'),
};

// Every byte maps to one code point, so this never fails
const latin1: TextEncoding = {
  name: 'latin-1',
  decode: (bytes) => Buffer.from(bytes).toString('latin1'),
  encode: (content) => Buffer.from(content, 'latin1'),
};

export const TEXT_ENCODINGS: readonly TextEncoding[] = [utf8, utf8Sig, latin1];

/**
 * Decode with the first encoding that accepts the bytes
 */
export function decodeText(
  bytes: Uint8Array,
  candidates: readonly TextEncoding[] = TEXT_ENCODINGS
): DecodedText | null {
  for (const candidate of candidates) {
    const content = candidate.decode(bytes);
    if (content !== null) {
      return { content, encoding: candidate.name };
    }
  }
  return null;
}

/**
 * Encode text back with the encoding it was read with
 */
export function encodeText(content: string, encoding: TextEncodingName): Buffer {
  const match = TEXT_ENCODINGS.find((candidate) => candidate.name === encoding);
  if (!match) {
    throw new Error(`Unsupported encoding: ${encoding}`);
  }
  return match.encode(content);
}

export type { TextEncoding };
