/**
 * UTF-8 decoding over byte buffers that may hold partial or invalid
 * sequences
 */

/** Replacement character, reported for invalid or incomplete input */
export const RUNE_ERROR = 0xfffd;

/**
 * Decoded code point and the number of bytes it occupies.
 * Invalid input decodes to RUNE_ERROR with size 1.
 */
export type DecodedRune = { rune: number; size: number };

const INVALID: DecodedRune = { rune: RUNE_ERROR, size: 1 };

function isContinuation(b: number): boolean {
  return (b & 0xc0) === 0x80;
}

/**
 * Decode the code point starting at `start`, reading no further than
 * `end`. Overlong forms, surrogates and values above U+10FFFF are
 * invalid.
 */
export function decodeRune(
  bytes: readonly number[],
  start: number,
  end: number = bytes.length
): DecodedRune {
  const b0 = bytes[start];
  if (b0 === undefined || start >= end) {
    return { rune: RUNE_ERROR, size: 0 };
  }
  if (b0 < 0x80) {
    return { rune: b0, size: 1 };
  }

  let size: number;
  let rune: number;
  // accepted range of the second byte
  let lo = 0x80;
  let hi = 0xbf;

  if (b0 >= 0xc2 && b0 <= 0xdf) {
    size = 2;
    rune = b0 & 0x1f;
  } else if (b0 >= 0xe0 && b0 <= 0xef) {
    size = 3;
    rune = b0 & 0x0f;
    if (b0 === 0xe0) lo = 0xa0;
    if (b0 === 0xed) hi = 0x9f;
  } else if (b0 >= 0xf0 && b0 <= 0xf4) {
    size = 4;
    rune = b0 & 0x07;
    if (b0 === 0xf0) lo = 0x90;
    if (b0 === 0xf4) hi = 0x8f;
  } else {
    return INVALID;
  }

  if (start + size > end) {
    return INVALID;
  }

  for (let i = 1; i < size; i++) {
    const b = bytes[start + i];
    if (b === undefined) return INVALID;
    const min = i === 1 ? lo : 0x80;
    const max = i === 1 ? hi : 0xbf;
    if (b < min || b > max) return INVALID;
    rune = (rune << 6) | (b & 0x3f);
  }

  return { rune, size };
}

/**
 * Decode the code point that ends the buffer. A sequence that is still
 * incomplete decodes to RUNE_ERROR with size 1.
 */
export function decodeLastRune(bytes: readonly number[]): DecodedRune {
  const end = bytes.length;
  const last = bytes[end - 1];
  if (last === undefined) {
    return { rune: RUNE_ERROR, size: 0 };
  }
  if (last < 0x80) {
    return { rune: last, size: 1 };
  }

  // a sequence is at most 4 bytes long
  const limit = Math.max(end - 4, 0);
  let start = end - 2;
  for (; start >= limit; start--) {
    if (!isContinuation(bytes[start] ?? 0)) break;
  }
  if (start < 0) start = 0;

  const decoded = decodeRune(bytes, start, end);
  if (start + decoded.size !== end) {
    return INVALID;
  }
  return decoded;
}
