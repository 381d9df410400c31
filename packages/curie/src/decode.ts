/**
 * Percent-decoding normalizer: URI → IRI (RFC 3987, section 3.2)
 *
 * Escapes are decoded unless they
 * - stand for a reserved delimiter (gen-delims / sub-delims),
 * - are malformed (kept verbatim),
 * - decode to something that is not a printable character
 *   (re-escaped as upper-case %XX of its UTF-8 bytes).
 */

import { GRAPHIC_CHAR_REGEX, RESERVED_OCTETS } from "./constants.ts";
import { decodeLastRune, decodeRune, RUNE_ERROR } from "./utf8.ts";

const PERCENT = 0x25;
const encoder = new TextEncoder();

function unhex(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30; // 0-9
  if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10; // a-f
  if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10; // A-F
  return -1;
}

function escapeOctet(b: number): string {
  return `%${b.toString(16).toUpperCase().padStart(2, "0")}`;
}

function isGraphic(rune: number): boolean {
  return GRAPHIC_CHAR_REGEX.test(String.fromCodePoint(rune));
}

/**
 * UTF-8 bytes of the text. A lone surrogate is written as its 3-byte
 * form, which is invalid UTF-8 and ends up escaped.
 */
function toBytes(text: string): number[] {
  const bytes: number[] = [];
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp >= 0xd800 && cp <= 0xdfff) {
      bytes.push(0xe0 | (cp >> 12), 0x80 | ((cp >> 6) & 0x3f), 0x80 | (cp & 0x3f));
    } else {
      bytes.push(...encoder.encode(ch));
    }
  }
  return bytes;
}

/**
 * Re-escape the last character of the buffer when it is complete but
 * not printable
 */
function escapeLastRune(iri: number[]): void {
  const { rune, size } = decodeLastRune(iri);
  if (rune === RUNE_ERROR || isGraphic(rune)) {
    return;
  }

  const bytes = iri.splice(iri.length - size, size);
  for (const b of bytes) {
    for (const c of escapeOctet(b)) {
      iri.push(c.charCodeAt(0));
    }
  }
}

/**
 * Render the buffer as text; bytes outside any valid UTF-8 sequence are
 * escaped
 */
function toText(iri: readonly number[]): string {
  let text = "";
  let i = 0;
  while (i < iri.length) {
    const { rune, size } = decodeRune(iri, i);
    if (rune === RUNE_ERROR && size === 1) {
      text += escapeOctet(iri[i] ?? 0);
    } else {
      text += String.fromCodePoint(rune);
    }
    i += size;
  }
  return text;
}

/**
 * Convert a percent-escaped URI into its IRI form
 *
 * @example
 * ```ts
 * decodeUri("%CE%B1")   // => "α"
 * decodeUri("%3A%2F")   // => "%3A%2F"
 * decodeUri("%00")      // => "%00"
 * decodeUri("%Ww%%")    // => "%Ww%%"
 * decodeUri("a\uD800b") // => "a%ED%A0%80b"
 * ```
 */
export function decodeUri(uri: string): string {
  const src = toBytes(uri);
  const iri: number[] = [];

  let i = 0;
  while (i < src.length) {
    const b = src[i] ?? 0;
    const hi = b === PERCENT && i + 2 < src.length ? unhex(src[i + 1] ?? 0) : -1;
    const lo = hi === -1 ? -1 : unhex(src[i + 2] ?? 0);

    if (hi !== -1 && lo !== -1) {
      const octet = (hi << 4) | lo;
      if (RESERVED_OCTETS.has(octet)) {
        iri.push(...src.slice(i, i + 3));
      } else {
        iri.push(octet);
        escapeLastRune(iri);
      }
      i += 3;
    } else {
      iri.push(b);
      escapeLastRune(iri);
      i++;
    }
  }

  return toText(iri);
}
