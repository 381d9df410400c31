/**
 * CURIE constants
 */

import { type Curie, CurieSchema } from "./types.ts";

/**
 * The zero element: no identity
 */
export const EMPTY_CURIE: Curie = CurieSchema.parse("");

/**
 * Separator between scheme and reference
 */
export const SCHEME_SEPARATOR = ":";

/**
 * Separator between reference segments
 */
export const SEGMENT_SEPARATOR = "/";

/**
 * Opening and closing marks of the safe CURIE form
 */
export const SAFE_CURIE_OPEN = "[";
export const SAFE_CURIE_CLOSE = "]";

/**
 * Scheme token accepted in namespace configuration:
 * no ':', no '/', no whitespace
 */
export const SCHEME_REGEX = /^[^:/\s]+$/;

/**
 * Octets of RFC 3987 gen-delims and sub-delims. Escapes of these octets
 * are kept as they are by the percent-decoding normalizer.
 */
export const RESERVED_OCTETS: ReadonlySet<number> = new Set(
  Array.from(":/?#[]@!$&'()*+,;=", (c) => c.charCodeAt(0))
);

/**
 * Printable characters: letters, marks, numbers, punctuation, symbols
 * and space separators
 */
export const GRAPHIC_CHAR_REGEX = /^[\p{L}\p{M}\p{N}\p{P}\p{S}\p{Zs}]$/u;
