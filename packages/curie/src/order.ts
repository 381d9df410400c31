/**
 * CURIE equality and ordering
 *
 * CURIEs are ordered by rank first, then segment by segment:
 *
 *   ""      < "a:"     (rank 0 < 1)
 *   "a:b"   < "a:c"    (rank 2, "b" < "c")
 *   "a:x/a" < "b:a/b/c"
 */

import { SEGMENT_SEPARATOR } from "./constants.ts";
import { splitCurie } from "./curie.ts";
import type { Curie } from "./types.ts";

/**
 * Compare strings by Unicode code point, which matches the byte order
 * of their UTF-8 forms
 *
 * @example
 * ```ts
 * compareCodePoints("\uFF21", "\u{1F600}") // => -1
 * ```
 */
export function compareCodePoints(a: string, b: string): -1 | 0 | 1 {
  const n = Math.min(a.length, b.length);
  let i = 0;
  while (i < n) {
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(i) ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
    i += x > 0xffff ? 2 : 1;
  }

  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

/**
 * Scheme followed by reference segments
 *
 * @example
 * ```ts
 * curieSegments("")      // => []
 * curieSegments("a:")    // => ["a"]
 * curieSegments("b/c")   // => ["", "b", "c"]
 * curieSegments("a:b/c") // => ["a", "b", "c"]
 * ```
 */
export function curieSegments(curie: Curie): string[] {
  if (curie === "") {
    return [];
  }

  const [scheme, reference] = splitCurie(curie);
  if (reference === "") {
    return [scheme];
  }

  return [scheme, ...reference.split(SEGMENT_SEPARATOR)];
}

/**
 * Number of segments, scheme included
 */
export function curieRank(curie: Curie): number {
  return curieSegments(curie).length;
}

/**
 * Check if two CURIEs are equal
 */
export function curieEquals(a: Curie, b: Curie): boolean {
  return a === b;
}

/**
 * Compare two CURIEs
 *
 * @returns negative if `a` sorts first, positive if `b` does, 0 if equal
 */
export function compareCuries(a: Curie, b: Curie): -1 | 0 | 1 {
  if (a === b) return 0;

  const sa = curieSegments(a);
  const sb = curieSegments(b);
  if (sa.length !== sb.length) {
    return sa.length < sb.length ? -1 : 1;
  }

  for (let i = 0; i < sa.length; i++) {
    const x = sa[i] ?? "";
    const y = sb[i] ?? "";
    if (x !== y) {
      return compareCodePoints(x, y);
    }
  }

  return 0;
}

/**
 * Check if `a` sorts strictly before `b`
 */
export function curieLessThan(a: Curie, b: Curie): boolean {
  return compareCuries(a, b) < 0;
}
