/**
 * CURIE construction and decomposition
 *
 * Every operation works on the CURIE text and returns a new value.
 *
 *   a:b/c/d
 *   │ └─┬─┘
 *   │   reference, segments "b", "c", "d"
 *   scheme
 */

import { cutReference, joinReference } from "@curie-kit/reference";
import { SCHEME_SEPARATOR, SEGMENT_SEPARATOR } from "./constants.ts";
import { type Curie, CurieSchema } from "./types.ts";

/**
 * Brand CURIE text without inspecting it
 */
export function toCurie(text: string): Curie {
  return CurieSchema.parse(text);
}

/**
 * Create a CURIE from scheme and reference
 *
 * A trailing ':' on the scheme is tolerated. An empty scheme yields the
 * reference unchanged (relative CURIE). Characters are not validated.
 *
 * @example
 * ```ts
 * createCurie("a", "b/c")  // => "a:b/c"
 * createCurie("a:", "b")   // => "a:b"
 * createCurie("a", "")     // => "a:"
 * createCurie("", "b")     // => "b"
 * ```
 */
export function createCurie(scheme: string, reference: string): Curie {
  let name = scheme;
  while (name.endsWith(SCHEME_SEPARATOR)) {
    name = name.slice(0, -1);
  }

  if (name === "") {
    return toCurie(reference);
  }

  return toCurie(`${name}${SCHEME_SEPARATOR}${reference}`);
}

/**
 * Check whether a CURIE is the empty (zero) CURIE
 */
export function isEmptyCurie(curie: Curie): boolean {
  return curie === "";
}

/**
 * Split a CURIE into scheme and reference at the first ':'
 *
 * @example
 * ```ts
 * splitCurie("a:b/c:d") // => ["a", "b/c:d"]
 * splitCurie("a:")      // => ["a", ""]
 * splitCurie("b/c")     // => ["", "b/c"]
 * ```
 */
export function splitCurie(curie: Curie): [scheme: string, reference: string] {
  const at = curie.indexOf(SCHEME_SEPARATOR);
  if (at === -1) {
    return ["", curie];
  }

  return [curie.slice(0, at), curie.slice(at + 1)];
}

/**
 * Scheme of a CURIE, empty for relative CURIEs
 */
export function curieScheme(curie: Curie): string {
  return splitCurie(curie)[0];
}

/**
 * Reference of a CURIE, empty for namespace-only CURIEs
 */
export function curieReference(curie: Curie): string {
  return splitCurie(curie)[1];
}

/**
 * Replace the scheme, keeping the reference
 */
export function withScheme(curie: Curie, scheme: string): Curie {
  return createCurie(scheme, curieReference(curie));
}

/**
 * Last segment of the reference
 *
 *   a:b/c/d ⟼ d
 */
export function curieBase(curie: Curie): string {
  const reference = curieReference(curie);
  return reference.slice(reference.lastIndexOf(SEGMENT_SEPARATOR) + 1);
}

/**
 * Scheme and every reference segment but the last
 *
 *   a:b/c/d ⟼ a:b/c
 *   a:b     ⟼ a:
 */
export function curiePath(curie: Curie): Curie {
  const [scheme, reference] = splitCurie(curie);
  if (reference === "") {
    return curie;
  }

  return createCurie(scheme, cutReference(reference, SEGMENT_SEPARATOR, 1));
}

/**
 * First segment of the reference
 *
 *   a:b/c/d ⟼ b
 */
export function curieHead(curie: Curie): string {
  const reference = curieReference(curie);
  const at = reference.indexOf(SEGMENT_SEPARATOR);
  return at === -1 ? reference : reference.slice(0, at);
}

/**
 * Scheme and every reference segment but the first
 *
 *   a:b/c/d ⟼ a:c/d
 *   a:b     ⟼ a:
 */
export function curieTail(curie: Curie): Curie {
  const [scheme, reference] = splitCurie(curie);
  if (reference === "") {
    return curie;
  }

  const at = reference.indexOf(SEGMENT_SEPARATOR);
  return createCurie(scheme, at === -1 ? "" : reference.slice(at + 1));
}

/**
 * Append segments to the reference, skipping empty ones
 *
 *   a:b × [c, d, e] ⟼ a:b/c/d/e
 *
 * Segments are not escaped. A CURIE without a scheme is split at its
 * first ':' once joined, so a segment holding ':' becomes part of a new
 * scheme and {@link cutCurie} no longer undoes the join:
 *
 *   b × [x:y] ⟼ b/x:y (scheme "b/x"), cut 1 ⟼ b/x:
 */
export function joinCurie(curie: Curie, ...segments: string[]): Curie {
  if (segments.every((s) => s === "")) {
    return curie;
  }

  const [scheme, reference] = splitCurie(curie);
  return createCurie(scheme, joinReference(reference, SEGMENT_SEPARATOR, ...segments));
}

/**
 * Remove the last `n` reference segments
 *
 *   a:b/c/d/e ⟼¹ a:b/c/d
 *   a:b/c/d/e ⟼³ a:b
 *   a:b/c/d/e ⟼⁵ a:
 *
 * @param n - Segment count; zero or negative values return `curie`
 */
export function cutCurie(curie: Curie, n: number): Curie {
  if (n <= 0) {
    return curie;
  }

  const [scheme, reference] = splitCurie(curie);
  return createCurie(scheme, cutReference(reference, SEGMENT_SEPARATOR, n));
}

/**
 * Compose two CURIEs into a descendant of the first. The scheme of the
 * second becomes a segment.
 *
 *   a:b × c/d/e ⟼ a:b/c/d/e
 *   a:b × c:d/e ⟼ a:b/c/d/e
 */
export function heirCurie(curie: Curie, other: Curie): Curie {
  if (isEmptyCurie(other)) {
    return curie;
  }

  const [scheme, reference] = splitCurie(other);
  return joinCurie(curie, scheme, reference);
}
