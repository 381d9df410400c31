/**
 * Delimited reference helpers
 *
 * A reference is a path-like string whose segments are separated by a
 * single delimiter character, e.g. "b/c/d" or "1:2:3".
 */

/**
 * Append segments to a reference
 *
 * Empty segments are skipped. No delimiter is written in front of the
 * first segment when the reference itself is empty.
 *
 * @example
 * ```ts
 * joinReference("b/c", "/", "d", "", "e") // => "b/c/d/e"
 * joinReference("", "/", "x", "y")        // => "x/y"
 * joinReference("b", "/", "", "")         // => "b"
 * ```
 */
export function joinReference(ref: string, delim: string, ...segments: string[]): string {
  let result = ref;

  for (const segment of segments) {
    if (segment === "") continue;
    result = result === "" ? segment : `${result}${delim}${segment}`;
  }

  return result;
}

/**
 * Remove the last `n` segments of a reference
 *
 * Delimiters are counted from the end of the string. When the reference
 * holds fewer than `n` delimiters nothing is left.
 *
 * @param n - Segments to drop; zero or negative values keep `ref` as is
 *
 * @example
 * ```ts
 * cutReference("b/c/d", "/", 1) // => "b/c"
 * cutReference("b/c/d", "/", 2) // => "b"
 * cutReference("b/c", "/", 2)   // => ""
 * ```
 */
export function cutReference(ref: string, delim: string, n: number): string {
  if (n <= 0) {
    return ref;
  }

  let end = ref.length;
  for (let i = 0; i < n; i++) {
    const at = end === 0 ? -1 : ref.lastIndexOf(delim, end - 1);
    if (at === -1) {
      return "";
    }
    end = at;
  }

  return ref.slice(0, end);
}
