/**
 * Namespace resolution: CURIE ⇄ absolute URI
 *
 *   { wiki: "http://en.wikipedia.org/wiki/" }
 *   wiki:CURIE ⟷ http://en.wikipedia.org/wiki/CURIE
 *
 * Matching is textual. When several stems are a prefix of a URI the
 * longest one wins; equal stems are ordered by scheme name, code point
 * by code point.
 */

import { createCurie, curieReference, curieScheme, isEmptyCurie, toCurie } from "./curie.ts";
import { decodeUri } from "./decode.ts";
import { compareCodePoints } from "./order.ts";
import type { Curie, CurieUrlError, Namespaces, Result } from "./types.ts";

/**
 * Stem registered for a scheme
 *
 * @returns The stem, or undefined when the scheme is unknown
 */
export function lookupNamespace(namespaces: Namespaces, scheme: string): string | undefined {
  return Object.hasOwn(namespaces, scheme) ? namespaces[scheme] : undefined;
}

/**
 * Find the namespace entry whose stem is the longest prefix of `uri`
 */
function matchNamespace(
  namespaces: Namespaces,
  uri: string
): { scheme: string; stem: string } | undefined {
  let match: { scheme: string; stem: string } | undefined;

  for (const [scheme, stem] of Object.entries(namespaces)) {
    if (stem === "" || !uri.startsWith(stem)) continue;
    if (
      match === undefined ||
      stem.length > match.stem.length ||
      (stem.length === match.stem.length && compareCodePoints(scheme, match.scheme) < 0)
    ) {
      match = { scheme, stem };
    }
  }

  return match;
}

/**
 * Compact an absolute URI into a CURIE
 *
 * The part after the matched stem is decoded into IRI form. A URI that
 * matches no stem is returned as a relative CURIE, unchanged.
 *
 * @example
 * ```ts
 * const ns = { wiki: "http://en.wikipedia.org/wiki/" };
 * compactUri(ns, "http://en.wikipedia.org/wiki/CURIE")  // => "wiki:CURIE"
 * compactUri(ns, "http://en.wikipedia.org/wiki/%CE%B1") // => "wiki:α"
 * compactUri(ns, "https://example.com/a")               // => "https://example.com/a"
 * ```
 */
export function compactUri(namespaces: Namespaces, uri: string): Curie {
  const match = matchNamespace(namespaces, uri);
  if (match === undefined) {
    return toCurie(uri);
  }

  return createCurie(match.scheme, decodeUri(uri.slice(match.stem.length)));
}

/**
 * Alias of {@link compactUri}
 */
export const curieFromUri = compactUri;

/**
 * Expand a CURIE into an absolute URI
 *
 * An unknown scheme is not an error: the CURIE text is returned as is,
 * which covers CURIEs that already hold an absolute URI.
 *
 * @example
 * ```ts
 * const ns = { wiki: "http://en.wikipedia.org/wiki/" };
 * curieToUri(ns, createCurie("wiki", "CURIE")) // => "http://en.wikipedia.org/wiki/CURIE"
 * curieToUri(ns, createCurie("x", "y"))        // => "x:y"
 * ```
 */
export function curieToUri(namespaces: Namespaces, curie: Curie): string {
  if (isEmptyCurie(curie)) {
    return "";
  }

  const stem = lookupNamespace(namespaces, curieScheme(curie));
  if (stem === undefined) {
    return curie;
  }

  return stem + curieReference(curie);
}

/**
 * Expand a CURIE and parse the result with the WHATWG URL parser
 *
 * @returns The URL, or the parser's error (relative and empty results
 *   are rejected by the parser)
 */
export function curieToUrl(namespaces: Namespaces, curie: Curie): Result<URL, CurieUrlError> {
  const uri = curieToUri(namespaces, curie);
  try {
    return { ok: true, value: new URL(uri) };
  } catch (err) {
    return {
      ok: false,
      error: {
        code: "invalid_url",
        message: err instanceof Error ? err.message : String(err),
        cause: err,
      },
    };
  }
}
