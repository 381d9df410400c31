/**
 * URN construction and decomposition
 *
 *   urn:isbn:b:c:d
 *       │    └─┬─┘
 *       │     NSS, segments "b", "c", "d"
 *       NID
 */

import { cutReference, joinReference } from "@curie-kit/reference";
import { URN_PREFIX, URN_SEPARATOR, type Urn, UrnSchema } from "./types.ts";

/**
 * The empty URN
 */
export const EMPTY_URN: Urn = UrnSchema.parse("");

/**
 * Create a URN from namespace identifier and namespace-specific string
 *
 * @example
 * ```ts
 * createUrn("isbn", "123")   // => "urn:isbn:123"
 * createUrn("isbn", "1:2:3") // => "urn:isbn:1:2:3"
 * createUrn("isbn", "")      // => "urn:isbn"
 * ```
 */
export function createUrn(nid: string, nss: string): Urn {
  const urn = `${URN_PREFIX}${nid}`;
  return UrnSchema.parse(nss === "" ? urn : `${urn}${URN_SEPARATOR}${nss}`);
}

/**
 * Split a URN into NID and NSS
 *
 * @example
 * ```ts
 * splitUrn("urn:isbn:1:2:3") // => ["isbn", "1:2:3"]
 * splitUrn("urn:isbn")       // => ["isbn", ""]
 * splitUrn("")               // => ["", ""]
 * ```
 */
export function splitUrn(urn: Urn): [nid: string, nss: string] {
  if (urn.length < URN_PREFIX.length) {
    return ["", ""];
  }

  const rest = urn.slice(URN_PREFIX.length);
  const at = rest.indexOf(URN_SEPARATOR);
  if (at === -1) {
    return [rest, ""];
  }

  return [rest.slice(0, at), rest.slice(at + 1)];
}

/**
 * Namespace identifier of a URN
 */
export function urnNid(urn: Urn): string {
  return splitUrn(urn)[0];
}

/**
 * Namespace-specific string of a URN
 */
export function urnNss(urn: Urn): string {
  return splitUrn(urn)[1];
}

/**
 * Last NSS segment
 *
 *   urn:isbn:b:c:d ⟼ d
 */
export function urnBase(urn: Urn): string {
  const nss = urnNss(urn);
  return nss.slice(nss.lastIndexOf(URN_SEPARATOR) + 1);
}

/**
 * Every NSS segment but the last
 *
 *   urn:isbn:b:c:d ⟼ urn:isbn:b:c
 */
export function urnPath(urn: Urn): Urn {
  const [nid, nss] = splitUrn(urn);
  if (nss === "") {
    return urn;
  }

  return createUrn(nid, cutReference(nss, URN_SEPARATOR, 1));
}

/**
 * First NSS segment
 *
 *   urn:isbn:b:c:d ⟼ b
 */
export function urnHead(urn: Urn): string {
  const nss = urnNss(urn);
  const at = nss.indexOf(URN_SEPARATOR);
  return at === -1 ? nss : nss.slice(0, at);
}

/**
 * Every NSS segment but the first
 *
 *   urn:isbn:b:c:d ⟼ urn:isbn:c:d
 */
export function urnTail(urn: Urn): Urn {
  const [nid, nss] = splitUrn(urn);
  if (nss === "") {
    return urn;
  }

  const at = nss.indexOf(URN_SEPARATOR);
  return createUrn(nid, at === -1 ? "" : nss.slice(at + 1));
}

/**
 * Append segments to the NSS, skipping empty ones
 *
 *   urn:isbn:a × [b, c] ⟼ urn:isbn:a:b:c
 */
export function joinUrn(urn: Urn, ...segments: string[]): Urn {
  if (segments.every((s) => s === "")) {
    return urn;
  }

  const [nid, nss] = splitUrn(urn);
  return createUrn(nid, joinReference(nss, URN_SEPARATOR, ...segments));
}

/**
 * Remove the last `n` NSS segments
 *
 * @param n - Segment count; zero or negative values return `urn`
 */
export function cutUrn(urn: Urn, n: number): Urn {
  if (n <= 0) {
    return urn;
  }

  const [nid, nss] = splitUrn(urn);
  return createUrn(nid, cutReference(nss, URN_SEPARATOR, n));
}
