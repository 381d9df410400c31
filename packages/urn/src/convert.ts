/**
 * Mapping between URN and CURIE
 *
 *   urn:isbn:1:2:3 ⟷ isbn:1/2/3
 */

import { type Curie, createCurie, SEGMENT_SEPARATOR, splitCurie } from "@curie-kit/curie";
import { URN_SEPARATOR, type Urn } from "./types.ts";
import { createUrn, splitUrn } from "./urn.ts";

/**
 * Convert a URN to a CURIE: NID becomes the scheme, NSS segments become
 * reference segments. Empty segments are dropped.
 */
export function urnToIri(urn: Urn): Curie {
  const [nid, nss] = splitUrn(urn);
  const reference = nss
    .split(URN_SEPARATOR)
    .filter((s) => s !== "")
    .join(SEGMENT_SEPARATOR);

  return createCurie(nid, reference);
}

/**
 * Convert a CURIE to a URN: the scheme becomes the NID, reference
 * segments become NSS segments.
 */
export function iriToUrn(curie: Curie): Urn {
  const [scheme, reference] = splitCurie(curie);
  return createUrn(scheme, reference.split(SEGMENT_SEPARATOR).join(URN_SEPARATOR));
}
