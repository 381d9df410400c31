/**
 * @curie-kit/urn
 *
 * URN identifier type (RFC 8141) with the same algebra as
 * `@curie-kit/curie`, and the mapping between the two.
 *
 * URN format: urn:{nid}[:segment...]
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

export type { Urn, UrnParseError, UrnResult } from "./types.ts";
export { URN_PREFIX, URN_SEPARATOR, UrnSchema } from "./types.ts";

// ============================================================================
// Construction & Decomposition
// ============================================================================

export {
  createUrn,
  cutUrn,
  EMPTY_URN,
  joinUrn,
  splitUrn,
  urnBase,
  urnHead,
  urnNid,
  urnNss,
  urnPath,
  urnTail,
} from "./urn.ts";

// ============================================================================
// Text Codec
// ============================================================================

export { encodeUrn, parseUrn, parseUrnOrThrow, UrnJsonSchema } from "./codec.ts";

// ============================================================================
// CURIE Mapping
// ============================================================================

export { iriToUrn, urnToIri } from "./convert.ts";
