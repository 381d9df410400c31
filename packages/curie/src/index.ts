/**
 * @curie-kit/curie
 *
 * Compact URI (CURIE) type, its algebra, and conversion to and from
 * absolute URIs.
 *
 * CURIE format: [ [ scheme ] ':' ] reference
 * Safe CURIE format: '[' curie ']'
 *
 * @see https://www.w3.org/TR/2010/NOTE-curie-20101216/
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

export type {
  Curie,
  CurieParseError,
  CurieUrlError,
  Identifiable,
  NamespaceConfigError,
  Namespaces,
  Result,
} from "./types.ts";
export { CurieSchema } from "./types.ts";

// ============================================================================
// Constants
// ============================================================================

export {
  EMPTY_CURIE,
  RESERVED_OCTETS,
  SCHEME_REGEX,
  SCHEME_SEPARATOR,
  SEGMENT_SEPARATOR,
} from "./constants.ts";

// ============================================================================
// Construction & Decomposition
// ============================================================================

export {
  createCurie,
  curieBase,
  curieHead,
  curiePath,
  curieReference,
  curieScheme,
  curieTail,
  cutCurie,
  heirCurie,
  isEmptyCurie,
  joinCurie,
  splitCurie,
  toCurie,
  withScheme,
} from "./curie.ts";

// ============================================================================
// Equality & Ordering
// ============================================================================

export {
  compareCodePoints,
  compareCuries,
  curieEquals,
  curieLessThan,
  curieRank,
  curieSegments,
} from "./order.ts";

// ============================================================================
// Text Forms
// ============================================================================

export {
  decodeSafeCurie,
  encodeSafeCurie,
  parseCurie,
  parseCurieOrThrow,
  SafeCurieSchema,
  toSafeCurie,
} from "./codec.ts";

// ============================================================================
// URI Resolution
// ============================================================================

export { decodeUri } from "./decode.ts";
export {
  compactUri,
  curieFromUri,
  curieToUri,
  curieToUrl,
  lookupNamespace,
} from "./namespaces.ts";

// ============================================================================
// Configuration
// ============================================================================

export type { NamespaceConfig } from "./config.ts";
export {
  mergeNamespaces,
  NamespaceConfigSchema,
  parseNamespaceConfig,
  parseNamespaceConfigOrThrow,
} from "./config.ts";

// ============================================================================
// Identity
// ============================================================================

export { identityOf, sameIdentity } from "./identity.ts";
