/**
 * CURIE type definitions
 *
 * CURIE format: [ [ scheme ] ':' ] reference
 *
 * - "a:b/c"  - scheme "a", reference "b/c"
 * - "a:"     - namespace only
 * - "b/c"    - relative, no scheme
 * - ""       - empty (zero) CURIE
 */

import { z } from "zod";

/**
 * Compact URI. A plain string at runtime, nominal at compile time so that
 * arbitrary text cannot be passed where an identifier is expected.
 */
export const CurieSchema = z.string().brand<"Curie">();

export type Curie = z.infer<typeof CurieSchema>;

/**
 * Table of namespace prefixes: scheme → absolute URI stem
 */
export type Namespaces = Readonly<Record<string, string>>;

/**
 * Discriminated union for fallible operations.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * CURIE text decoding error
 */
export type CurieParseError = {
  code: "unbalanced_brackets" | "missing_brackets" | "invalid_type";
  message: string;
};

/**
 * Resolution of a CURIE to a URL failed in the URL parser
 */
export type CurieUrlError = {
  code: "invalid_url";
  /** Message of the URL parser, unchanged */
  message: string;
  /** Value thrown by the URL parser */
  cause: unknown;
};

/**
 * Namespace configuration error
 */
export type NamespaceConfigError = {
  code: "invalid_yaml" | "invalid_config";
  message: string;
};

/**
 * Anything that carries a CURIE identity
 */
export interface Identifiable {
  readonly id: Curie;
}
