/**
 * URN type definitions (RFC 8141)
 *
 *   namestring = "urn" ":" NID ":" NSS
 *
 * NSS segments are separated by ':'.
 */

import { z } from "zod";

/**
 * URN prefix
 */
export const URN_PREFIX = "urn:";

/**
 * Separator between NID and NSS, and between NSS segments
 */
export const URN_SEPARATOR = ":";

/**
 * A URN. A plain string at runtime, nominal at compile time.
 */
export const UrnSchema = z.string().brand<"Urn">();

export type Urn = z.infer<typeof UrnSchema>;

/**
 * URN decoding error
 */
export type UrnParseError = {
  code: "invalid_urn" | "invalid_type";
  message: string;
};

/**
 * Discriminated union for fallible operations.
 */
export type UrnResult<T> = { ok: true; value: T } | { ok: false; error: UrnParseError };
