/**
 * URN text codec
 *
 * A URN field is either empty or a string that starts with "urn:" and
 * carries a namespace identifier after it.
 */

import { URN_PREFIX, type Urn, type UrnResult, UrnSchema } from "./types.ts";

function isUrnText(value: string): boolean {
  return value === "" || (value.length > URN_PREFIX.length && value.startsWith(URN_PREFIX));
}

/**
 * Zod schema for a JSON field holding a URN
 */
export const UrnJsonSchema = UrnSchema.refine(isUrnText, (value) => ({
  message: `Invalid URN: "${value}"`,
}));

/**
 * Parse URN text
 *
 * @example
 * ```ts
 * parseUrn("urn:isbn:123") // => { ok: true, value: "urn:isbn:123" }
 * parseUrn("isbn:123")     // => { ok: false, error: { code: "invalid_urn", ... } }
 * ```
 */
export function parseUrn(value: unknown): UrnResult<Urn> {
  const parsed = UrnJsonSchema.safeParse(value);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  return {
    ok: false,
    error: {
      code: typeof value === "string" ? "invalid_urn" : "invalid_type",
      message: parsed.error.issues[0]?.message ?? "Invalid URN",
    },
  };
}

/**
 * Parse URN text, throwing on error
 *
 * @throws Error if the text is not a URN
 */
export function parseUrnOrThrow(value: unknown): Urn {
  const result = parseUrn(value);
  if (!result.ok) {
    throw new Error(`Failed to parse URN: ${result.error.message}`);
  }
  return result.value;
}

/**
 * Check a URN before writing it to a JSON field
 */
export function encodeUrn(urn: Urn): UrnResult<string> {
  if (!isUrnText(urn)) {
    return {
      ok: false,
      error: { code: "invalid_urn", message: `Invalid URN: "${urn}"` },
    };
  }
  return { ok: true, value: urn };
}
