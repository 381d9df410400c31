/**
 * CURIE text forms
 *
 * - bare: a:b/c
 * - safe: [a:b/c], used inside structured text such as JSON string
 *   fields. The empty CURIE is the empty string in both forms.
 *
 * JSON fields require the safe form for non-empty values.
 */

import { z } from "zod";
import { SAFE_CURIE_CLOSE, SAFE_CURIE_OPEN } from "./constants.ts";
import { createCurie, isEmptyCurie, splitCurie, toCurie } from "./curie.ts";
import type { Curie, CurieParseError, Result } from "./types.ts";

/**
 * Render the safe form of a CURIE
 *
 * @example
 * ```ts
 * toSafeCurie(createCurie("a", "b")) // => "[a:b]"
 * toSafeCurie(EMPTY_CURIE)           // => ""
 * ```
 */
export function toSafeCurie(curie: Curie): string {
  if (isEmptyCurie(curie)) {
    return "";
  }
  return `${SAFE_CURIE_OPEN}${curie}${SAFE_CURIE_CLOSE}`;
}

/**
 * Alias of {@link toSafeCurie} for JSON encoders
 */
export const encodeSafeCurie = toSafeCurie;

function normalize(text: string): Curie {
  const [scheme, reference] = splitCurie(toCurie(text));
  return createCurie(scheme, reference);
}

/**
 * Parse bare or safe CURIE text
 *
 * One pair of surrounding brackets is removed. A bracket on one side
 * only is an error. The result is normalized, so ":b" parses as "b".
 *
 * @example
 * ```ts
 * parseCurie("[a:b/c]") // => { ok: true, value: "a:b/c" }
 * parseCurie("a:b/c")   // => { ok: true, value: "a:b/c" }
 * parseCurie("[a:b/c")  // => { ok: false, error: { code: "unbalanced_brackets", ... } }
 * ```
 */
export function parseCurie(text: string): Result<Curie, CurieParseError> {
  const open = text.startsWith(SAFE_CURIE_OPEN);
  const close = text.length > (open ? 1 : 0) && text.endsWith(SAFE_CURIE_CLOSE);

  if (open !== close) {
    return {
      ok: false,
      error: {
        code: "unbalanced_brackets",
        message: `Unbalanced brackets in CURIE: "${text}"`,
      },
    };
  }

  return { ok: true, value: normalize(open ? text.slice(1, -1) : text) };
}

/**
 * Parse CURIE text, throwing on error
 *
 * @throws Error if the brackets are unbalanced
 */
export function parseCurieOrThrow(text: string): Curie {
  const result = parseCurie(text);
  if (!result.ok) {
    throw new Error(`Failed to parse CURIE: ${result.error.message}`);
  }
  return result.value;
}

/**
 * Zod schema for a JSON field holding a safe CURIE
 *
 * @example
 * ```ts
 * const PersonSchema = z.object({
 *   id: SafeCurieSchema,
 *   friends: z.array(SafeCurieSchema),
 * });
 * ```
 */
export const SafeCurieSchema = z.string().transform((value, ctx): Curie => {
  if (value === "") {
    return toCurie(value);
  }

  if (
    value.length < 2 ||
    !value.startsWith(SAFE_CURIE_OPEN) ||
    !value.endsWith(SAFE_CURIE_CLOSE)
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected safe CURIE "[scheme:reference]", got "${value}"`,
    });
    return z.NEVER;
  }

  return normalize(value.slice(1, -1));
});

/**
 * Decode a JSON value holding a safe CURIE
 */
export function decodeSafeCurie(value: unknown): Result<Curie, CurieParseError> {
  const parsed = SafeCurieSchema.safeParse(value);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  const issue = parsed.error.issues[0];
  return {
    ok: false,
    error: {
      code: typeof value === "string" ? "missing_brackets" : "invalid_type",
      message: issue?.message ?? "Invalid safe CURIE",
    },
  };
}
