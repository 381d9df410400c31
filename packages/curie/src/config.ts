/**
 * Namespace configuration
 *
 * Prefix tables are application constants, usually kept next to the
 * code as YAML (JSON documents are accepted too):
 *
 * ```yaml
 * prefixes:
 *   wiki: http://en.wikipedia.org/wiki/
 *   schema: https://schema.org/
 * ```
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SCHEME_REGEX } from "./constants.ts";
import { compareCodePoints } from "./order.ts";
import type { Namespaces, NamespaceConfigError, Result } from "./types.ts";

export const NamespaceConfigSchema = z.object({
  prefixes: z.record(
    z.string().regex(SCHEME_REGEX, "Scheme must not contain ':', '/' or whitespace"),
    z.string().min(1, "Namespace stem must not be empty")
  ),
});
export type NamespaceConfig = z.infer<typeof NamespaceConfigSchema>;

/**
 * Layer namespace tables; later tables override earlier ones
 */
export function mergeNamespaces(...tables: Namespaces[]): Namespaces {
  const merged: Record<string, string> = {};
  for (const table of tables) {
    for (const [scheme, stem] of Object.entries(table)) {
      merged[scheme] = stem;
    }
  }
  return merged;
}

/**
 * Warn about schemes sharing a stem: compacting a URI under that stem
 * picks the scheme that sorts first.
 */
function warnSharedStems(namespaces: Namespaces): void {
  const byStem = new Map<string, string[]>();
  for (const [scheme, stem] of Object.entries(namespaces)) {
    byStem.set(stem, [...(byStem.get(stem) ?? []), scheme]);
  }

  for (const [stem, schemes] of byStem) {
    if (schemes.length > 1) {
      console.warn(
        `[NamespaceConfig] Schemes ${schemes.sort(compareCodePoints).join(", ")} share stem ${stem}; compacting uses "${schemes[0]}"`
      );
    }
  }
}

/**
 * Parse a namespace configuration document
 *
 * @param text - YAML or JSON text
 * @returns Namespace table or error
 */
export function parseNamespaceConfig(text: string): Result<Namespaces, NamespaceConfigError> {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    return {
      ok: false,
      error: {
        code: "invalid_yaml",
        message: err instanceof Error ? err.message : String(err),
      },
    };
  }

  const parsed = NamespaceConfigSchema.safeParse(document);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        code: "invalid_config",
        message: parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; "),
      },
    };
  }

  warnSharedStems(parsed.data.prefixes);
  return { ok: true, value: parsed.data.prefixes };
}

/**
 * Parse a namespace configuration document, throwing on error
 *
 * @throws Error if the document is not valid YAML or not a prefix table
 */
export function parseNamespaceConfigOrThrow(text: string): Namespaces {
  const result = parseNamespaceConfig(text);
  if (!result.ok) {
    throw new Error(`Failed to parse namespace config: ${result.error.message}`);
  }
  return result.value;
}
