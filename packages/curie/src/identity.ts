/**
 * Identity capability
 *
 * Domain values expose their CURIE through {@link Identifiable}
 * instead of embedding an identifier type:
 *
 * ```ts
 * type Person = Identifiable & { name: string; friends: Curie[] };
 * ```
 */

import type { Curie, Identifiable } from "./types.ts";

/**
 * CURIE identity of a thing
 */
export function identityOf(thing: Identifiable): Curie {
  return thing.id;
}

/**
 * Check whether two things share the same non-empty identity
 */
export function sameIdentity(a: Identifiable, b: Identifiable): boolean {
  return a.id !== "" && a.id === b.id;
}
