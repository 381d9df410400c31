/**
 * @curie-kit/reference
 *
 * Join and cut helpers for delimiter-separated references, shared by the
 * CURIE ("/") and URN (":") identifier types.
 *
 * @packageDocumentation
 */

export { cutReference, joinReference } from "./reference.ts";
