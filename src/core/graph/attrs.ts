// src/core/graph/attrs.ts
// System attribute names with reserved meaning

export const RHO = "ρ";
export const LAMBDA = "λ";
export const DELTA = "Δ";
export const PI = "π";
export const XI = "ξ";
export const BETA = "β";
export const EPSILON = "ε";
export const ALPHA = "α";

/** Root of the namespace, and its alias accepted in locators. */
export const PHI = "Φ";
export const Q = "Q";

export const ROOT = 0;

/** Ids and name lengths are stored as u32 and u16 in the binary form. */
export const MAX_VERTEX_ID = 0xffffffff;
export const MAX_ATTRIBUTE_BYTES = 0xffff;

export const SYSTEM_ATTRS: ReadonlySet<string> = new Set([RHO, LAMBDA, DELTA, PI, XI, BETA, EPSILON]);

/** `α0`, `α1`, ... */
export function alpha(n: number): string {
  return `${ALPHA}${n}`;
}

export function isAlpha(name: string): boolean {
  return /^α\d+$/.test(name);
}

const FORBIDDEN = /[\s.,()$;#'"]/;
const encoder = new TextEncoder();

/**
 * Names that can be written in the construction language and walked by
 * a locator: non-empty, no separators, and `α` only as `αN`.
 */
export function isValidAttribute(name: string): boolean {
  if (name.length === 0 || FORBIDDEN.test(name)) return false;
  if (encoder.encode(name).length > MAX_ATTRIBUTE_BYTES) return false;
  if (name.startsWith(ALPHA)) return isAlpha(name);
  return true;
}
