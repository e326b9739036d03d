declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Two letter ISO 3166-1 code, e.g. `NO`. */
export type Alpha2Code = Brand<string, "Alpha2Code">;

/** Three letter ISO 3166-1 code, e.g. `NOR`. */
export type Alpha3Code = Brand<string, "Alpha3Code">;

export type AlphaCode = Alpha2Code | Alpha3Code;

const ALPHA2_PATTERN = /^[A-Z]{2}$/;
const ALPHA3_PATTERN = /^[A-Z]{3}$/;

// Shape only. Membership of the closed set is decided by the compiler.
export function isWellFormedAlpha2(text: string): boolean {
  return ALPHA2_PATTERN.test(text);
}

export function isWellFormedAlpha3(text: string): boolean {
  return ALPHA3_PATTERN.test(text);
}

/** Ordinals are stored in a single byte. */
export const MAX_ALPHA_CODES = 256;
