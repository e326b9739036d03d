import { ClassificationInvariantError, UnrecognizedCodeError } from "../errors";
import { Alpha2Code, Alpha3Code } from "./alpha-code";
import { getClassificationRegistry } from "./classification-registry";

// Exact match only: no trimming, no case folding.

export function isAlpha2(text: string): text is Alpha2Code {
  return getClassificationRegistry().compiled.alpha2ToCountryCode.has(text);
}

export function isAlpha3(text: string): text is Alpha3Code {
  return getClassificationRegistry().compiled.alpha3ToCountryCode.has(text);
}

export function parseAlpha2(text: string): Alpha2Code {
  if (isAlpha2(text)) return text;
  throw new UnrecognizedCodeError(text, "ISO 3166 alpha-2 code");
}

export function parseAlpha3(text: string): Alpha3Code {
  if (isAlpha3(text)) return text;
  throw new UnrecognizedCodeError(text, "ISO 3166 alpha-3 code");
}

export function formatAlpha2(code: Alpha2Code): string {
  return code;
}

export function formatAlpha3(code: Alpha3Code): string {
  return code;
}

export function alpha2Codes(): readonly Alpha2Code[] {
  return getClassificationRegistry().compiled.alpha2;
}

export function alpha3Codes(): readonly Alpha3Code[] {
  return getClassificationRegistry().compiled.alpha3;
}

function ordinalOf(ordinals: ReadonlyMap<string, number>, code: string): number {
  const ordinal = ordinals.get(code);
  if (ordinal === undefined) {
    throw new ClassificationInvariantError(`alpha code ${code} has no ordinal`);
  }
  return ordinal;
}

/** Position of the code in the compiled enumeration, in `[0, 255]`. */
export function alpha2Ordinal(code: Alpha2Code): number {
  return ordinalOf(getClassificationRegistry().compiled.alpha2Ordinals, code);
}

export function alpha3Ordinal(code: Alpha3Code): number {
  return ordinalOf(getClassificationRegistry().compiled.alpha3Ordinals, code);
}
