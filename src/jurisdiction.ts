import { UnrecognizedCodeError } from "./errors";
import { Alpha2Code, Alpha3Code, AlphaCode } from "./domain/alpha-code";
import { isAlpha2, isAlpha3 } from "./domain/alpha-codec";
import { getClassificationRegistry } from "./domain/classification-registry";
import { Definition } from "./domain/definition";
import {
  IntermediateRegionClass,
  RegionClass,
  SubRegionClass,
} from "./domain/region";

/**
 * A country or area of the world.
 *
 * The handle holds nothing but a reference to the shared, frozen
 * definition; every accessor is a field read. Two handles are equal when
 * their numeric country codes are, however they were obtained.
 */
export class Jurisdiction {
  private constructor(private readonly definition: Definition) {}

  static from(code: AlphaCode): Jurisdiction {
    return new Jurisdiction(getClassificationRegistry().resolveAlpha(code));
  }

  static fromAlpha2(code: Alpha2Code): Jurisdiction {
    return Jurisdiction.from(code);
  }

  static fromAlpha3(code: Alpha3Code): Jurisdiction {
    return Jurisdiction.from(code);
  }

  /**
   * Numbers are not a closed set, so unlike the alpha constructors this
   * one can fail.
   */
  static fromCountryCode(countryCode: number): Jurisdiction {
    const registry = getClassificationRegistry();
    if (!registry.has(countryCode)) {
      throw new UnrecognizedCodeError(String(countryCode), "ISO 3166 numeric country code");
    }
    return new Jurisdiction(registry.lookup(countryCode));
  }

  /**
   * Parses an alpha-2 code, then an alpha-3 code. Matching is exact:
   * "no" and " NO" are rejected.
   */
  static parse(text: string): Jurisdiction {
    const jurisdiction = Jurisdiction.tryParse(text);
    if (!jurisdiction) {
      throw new UnrecognizedCodeError(text);
    }
    return jurisdiction;
  }

  static tryParse(text: string): Jurisdiction | null {
    if (isAlpha2(text)) return Jurisdiction.from(text);
    if (isAlpha3(text)) return Jurisdiction.from(text);
    return null;
  }

  static all(): Jurisdiction[] {
    return getClassificationRegistry()
      .definitions()
      .map((def) => new Jurisdiction(def));
  }

  static inRegion(region: RegionClass): Jurisdiction[] {
    return getClassificationRegistry()
      .inRegion(region)
      .map((def) => new Jurisdiction(def));
  }

  static inSubRegion(subRegion: SubRegionClass): Jurisdiction[] {
    return getClassificationRegistry()
      .inSubRegion(subRegion)
      .map((def) => new Jurisdiction(def));
  }

  static inIntermediateRegion(intermediateRegion: IntermediateRegionClass): Jurisdiction[] {
    return getClassificationRegistry()
      .inIntermediateRegion(intermediateRegion)
      .map((def) => new Jurisdiction(def));
  }

  /** English short name. */
  get name(): string {
    return this.definition.name;
  }

  /** ISO 3166-1 numeric code. */
  get countryCode(): number {
    return this.definition.countryCode;
  }

  get alpha2(): Alpha2Code {
    return this.definition.alpha2;
  }

  get alpha3(): Alpha3Code {
    return this.definition.alpha3;
  }

  get region(): RegionClass {
    return this.definition.region;
  }

  get subRegion(): SubRegionClass {
    return this.definition.subRegion;
  }

  /** Most jurisdictions have none and report `Undefined`. */
  get intermediateRegion(): IntermediateRegionClass {
    return this.definition.intermediateRegion;
  }

  /** M49 numeric code of the region, `0` when there is none. */
  get regionCode(): number {
    return this.definition.regionCode;
  }

  get subRegionCode(): number {
    return this.definition.subRegionCode;
  }

  get intermediateRegionCode(): number | null {
    return this.definition.intermediateRegionCode;
  }

  equals(other: Jurisdiction | AlphaCode): boolean {
    if (other instanceof Jurisdiction) {
      return this.definition.countryCode === other.definition.countryCode;
    }
    return this.definition.alpha2 === other || this.definition.alpha3 === other;
  }

  toString(): string {
    return this.definition.alpha2;
  }

  toJSON(): string {
    return this.definition.alpha2;
  }
}
