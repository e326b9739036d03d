import { logger } from "../logger";
import { ClassificationInvariantError } from "../errors";
import {
  compileClassification,
  CompiledClassification,
  ReverseIndex,
} from "../compiler/classification-compiler";
import { loadBundledFeed } from "../feed/record-feed";
import { AlphaCode } from "./alpha-code";
import { Definition } from "./definition";
import { IntermediateRegionClass, RegionClass, SubRegionClass } from "./region";

export class ClassificationRegistry {
  private readonly byCountryCode = new Map<number, Definition>();

  constructor(readonly compiled: CompiledClassification) {
    for (const def of compiled.definitions) {
      if (this.byCountryCode.has(def.countryCode)) {
        throw new ClassificationInvariantError(
          `country code ${def.countryCode} is defined twice`
        );
      }
      this.byCountryCode.set(def.countryCode, def);
    }
  }

  get size(): number {
    return this.byCountryCode.size;
  }

  has(countryCode: number): boolean {
    return this.byCountryCode.has(countryCode);
  }

  /**
   * Every country code a caller can hold was produced by the compiler, so a
   * miss here means the tables are inconsistent.
   */
  lookup(countryCode: number): Definition {
    const def = this.byCountryCode.get(countryCode);
    if (!def) {
      throw new ClassificationInvariantError(
        `country code ${countryCode} is not in the classification registry`
      );
    }
    return def;
  }

  /** Alpha-2 and alpha-3 codes never collide, their lengths differ. */
  resolveAlpha(code: AlphaCode): Definition {
    const countryCode =
      this.compiled.alpha2ToCountryCode.get(code) ??
      this.compiled.alpha3ToCountryCode.get(code);
    if (countryCode === undefined) {
      throw new ClassificationInvariantError(`alpha code ${code} has no country code`);
    }
    return this.lookup(countryCode);
  }

  definitions(): readonly Definition[] {
    return this.compiled.definitions;
  }

  inRegion(region: RegionClass): Definition[] {
    return this.members(this.compiled.byRegion, region);
  }

  inSubRegion(subRegion: SubRegionClass): Definition[] {
    return this.members(this.compiled.bySubRegion, subRegion);
  }

  inIntermediateRegion(intermediateRegion: IntermediateRegionClass): Definition[] {
    return this.members(this.compiled.byIntermediateRegion, intermediateRegion);
  }

  // A class from the fixed list that no record carries has no bucket.
  private members<C extends string>(index: ReverseIndex<C>, value: C): Definition[] {
    return (index.get(value) ?? []).map((code) => this.lookup(code));
  }
}

let registry: ClassificationRegistry | null = null;

/**
 * The process-wide registry. The first call compiles the bundled feed;
 * the build is synchronous, so no caller ever sees a half-built registry.
 */
export function getClassificationRegistry(): ClassificationRegistry {
  if (registry) return registry;

  const built = new ClassificationRegistry(compileClassification(loadBundledFeed()));
  logger.debug(
    { tag: "Registry", definitions: built.size },
    "Classification registry materialized"
  );
  registry = built;
  return registry;
}
