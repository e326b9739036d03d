import { logger } from "../logger";
import { DatasetCompileError } from "../errors";
import { JurisdictionRecord } from "../types/feed";
import {
  Alpha2Code,
  Alpha3Code,
  isWellFormedAlpha2,
  isWellFormedAlpha3,
  MAX_ALPHA_CODES,
} from "../domain/alpha-code";
import { Definition } from "../domain/definition";
import {
  HierarchyClassifier,
  INTERMEDIATE_REGIONS,
  IntermediateRegionClass,
  REGIONS,
  RegionClass,
  SUB_REGIONS,
  SubRegionClass,
  UNDEFINED,
} from "../domain/region";

const U16_MAX = 0xffff;
const COUNTRY_CODE_MIN = 1;
const COUNTRY_CODE_MAX = 999;

/** Class value → country codes carrying it, in feed order. */
export type ReverseIndex<C extends string> = ReadonlyMap<C, readonly number[]>;

/**
 * The dense tables the registry is built from. Every list is in feed
 * (first-seen) order so that two compilations of the same feed are identical.
 *
 * The object and its arrays are frozen. The maps are plain `Map`s typed
 * `ReadonlyMap`: nothing stops a caller that casts them from writing, so
 * treat them as read-only by contract.
 */
export interface CompiledClassification {
  readonly alpha2: readonly Alpha2Code[];
  readonly alpha3: readonly Alpha3Code[];
  readonly alpha2Ordinals: ReadonlyMap<string, number>;
  readonly alpha3Ordinals: ReadonlyMap<string, number>;
  readonly alpha2ToCountryCode: ReadonlyMap<string, number>;
  readonly alpha3ToCountryCode: ReadonlyMap<string, number>;
  readonly regions: readonly RegionClass[];
  readonly subRegions: readonly SubRegionClass[];
  readonly intermediateRegions: readonly IntermediateRegionClass[];
  readonly definitions: readonly Definition[];
  readonly byRegion: ReverseIndex<RegionClass>;
  readonly bySubRegion: ReverseIndex<SubRegionClass>;
  readonly byIntermediateRegion: ReverseIndex<IntermediateRegionClass>;
}

function parseU16(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const value = Number(text);
  return value <= U16_MAX ? value : null;
}

class ReverseIndexBuilder<C extends string> {
  private readonly buckets = new Map<C, number[]>();

  add(value: C, countryCode: number): void {
    const bucket = this.buckets.get(value);
    if (bucket) {
      bucket.push(countryCode);
    } else {
      this.buckets.set(value, [countryCode]);
    }
  }

  // Undefined always gets a bucket, even when nothing lands in it.
  build(undefinedClass: C): { classes: C[]; index: ReverseIndex<C> } {
    if (!this.buckets.has(undefinedClass)) {
      this.buckets.set(undefinedClass, []);
    }
    const index = new Map<C, readonly number[]>();
    for (const [value, codes] of this.buckets) {
      index.set(value, Object.freeze([...codes]));
    }
    return { classes: [...index.keys()], index };
  }
}

// Brands a code the compiler has accepted into the closed set. Nothing else
// mints these types.
function acceptAlpha2(text: string): Alpha2Code {
  return text as Alpha2Code;
}

function acceptAlpha3(text: string): Alpha3Code {
  return text as Alpha3Code;
}

class RecordCompiler {
  readonly issues: string[] = [];
  readonly definitions: Definition[] = [];
  readonly alpha2ToCountryCode = new Map<string, number>();
  readonly alpha3ToCountryCode = new Map<string, number>();
  readonly alpha2: Alpha2Code[] = [];
  readonly alpha3: Alpha3Code[] = [];
  readonly regions = new ReverseIndexBuilder<RegionClass>();
  readonly subRegions = new ReverseIndexBuilder<SubRegionClass>();
  readonly intermediateRegions = new ReverseIndexBuilder<IntermediateRegionClass>();
  // Codes claimed by every record seen so far, valid or not, so that a
  // later duplicate is reported even when the first record was rejected.
  private readonly countryCodeOwners = new Map<number, string>();
  private readonly alpha2Owners = new Map<string, string>();
  private readonly alpha3Owners = new Map<string, string>();

  compile(record: JurisdictionRecord, index: number): void {
    const where = `record ${index} (${record.name || "<unnamed>"})`;
    const issueCount = this.issues.length;

    if (record.name.trim() === "") {
      this.issues.push(`${where}: name must not be empty`);
    }

    const countryCode = this.countryCode(record.countryCode, record.name, where);
    const alpha2 = this.alpha2Code(record.alpha2, record.name, where);
    const alpha3 = this.alpha3Code(record.alpha3, record.name, where);

    const region = this.classify(REGIONS, record.region, where);
    const subRegion = this.classify(SUB_REGIONS, record.subRegion, where);
    const intermediateRegion = this.classify(
      INTERMEDIATE_REGIONS,
      record.intermediateRegion,
      where
    );

    const regionCode = this.hierarchyCode(record.regionCode, "region-code", where);
    const subRegionCode = this.hierarchyCode(record.subRegionCode, "sub-region-code", where);
    const intermediateRegionCode = this.hierarchyCode(
      record.intermediateRegionCode,
      "intermediate-region-code",
      where
    );

    if (
      this.issues.length > issueCount ||
      countryCode === null ||
      alpha2 === null ||
      alpha3 === null
    ) {
      return;
    }

    this.alpha2.push(alpha2);
    this.alpha3.push(alpha3);
    this.alpha2ToCountryCode.set(alpha2, countryCode);
    this.alpha3ToCountryCode.set(alpha3, countryCode);
    this.regions.add(region, countryCode);
    this.subRegions.add(subRegion, countryCode);
    this.intermediateRegions.add(intermediateRegion, countryCode);

    this.definitions.push(
      Object.freeze({
        countryCode,
        name: record.name,
        alpha2,
        alpha3,
        region,
        subRegion,
        intermediateRegion,
        regionCode: regionCode ?? 0,
        subRegionCode: subRegionCode ?? 0,
        intermediateRegionCode,
      })
    );
  }

  private countryCode(text: string, name: string, where: string): number | null {
    const value = parseU16(text.trim());
    if (value === null || value < COUNTRY_CODE_MIN || value > COUNTRY_CODE_MAX) {
      this.issues.push(
        `${where}: country-code "${text}" is not a number in [${COUNTRY_CODE_MIN}, ${COUNTRY_CODE_MAX}]`
      );
      return null;
    }
    const existing = this.countryCodeOwners.get(value);
    if (existing !== undefined) {
      this.issues.push(`${where}: duplicate country-code ${value} (already used by ${existing})`);
      return null;
    }
    this.countryCodeOwners.set(value, name);
    return value;
  }

  private alpha2Code(text: string, name: string, where: string): Alpha2Code | null {
    if (!isWellFormedAlpha2(text)) {
      this.issues.push(`${where}: alpha-2 "${text}" is not two uppercase letters`);
      return null;
    }
    if (this.alpha2Owners.has(text)) {
      this.issues.push(`${where}: duplicate alpha-2 ${text}`);
      return null;
    }
    this.alpha2Owners.set(text, name);
    return acceptAlpha2(text);
  }

  private alpha3Code(text: string, name: string, where: string): Alpha3Code | null {
    if (!isWellFormedAlpha3(text)) {
      this.issues.push(`${where}: alpha-3 "${text}" is not three uppercase letters`);
      return null;
    }
    if (this.alpha3Owners.has(text)) {
      this.issues.push(`${where}: duplicate alpha-3 ${text}`);
      return null;
    }
    this.alpha3Owners.set(text, name);
    return acceptAlpha3(text);
  }

  private classify<C extends string>(
    classifier: HierarchyClassifier<C>,
    label: string,
    where: string
  ): C | typeof UNDEFINED {
    const value = classifier.classify(label);
    if (value === null) {
      logger.warn(
        { tag: "Compiler", level: classifier.level, label, where },
        "Unrecognized hierarchy label, classified as Undefined"
      );
      return UNDEFINED;
    }
    return value;
  }

  // Empty and "0" both mean "not assigned"; anything else must be a u16.
  private hierarchyCode(text: string, field: string, where: string): number | null {
    const trimmed = text.trim();
    if (trimmed === "") return null;
    const value = parseU16(trimmed);
    if (value === null) {
      this.issues.push(`${where}: ${field} "${text}" is not an unsigned 16-bit integer`);
      return null;
    }
    return value === 0 ? null : value;
  }
}

function ordinals(codes: readonly string[]): Map<string, number> {
  return new Map(codes.map((code, i) => [code, i]));
}

/**
 * Compiles the ordered record feed into the classification tables.
 * Throws `DatasetCompileError` listing every problem found; there is no
 * partial result.
 */
export function compileClassification(
  records: readonly JurisdictionRecord[]
): CompiledClassification {
  const compiler = new RecordCompiler();

  if (records.length === 0) {
    compiler.issues.push("record feed is empty");
  }
  records.forEach((record, index) => compiler.compile(record, index));

  if (compiler.alpha2.length > MAX_ALPHA_CODES) {
    compiler.issues.push(`${compiler.alpha2.length} alpha-2 codes exceed ${MAX_ALPHA_CODES}`);
  }
  if (compiler.alpha3.length > MAX_ALPHA_CODES) {
    compiler.issues.push(`${compiler.alpha3.length} alpha-3 codes exceed ${MAX_ALPHA_CODES}`);
  }

  if (compiler.issues.length > 0) {
    logger.error(
      { tag: "Compiler", issueCount: compiler.issues.length },
      "Classification dataset rejected"
    );
    throw new DatasetCompileError(compiler.issues);
  }

  const regions = compiler.regions.build(UNDEFINED);
  const subRegions = compiler.subRegions.build(UNDEFINED);
  const intermediateRegions = compiler.intermediateRegions.build(UNDEFINED);

  logger.debug(
    {
      tag: "Compiler",
      definitions: compiler.definitions.length,
      regions: regions.classes.length,
      subRegions: subRegions.classes.length,
      intermediateRegions: intermediateRegions.classes.length,
    },
    "Classification compiled"
  );

  return Object.freeze({
    alpha2: Object.freeze(compiler.alpha2),
    alpha3: Object.freeze(compiler.alpha3),
    alpha2Ordinals: ordinals(compiler.alpha2),
    alpha3Ordinals: ordinals(compiler.alpha3),
    alpha2ToCountryCode: compiler.alpha2ToCountryCode,
    alpha3ToCountryCode: compiler.alpha3ToCountryCode,
    regions: Object.freeze(regions.classes),
    subRegions: Object.freeze(subRegions.classes),
    intermediateRegions: Object.freeze(intermediateRegions.classes),
    definitions: Object.freeze(compiler.definitions),
    byRegion: regions.index,
    bySubRegion: subRegions.index,
    byIntermediateRegion: intermediateRegions.index,
  });
}
