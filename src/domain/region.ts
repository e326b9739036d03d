// UN M49 standard country or area codes for statistical use.
// https://unstats.un.org/unsd/methodology/m49/overview

export const UNDEFINED = "Undefined";

export const REGION_CLASSES = [
  { class: "Africa", label: "Africa" },
  { class: "Americas", label: "Americas" },
  { class: "Asia", label: "Asia" },
  { class: "Europe", label: "Europe" },
  { class: "Oceania", label: "Oceania" },
] as const;

export const SUB_REGION_CLASSES = [
  // Africa
  { class: "NorthernAfrica", label: "Northern Africa" },
  { class: "SubSaharanAfrica", label: "Sub-Saharan Africa" },
  // Americas
  { class: "LatinAmericaAndTheCaribbean", label: "Latin America and the Caribbean" },
  { class: "NorthernAmerica", label: "Northern America" },
  // Asia
  { class: "CentralAsia", label: "Central Asia" },
  { class: "EasternAsia", label: "Eastern Asia" },
  { class: "SouthEasternAsia", label: "South-eastern Asia" },
  { class: "SouthernAsia", label: "Southern Asia" },
  { class: "WesternAsia", label: "Western Asia" },
  // Europe
  { class: "EasternEurope", label: "Eastern Europe" },
  { class: "NorthernEurope", label: "Northern Europe" },
  { class: "SouthernEurope", label: "Southern Europe" },
  { class: "WesternEurope", label: "Western Europe" },
  // Oceania
  { class: "AustraliaAndNewZealand", label: "Australia and New Zealand" },
  { class: "Melanesia", label: "Melanesia" },
  { class: "Micronesia", label: "Micronesia" },
  { class: "Polynesia", label: "Polynesia" },
] as const;

export const INTERMEDIATE_REGION_CLASSES = [
  // Africa
  { class: "EasternAfrica", label: "Eastern Africa" },
  { class: "MiddleAfrica", label: "Middle Africa" },
  { class: "SouthernAfrica", label: "Southern Africa" },
  { class: "WesternAfrica", label: "Western Africa" },
  // Americas
  { class: "Caribbean", label: "Caribbean" },
  { class: "CentralAmerica", label: "Central America" },
  { class: "SouthAmerica", label: "South America" },
  // Europe
  { class: "ChannelIslands", label: "Channel Islands" },
] as const;

export type RegionClass = (typeof REGION_CLASSES)[number]["class"] | typeof UNDEFINED;
export type SubRegionClass = (typeof SUB_REGION_CLASSES)[number]["class"] | typeof UNDEFINED;
export type IntermediateRegionClass =
  | (typeof INTERMEDIATE_REGION_CLASSES)[number]["class"]
  | typeof UNDEFINED;

export type HierarchyLevel = "region" | "subRegion" | "intermediateRegion";

/**
 * Resolves dataset labels ("Northern Europe") to their class, and classes
 * back to their labels. Anything not in the fixed list resolves to
 * `Undefined`.
 */
export class HierarchyClassifier<C extends string> {
  private readonly byLabel: Map<string, C>;
  private readonly labels: Map<C | typeof UNDEFINED, string>;

  constructor(
    readonly level: HierarchyLevel,
    entries: ReadonlyArray<{ readonly class: C; readonly label: string }>
  ) {
    this.byLabel = new Map(entries.map((e) => [e.label, e.class]));
    this.labels = new Map<C | typeof UNDEFINED, string>(
      entries.map((e) => [e.class, e.label])
    );
    this.labels.set(UNDEFINED, "");
  }

  /** Returns `null` when the label is present but not recognized. */
  classify(label: string): C | typeof UNDEFINED | null {
    if (label.trim() === "") return UNDEFINED;
    return this.byLabel.get(label) ?? null;
  }

  label(value: C | typeof UNDEFINED): string {
    return this.labels.get(value) ?? "";
  }

  classes(): Array<C | typeof UNDEFINED> {
    return [...this.labels.keys()];
  }
}

export const REGIONS = new HierarchyClassifier("region", REGION_CLASSES);
export const SUB_REGIONS = new HierarchyClassifier("subRegion", SUB_REGION_CLASSES);
export const INTERMEDIATE_REGIONS = new HierarchyClassifier(
  "intermediateRegion",
  INTERMEDIATE_REGION_CLASSES
);
