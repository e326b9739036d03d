import { Alpha2Code, Alpha3Code } from "./alpha-code";
import { IntermediateRegionClass, RegionClass, SubRegionClass } from "./region";

/**
 * Everything known about one jurisdiction. Only the compiler creates these;
 * they are frozen and shared by every handle that refers to them.
 */
export interface Definition {
  readonly countryCode: number;
  readonly name: string;
  readonly alpha2: Alpha2Code;
  readonly alpha3: Alpha3Code;
  readonly region: RegionClass;
  readonly subRegion: SubRegionClass;
  readonly intermediateRegion: IntermediateRegionClass;
  /** `0` when the jurisdiction has no region. */
  readonly regionCode: number;
  /** `0` when the jurisdiction has no sub-region. */
  readonly subRegionCode: number;
  readonly intermediateRegionCode: number | null;
}
