/** One row of the record feed, fields kept as the feed spells them. */
export interface JurisdictionRecord {
  name: string;
  alpha2: string;
  alpha3: string;
  countryCode: string;
  /** ISO 3166-2 subdivision prefix, e.g. "ISO 3166-2:NO". Passed through. */
  subdivisionPrefix: string;
  region: string;
  subRegion: string;
  intermediateRegion: string;
  regionCode: string;
  subRegionCode: string;
  intermediateRegionCode: string;
}
