import { z } from "zod";
import bundledDataset from "../../data/country-region.json";
import { DatasetCompileError } from "../errors";
import { JurisdictionRecord } from "../types/feed";

// Numeric columns show up as strings ("004") in the dataset, but a feed
// emitting plain numbers is decoded the same way.
const NumericText = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((v) => String(v).trim());

const OptionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const RawRecordSchema = z.object({
  name: z.string().min(1, "name must not be empty"),
  "alpha-2": z.string(),
  "alpha-3": z.string(),
  "country-code": NumericText,
  "iso_3166-2": OptionalText,
  region: OptionalText,
  "sub-region": OptionalText,
  "intermediate-region": OptionalText,
  "region-code": NumericText.nullish().transform((v) => v ?? ""),
  "sub-region-code": NumericText.nullish().transform((v) => v ?? ""),
  "intermediate-region-code": NumericText.nullish().transform((v) => v ?? ""),
});

const RecordFeedSchema = z.array(RawRecordSchema);

/**
 * Decodes a raw feed into records, in feed order. Structural problems are
 * fatal and reported all at once.
 */
export function decodeRecordFeed(raw: unknown): JurisdictionRecord[] {
  const result = RecordFeedSchema.safeParse(raw);
  if (!result.success) {
    throw new DatasetCompileError(
      result.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }

  return result.data.map((r) => ({
    name: r.name,
    alpha2: r["alpha-2"],
    alpha3: r["alpha-3"],
    countryCode: r["country-code"],
    subdivisionPrefix: r["iso_3166-2"],
    region: r.region,
    subRegion: r["sub-region"],
    intermediateRegion: r["intermediate-region"],
    regionCode: r["region-code"],
    subRegionCode: r["sub-region-code"],
    intermediateRegionCode: r["intermediate-region-code"],
  }));
}

export function loadBundledFeed(): JurisdictionRecord[] {
  return decodeRecordFeed(bundledDataset);
}
