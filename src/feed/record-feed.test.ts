import { describe, it, expect } from "vitest";
import { decodeRecordFeed, loadBundledFeed } from "./record-feed";
import { DatasetCompileError } from "../errors";

const rawNorway = {
  name: "Norway",
  "alpha-2": "NO",
  "alpha-3": "NOR",
  "country-code": "578",
  "iso_3166-2": "ISO 3166-2:NO",
  region: "Europe",
  "sub-region": "Northern Europe",
  "intermediate-region": "",
  "region-code": "150",
  "sub-region-code": "154",
  "intermediate-region-code": "",
};

function decodeError(raw: unknown): DatasetCompileError {
  try {
    decodeRecordFeed(raw);
  } catch (err) {
    if (err instanceof DatasetCompileError) return err;
    throw err;
  }
  throw new Error("expected DatasetCompileError");
}

describe("decodeRecordFeed", () => {
  it("maps dataset columns onto record fields", () => {
    expect(decodeRecordFeed([rawNorway])).toEqual([
      {
        name: "Norway",
        alpha2: "NO",
        alpha3: "NOR",
        countryCode: "578",
        subdivisionPrefix: "ISO 3166-2:NO",
        region: "Europe",
        subRegion: "Northern Europe",
        intermediateRegion: "",
        regionCode: "150",
        subRegionCode: "154",
        intermediateRegionCode: "",
      },
    ]);
  });

  it("accepts numeric columns given as numbers", () => {
    const [record] = decodeRecordFeed([
      { ...rawNorway, "country-code": 578, "region-code": 150, "intermediate-region-code": null },
    ]);
    expect(record.countryCode).toBe("578");
    expect(record.regionCode).toBe("150");
    expect(record.intermediateRegionCode).toBe("");
  });

  it("defaults missing optional columns to empty", () => {
    const { "iso_3166-2": _prefix, region: _region, ...rest } = rawNorway;
    const [record] = decodeRecordFeed([rest]);
    expect(record.subdivisionPrefix).toBe("");
    expect(record.region).toBe("");
  });

  it("rejects a feed that is not an array", () => {
    expect(decodeError({ records: [] }).issues).toEqual(["Expected array, received object"]);
  });

  it("reports the path of a missing column", () => {
    const { "alpha-2": _alpha2, ...rest } = rawNorway;
    expect(decodeError([rest]).issues).toEqual(["0.alpha-2: Required"]);
  });

  it("rejects an empty name", () => {
    expect(decodeError([{ ...rawNorway, name: "" }]).issues).toEqual([
      "0.name: name must not be empty",
    ]);
  });
});

describe("loadBundledFeed", () => {
  it("decodes every bundled record in order", () => {
    const records = loadBundledFeed();
    expect(records).toHaveLength(249);
    expect(records[0].name).toBe("Afghanistan");
    expect(records[0].countryCode).toBe("004");
    expect(records[248].alpha3).toBe("ZWE");
  });
});
