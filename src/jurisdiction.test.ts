import { describe, it, expect } from "vitest";
import { Jurisdiction } from "./jurisdiction";
import { UnrecognizedCodeError } from "./errors";
import { alpha2Codes, alpha3Codes, parseAlpha2, parseAlpha3 } from "./domain/alpha-codec";
import { INTERMEDIATE_REGIONS, REGIONS, SUB_REGIONS } from "./domain/region";

function parseError(text: string): UnrecognizedCodeError {
  try {
    Jurisdiction.parse(text);
  } catch (err) {
    if (err instanceof UnrecognizedCodeError) return err;
    throw err;
  }
  throw new Error("expected UnrecognizedCodeError");
}

describe("Jurisdiction", () => {
  describe("Norway", () => {
    it.each(["NO", "NOR"])("parses %s", (text) => {
      const norway = Jurisdiction.parse(text);
      expect(norway.name).toBe("Norway");
      expect(norway.countryCode).toBe(578);
      expect(norway.alpha2).toBe("NO");
      expect(norway.alpha3).toBe("NOR");
      expect(norway.region).toBe("Europe");
      expect(norway.subRegion).toBe("NorthernEurope");
      expect(norway.intermediateRegion).toBe("Undefined");
      expect(norway.regionCode).toBe(150);
      expect(norway.subRegionCode).toBe(154);
      expect(norway.intermediateRegionCode).toBeNull();
    });

    it("is built from either alpha code", () => {
      expect(Jurisdiction.fromAlpha2(parseAlpha2("NO")).name).toBe("Norway");
      expect(Jurisdiction.fromAlpha3(parseAlpha3("NOR")).name).toBe("Norway");
    });
  });

  describe("accessors", () => {
    it("exposes an intermediate region and its code", () => {
      const jersey = Jurisdiction.parse("JE");
      expect(jersey.intermediateRegion).toBe("ChannelIslands");
      expect(jersey.intermediateRegionCode).toBe(830);
    });

    it("reports Antarctica without a region", () => {
      const antarctica = Jurisdiction.parse("ATA");
      expect(antarctica.region).toBe("Undefined");
      expect(antarctica.subRegion).toBe("Undefined");
      expect(antarctica.regionCode).toBe(0);
      expect(antarctica.subRegionCode).toBe(0);
      expect(antarctica.intermediateRegionCode).toBeNull();
    });

    it("matches the registry definition for every jurisdiction", () => {
      for (const j of Jurisdiction.all()) {
        const again = Jurisdiction.fromCountryCode(j.countryCode);
        expect(again.alpha2).toBe(j.alpha2);
        expect(again.alpha3).toBe(j.alpha3);
        expect(again.region).toBe(j.region);
        expect(again.subRegion).toBe(j.subRegion);
        expect(again.intermediateRegion).toBe(j.intermediateRegion);
      }
    });
  });

  describe("parse", () => {
    it("round-trips every alpha-2 code", () => {
      for (const code of alpha2Codes()) {
        expect(Jurisdiction.parse(code).alpha2).toBe(code);
      }
    });

    it("round-trips every alpha-3 code", () => {
      for (const code of alpha3Codes()) {
        expect(Jurisdiction.parse(code).alpha3).toBe(code);
      }
    });

    it("keeps the offending text on the error", () => {
      const err = parseError("ZZZ_not_a_code");
      expect(err.code).toBe("ZZZ_not_a_code");
      expect(err.message).toBe("unrecognized ISO 3166 alpha country code: ZZZ_not_a_code");
    });

    it("does not normalise case or whitespace", () => {
      expect(parseError("no").code).toBe("no");
      expect(parseError(" NOR").code).toBe(" NOR");
      expect(Jurisdiction.tryParse("nor")).toBeNull();
    });
  });

  describe("fromCountryCode", () => {
    it("resolves an assigned numeric code", () => {
      expect(Jurisdiction.fromCountryCode(752).alpha3).toBe("SWE");
    });

    it("rejects an unassigned numeric code", () => {
      expect(() => Jurisdiction.fromCountryCode(1)).toThrow(
        "unrecognized ISO 3166 numeric country code: 1"
      );
    });
  });

  describe("equality", () => {
    it("compares handles by country code", () => {
      const a = Jurisdiction.from(parseAlpha2("NO"));
      const b = Jurisdiction.from(parseAlpha3("NOR"));
      expect(a.equals(b)).toBe(true);
      expect(a.equals(Jurisdiction.parse("SE"))).toBe(false);
    });

    it("compares a handle with bare alpha codes", () => {
      const norway = Jurisdiction.parse("NO");
      expect(norway.equals(parseAlpha2("NO"))).toBe(true);
      expect(norway.equals(parseAlpha3("NOR"))).toBe(true);
      expect(norway.equals(parseAlpha2("SE"))).toBe(false);
    });
  });

  describe("formatting", () => {
    it("formats as its alpha-2 code", () => {
      const norway = Jurisdiction.parse("NOR");
      expect(String(norway)).toBe("NO");
      expect(JSON.stringify({ country: norway })).toBe('{"country":"NO"}');
    });
  });

  describe("hierarchy queries", () => {
    it("finds Norway in Europe", () => {
      const europe = Jurisdiction.inRegion("Europe");
      expect(europe.some((j) => j.equals(parseAlpha2("NO")))).toBe(true);
    });

    it("finds only Antarctica without a region", () => {
      const undefinedRegion = Jurisdiction.inRegion("Undefined");
      expect(undefinedRegion).toHaveLength(1);
      expect(undefinedRegion[0].alpha3).toBe("ATA");
    });

    it("finds Angola in Sub-Saharan Africa", () => {
      const members = Jurisdiction.inSubRegion("SubSaharanAfrica");
      expect(members.some((j) => j.alpha2 === "AO")).toBe(true);
    });

    it("lists the Channel Islands in dataset order", () => {
      expect(Jurisdiction.inIntermediateRegion("ChannelIslands").map((j) => j.name)).toEqual([
        "Guernsey",
        "Jersey",
      ]);
    });

    it("returns exactly the jurisdictions carrying each class", () => {
      const all = Jurisdiction.all();
      for (const region of REGIONS.classes()) {
        const members = Jurisdiction.inRegion(region);
        expect(members.every((j) => j.region === region)).toBe(true);
        expect(members).toHaveLength(all.filter((j) => j.region === region).length);
      }
      for (const subRegion of SUB_REGIONS.classes()) {
        const members = Jurisdiction.inSubRegion(subRegion);
        expect(members.every((j) => j.subRegion === subRegion)).toBe(true);
        expect(members).toHaveLength(all.filter((j) => j.subRegion === subRegion).length);
      }
      for (const intermediate of INTERMEDIATE_REGIONS.classes()) {
        const members = Jurisdiction.inIntermediateRegion(intermediate);
        expect(members.every((j) => j.intermediateRegion === intermediate)).toBe(true);
        expect(members).toHaveLength(
          all.filter((j) => j.intermediateRegion === intermediate).length
        );
      }
    });
  });
});
