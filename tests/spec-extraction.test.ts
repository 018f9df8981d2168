import { describe, expect, it } from "vitest";
import {
  extractSpecs,
  formatSpecValue,
  parseDimensionAxes,
  sameSpecValue,
} from "../src/pipeline/spec-extraction.js";

describe("spec extraction", () => {
  it("reads wattage and socket counts from lamp names", () => {
    expect(extractSpecs("led bulb 9w e27x2 warm white")).toEqual({
      wattage: { value: 9, unit: "w" },
      sockets: { value: 2, unit: "count" },
    });
  });

  it("defaults a bare socket to a count of one", () => {
    expect(extractSpecs("downlight gu10").sockets).toEqual({ value: 1, unit: "count" });
  });

  it("converts millilitres to litres", () => {
    expect(extractSpecs("primer 500 ml")).toEqual({ volume: { value: 0.5, unit: "l" } });
  });

  it("reads tier, line and step counts", () => {
    expect(extractSpecs("ladder 5-step aluminium")).toEqual({ steps: { value: 5, unit: "count" } });
    expect(extractSpecs("clothes rack 3 line 2 tier")).toEqual({
      lines: { value: 3, unit: "count" },
      tiers: { value: 2, unit: "count" },
    });
  });

  it("does not read the unit of a dimension group as a length", () => {
    expect(extractSpecs("shelf 120x60x45 cm")).toEqual({});
    expect(extractSpecs("hose 10 m")).toEqual({ length: { value: 1000, unit: "cm" } });
  });

  it("parses dimension axes in the written unit", () => {
    expect(parseDimensionAxes("1200x600 mm")).toEqual({ axes: [120, 60], span: "1200x600 mm" });
    expect(parseDimensionAxes("60x40 inch")?.axes).toEqual([152.4, 101.6]);
    expect(parseDimensionAxes("no dimensions here")).toBeNull();
  });

  it("returns nothing for empty text", () => {
    expect(extractSpecs("")).toEqual({});
  });

  it("compares and formats spec values with their unit", () => {
    expect(sameSpecValue({ value: 2.5, unit: "gal" }, { value: 2.5, unit: "l" })).toBe(false);
    expect(sameSpecValue({ value: 4, unit: "count" }, { value: 4, unit: "count" })).toBe(true);
    expect(formatSpecValue({ value: 5, unit: "count" })).toBe("5");
    expect(formatSpecValue({ value: 2.5, unit: "gal" })).toBe("2.5gal");
  });
});
