import { describe, expect, it } from "vitest";
import {
  buildDescriptionIndex,
  computeTermFrequency,
  cosineSimilarity,
  descriptionSimilarity,
} from "../src/pipeline/description-index.js";
import type { NormalizedProduct } from "../src/types.js";
import { makeSlug, tokenize } from "../src/utils/text.js";

function withDescription(id: string, description?: string): NormalizedProduct {
  return {
    product: { id, name: id, price: 1 },
    canonical: description ? { name: id, description } : { name: id },
    specs: {},
    dimensionAxes: null,
  };
}

describe("description index", () => {
  it("tokenizes without stop words or single characters", () => {
    expect(tokenize("The powder-coated steel frame, 2 doors")).toEqual(["powder-coated", "steel", "frame", "doors"]);
  });

  it("computes relative term frequencies", () => {
    expect([...computeTermFrequency(["steel", "frame", "steel"]).entries()]).toEqual([
      ["steel", 2 / 3],
      ["frame", 1 / 3],
    ]);
    expect(computeTermFrequency([]).size).toBe(0);
  });

  it("uses smoothed idf over products that have a description", () => {
    const index = buildDescriptionIndex([
      withDescription("a", "steel frame"),
      withDescription("b", "steel shelf"),
      withDescription("c"),
    ]);

    expect(index.documentCount).toBe(2);
    expect(index.idf.get("steel")).toBe(1);
    expect(index.idf.get("frame")).toBeCloseTo(Math.log(3 / 2) + 1, 10);
  });

  it("returns zero for disjoint or empty vectors", () => {
    expect(cosineSimilarity(new Map([["steel", 1]]), new Map([["wood", 1]]))).toBe(0);
    expect(cosineSimilarity(new Map(), new Map([["wood", 1]]))).toBe(0);

    const index = buildDescriptionIndex([withDescription("a", "steel frame")]);
    expect(descriptionSimilarity("steel frame", "ceramic bowl", index)).toBe(0);
  });

  it("falls back to a fixed slug for empty names", () => {
    expect(makeSlug("")).toBe("catalog");
    expect(makeSlug("HomePro Catalog 2026!")).toBe("homepro-catalog-2026");
  });
});
