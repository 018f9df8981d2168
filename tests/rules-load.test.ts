import { describe, expect, it } from "vitest";
import { detectConflicts } from "../src/pipeline/conflicts.js";
import { normalizeProduct } from "../src/pipeline/normalizer.js";
import { compileRuleSet, loadRuleSet, preferredTargetBrands, type RuleFile } from "../src/rules/load.js";

function minimalRules(overrides: Partial<RuleFile> = {}): RuleFile {
  return {
    schema_version: "test-1",
    weights: { name: 50, brand: 50 },
    house_brand_weights: { name: 40, price: 60 },
    ...overrides,
  };
}

describe("rule tables", () => {
  it("loads the bundled table as an immutable rule set", () => {
    const rules = loadRuleSet();

    expect(rules.version).toBe("2026.10.1");
    expect(rules.weights.name).toBe(25);
    expect(rules.strictSpecs).toEqual(["tiers", "lines", "steps", "sockets"]);
    expect(Object.isFrozen(rules)).toBe(true);
    expect(Object.isFrozen(rules.weights)).toBe(true);
  });

  it("resolves cross-brand preferences by retailer and canonical brand", () => {
    const rules = loadRuleSet();

    expect(preferredTargetBrands(rules, "HomePro", "toa")).toEqual(["kech", "matall"]);
    expect(preferredTargetBrands(rules, "HomePro", "jotun")).toEqual([]);
    expect(preferredTargetBrands(rules, undefined, "toa")).toEqual([]);
  });

  it("rejects invalid weight tables", () => {
    expect(() => compileRuleSet(minimalRules({ weights: { name: -1, brand: 5 } }))).toThrow(
      "Invalid rule table: weights.name must be a finite, non-negative number (got -1).",
    );
    expect(() => compileRuleSet(minimalRules({ house_brand_weights: { name: 0 } }))).toThrow(
      "Invalid rule table: house_brand_weights must sum to a positive total.",
    );
  });

  it("reports schema errors with their path", () => {
    const { schema_version: _omitted, ...withoutVersion } = minimalRules();

    expect(() => compileRuleSet(withoutVersion)).toThrow("Invalid rule table: schema_version: Required");
  });

  it("refuses alias tables that would not normalize idempotently", () => {
    expect(() =>
      compileRuleSet(
        minimalRules({
          aliases: [
            { kind: "unit", canonical: "l", aliases: ["liter"] },
            { kind: "unit", canonical: "liter", aliases: ["lt"] },
          ],
        }),
      ),
    ).toThrow("Invalid rule table: alias 'liter' collides with a canonical form and would not normalize idempotently.");

    expect(() =>
      compileRuleSet(
        minimalRules({
          aliases: [
            { kind: "unit", canonical: "l", aliases: ["ltr"] },
            { kind: "unit", canonical: "gal", aliases: ["ltr"] },
          ],
        }),
      ),
    ).toThrow("Invalid rule table: alias 'ltr' maps to both 'l' and 'gal'.");
  });

  it("wraps unreadable files", () => {
    expect(() => loadRuleSet("/nonexistent/rules.json")).toThrow(
      /^Invalid rule table: could not read \/nonexistent\/rules\.json/,
    );
  });

  it("applies an alternate table without touching the default one", () => {
    const alternate = compileRuleSet(
      minimalRules({
        conflicts: {
          exclusive_groups: [{ name: "test_finish", members: ["matte", "gloss"] }],
        },
      }),
    );
    const defaults = loadRuleSet();

    const source = normalizeProduct({ id: "s1", name: "Wood stain matte 1 l", price: 300 }, alternate);
    const target = normalizeProduct({ id: "t1", name: "Wood stain gloss 1 l", price: 300 }, alternate);

    expect(detectConflicts(source, target, alternate.conflictRules)).toEqual([
      "exclusive_group:test_finish[matte vs gloss]",
    ]);
    expect(detectConflicts(source, target, defaults.conflictRules)).toEqual([]);
  });

  it("compiles URL brand tables to canonical brands", () => {
    const rules = compileRuleSet(
      minimalRules({
        aliases: [{ kind: "brand", canonical: "nippon", aliases: ["nippon paint"] }],
        url_brands: [{ host: "Shop.Example.Test", segment: 1, brands: { Nippon: "Nippon Paint" } }],
      }),
    );

    expect(rules.urlBrands).toHaveLength(1);
    expect(rules.urlBrands[0].host).toBe("shop.example.test");
    expect([...rules.urlBrands[0].brands]).toEqual([["nippon", "nippon"]]);
    expect(
      normalizeProduct(
        { id: "s1", name: "Exterior paint 9 l", price: 2000, url: "https://shop.example.test/paint/nippon-weatherbond" },
        rules,
      ).canonical.brand,
    ).toBe("nippon");
  });
});
