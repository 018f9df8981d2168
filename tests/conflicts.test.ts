import { describe, expect, it } from "vitest";
import {
  compileConflictRules,
  detectConflicts,
  exclusiveGroupRule,
  lineVariantRule,
  strictSpecRule,
} from "../src/pipeline/conflicts.js";
import { normalizeProduct } from "../src/pipeline/normalizer.js";
import { loadRuleSet } from "../src/rules/load.js";
import type { NormalizedProduct, ProductSpecs } from "../src/types.js";

const rules = loadRuleSet();

function named(name: string, specs: ProductSpecs = {}): NormalizedProduct {
  return {
    product: { id: name, name, price: 100 },
    canonical: { name },
    specs,
    dimensionAxes: null,
  };
}

describe("conflict detector", () => {
  it("vetoes a base product line against its suffixed variant", () => {
    const source = normalizeProduct({ id: "s1", name: "JOTASHIELD 5L", brand: "JOTUN", price: 2100 }, rules);
    const target = normalizeProduct({ id: "t1", name: "JOTASHIELD FLEX 5L", brand: "JOTUN", price: 2300 }, rules);

    expect(detectConflicts(source, target, rules.conflictRules)).toEqual(["line_variant:jotashield[none vs flex]"]);
  });

  it("lets the same line and variant through", () => {
    const source = normalizeProduct({ id: "s1", name: "Jotashield Flex 2.5 GL", price: 1890 }, rules);
    const target = normalizeProduct({ id: "t1", name: "JOTUN JOTASHIELD FLEX 2.5GL", price: 1790 }, rules);

    expect(detectConflicts(source, target, rules.conflictRules)).toEqual([]);
  });

  it("vetoes disjoint members of an exclusive group", () => {
    const source = normalizeProduct({ id: "s1", name: "Jotun Jotashield Flex 2.5 GL", price: 1890 }, rules);
    const target = normalizeProduct({ id: "t1", name: "Jotun Tough Shield 2.5 GL", price: 1390 }, rules);

    expect(detectConflicts(source, target, rules.conflictRules)).toEqual([
      "exclusive_group:jotun_exterior_line[jotashield vs tough shield]",
    ]);
  });

  it("vetoes a sibling line written with irregular spacing", () => {
    const source = normalizeProduct({ id: "s1", name: "TOA Super  Shield 9L", price: 2590 }, rules);
    const target = normalizeProduct({ id: "t1", name: "TOA Supermatex 9L", price: 1890 }, rules);

    expect(detectConflicts(source, target, rules.conflictRules)).toEqual([
      "exclusive_group:toa_exterior_line[supershield vs supermatex]",
    ]);
  });

  it("vetoes abbreviated colour temperatures", () => {
    const source = normalizeProduct({ id: "s1", name: "LED bulb 9W E27 DL", price: 89 }, rules);
    const target = normalizeProduct({ id: "t1", name: "LED bulb 9W E27 WW", price: 89 }, rules);

    expect(detectConflicts(source, target, rules.conflictRules)).toEqual([
      "exclusive_group:color_temperature[daylight vs warm white]",
    ]);
  });

  it("does not read a brand name as a group member", () => {
    const source = normalizeProduct(
      { id: "s1", name: "BLACK+DECKER Door Handle Lever", brand: "BLACK+DECKER", price: 590 },
      rules,
    );
    const blackFinish = normalizeProduct(
      { id: "s2", name: "BLACK+DECKER Door Handle Lever Black", brand: "BLACK+DECKER", price: 590 },
      rules,
    );
    const target = normalizeProduct({ id: "t1", name: "Door Handle Lever Chrome", price: 550 }, rules);

    expect(detectConflicts(source, target, rules.conflictRules)).toEqual([]);
    expect(detectConflicts(blackFinish, target, rules.conflictRules)).toEqual([
      "exclusive_group:handle_finish[black vs chrome]",
    ]);
  });

  it("vetoes strict spec mismatches written in Thai", () => {
    const source = normalizeProduct({ id: "s1", name: "ชั้นวางของ 5 ชั้น", price: 990 }, rules);
    const target = normalizeProduct({ id: "t1", name: "ชั้นวางของ 4 ชั้น", price: 990 }, rules);

    expect(detectConflicts(source, target, rules.conflictRules)).toEqual(["strict_spec:tiers[5 vs 4]"]);
  });

  it("ignores a strict spec declared on one side only", () => {
    const rule = strictSpecRule("tiers");

    expect(rule.evaluate(named("shelf 5 tier", { tiers: { value: 5, unit: "count" } }), named("shelf"))).toBeNull();
  });

  it("evaluates rules from an alternate table in isolation", () => {
    const table = compileConflictRules({
      lineVariants: [],
      exclusiveGroups: [{ name: "toa_exterior_line", members: ["supermatex", "supershield"] }],
      strictSpecs: [],
    });

    expect(table).toHaveLength(1);
    expect(detectConflicts(named("toa supermatex 9 l"), named("toa supershield 9 l"), table)).toEqual([
      "exclusive_group:toa_exterior_line[supermatex vs supershield]",
    ]);
    expect(detectConflicts(named("toa supermatex 9 l"), named("toa primer 9 l"), table)).toEqual([]);
  });

  it("only fires a line rule when both sides name the line", () => {
    const rule = lineVariantRule("jotashield", ["flex"]);
    expect(rule.evaluate(named("jotashield flex"), named("majestic flex"))).toBeNull();

    const group = exclusiveGroupRule("color_temperature", ["daylight", "warm white"]);
    expect(group.evaluate(named("led 9w daylight"), named("led 9w warm white"))).toBe(
      "exclusive_group:color_temperature[daylight vs warm white]",
    );
  });
});
