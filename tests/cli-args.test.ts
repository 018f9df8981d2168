import { describe, expect, it } from "vitest";
import { hasFlag, optionalArg, parseArgs, requireArg } from "../src/utils/cli.js";

describe("cli arguments", () => {
  it("reads values, inline values and bare flags", () => {
    const args = parseArgs(["--source", "a.csv", "--mode=house-brand", "--one-to-one", "--target", "b.csv", "stray"]);

    expect(args).toEqual({ source: "a.csv", mode: "house-brand", "one-to-one": true, target: "b.csv" });
    expect(hasFlag(args, "one-to-one")).toBe(true);
    expect(hasFlag(args, "rows")).toBe(false);
    expect(optionalArg(args, "retailer")).toBeUndefined();
  });

  it("requires non-empty values", () => {
    const args = parseArgs(["--source", "--target", "  "]);

    expect(() => requireArg(args, "source")).toThrow("Missing required argument --source");
    expect(() => requireArg(args, "target")).toThrow("Missing required argument --target");
    expect(requireArg(parseArgs(["--results", "out.json"]), "results")).toBe("out.json");
  });
});
