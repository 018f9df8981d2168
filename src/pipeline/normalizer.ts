import type { RuleSet } from "../rules/load.js";
import type { NormalizedProduct, Product, TextAttribute } from "../types.js";
import { TEXT_ATTRIBUTES } from "../types.js";
import {
  applyAliases,
  finalizeText,
  foldText,
  phraseMatches,
  type CompiledAlias,
} from "../utils/text.js";
import { extractSpecs, parseDimensionAxes } from "./spec-extraction.js";

/**
 * Aliases run before punctuation collapses ("มล." keeps its dot) and again
 * after ("super  shield" or "nippon, paint" only match once spacing is
 * collapsed), so a canonical string maps to itself.
 */
export function canonicalizeText(
  value: string | undefined,
  aliases: readonly CompiledAlias[],
): string {
  const collapsed = finalizeText(applyAliases(foldText(value), aliases));
  return finalizeText(applyAliases(collapsed, aliases));
}

function canonicalizeDimensions(value: string | undefined, aliases: readonly CompiledAlias[]): string {
  return canonicalizeText(value, aliases).replace(/(\d)\s*x\s*(?=\d)/g, "$1x");
}

export function brandFromUrl(url: string | undefined, rules: RuleSet): string {
  if (!url || !URL.canParse(url)) {
    return "";
  }

  const parsed = new URL(url);
  const host = parsed.hostname.toLowerCase();
  const rule = rules.urlBrands.find((entry) => host === entry.host || host.endsWith(`.${entry.host}`));
  if (!rule) {
    return "";
  }

  const segment = parsed.pathname.split("/").filter(Boolean)[rule.segment];
  const slug = segment?.toLowerCase().split("-")[0];
  return slug ? (rule.brands.get(slug) ?? "") : "";
}

/** Explicit brand first, then the retailer URL slug, then a known brand named in the title. */
export function resolveBrand(canonicalBrand: string, canonicalName: string, rules: RuleSet, url?: string): string {
  if (canonicalBrand) {
    return canonicalBrand;
  }

  const fromUrl = brandFromUrl(url, rules);
  if (fromUrl) {
    return fromUrl;
  }

  return rules.brands.find((brand) => phraseMatches(canonicalName, brand))?.text ?? "";
}

export function resolveCategory(text: string, rules: RuleSet): string | undefined {
  if (!text) {
    return undefined;
  }

  for (const entry of rules.categoryKeywords) {
    if (entry.keywords.some((keyword) => phraseMatches(text, keyword))) {
      return entry.category;
    }
  }

  return undefined;
}

export function normalizeProduct(product: Product, rules: RuleSet): NormalizedProduct {
  const canonical: Partial<Record<TextAttribute, string>> = {};

  for (const attribute of TEXT_ATTRIBUTES) {
    const text =
      attribute === "dimensions"
        ? canonicalizeDimensions(product.dimensions, rules.aliases)
        : canonicalizeText(product[attribute], rules.aliases);
    if (text) {
      canonical[attribute] = text;
    }
  }

  const name = canonical.name ?? "";
  const brand = resolveBrand(canonical.brand ?? "", name, rules, product.url);
  if (brand) {
    canonical.brand = brand;
  }

  const category = canonical.category
    ? (resolveCategory(canonical.category, rules) ?? canonical.category)
    : resolveCategory(name, rules);
  if (category) {
    canonical.category = category;
  }

  const specText = [canonical.name, canonical.model, canonical.dimensions].filter(Boolean).join(" ");
  const axesSource = canonical.dimensions ?? name;

  return {
    product,
    canonical,
    specs: extractSpecs(specText),
    dimensionAxes: parseDimensionAxes(axesSource)?.axes ?? null,
  };
}

export function normalizeCatalog(products: readonly Product[], rules: RuleSet): NormalizedProduct[] {
  return products.map((product) => normalizeProduct(product, rules));
}
