import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { validateWeightTable } from "../pipeline/aggregator.js";
import { compileConflictRules, type ConflictRule } from "../pipeline/conflicts.js";
import { canonicalizeText } from "../pipeline/normalizer.js";
import { SCORED_ATTRIBUTES, SPEC_KEYS, type SpecKey, type WeightTable } from "../types.js";
import {
  compileAlias,
  compilePhrase,
  normalizeText,
  type CompiledAlias,
  type CompiledPhrase,
} from "../utils/text.js";

const weightTableSchema = z.record(z.enum(SCORED_ATTRIBUTES), z.number());

const ruleFileSchema = z.object({
  schema_version: z.string().min(1),
  weights: weightTableSchema,
  house_brand_weights: weightTableSchema,
  house_brand_spec_weights: z.record(z.enum(SPEC_KEYS), z.number().nonnegative()).default({}),
  strict_specs: z.array(z.enum(SPEC_KEYS)).default([]),
  aliases: z
    .array(
      z.object({
        kind: z.enum(["unit", "finish", "color", "brand", "line", "category"]),
        canonical: z.string().min(1),
        aliases: z.array(z.string().min(1)).min(1),
      }),
    )
    .default([]),
  brands: z.array(z.string().min(1)).default([]),
  url_brands: z
    .array(
      z.object({
        host: z.string().min(1),
        segment: z.number().int().nonnegative(),
        brands: z.record(z.string().min(1), z.string().min(1)),
      }),
    )
    .default([]),
  category_keywords: z
    .array(
      z.object({
        category: z.string().min(1),
        keywords: z.array(z.string().min(1)).min(1),
      }),
    )
    .default([]),
  conflicts: z
    .object({
      line_variants: z
        .array(
          z.object({
            line: z.string().min(1),
            variants: z.array(z.string().min(1)).min(1),
          }),
        )
        .default([]),
      exclusive_groups: z
        .array(
          z.object({
            name: z.string().min(1),
            members: z.array(z.string().min(1)).min(2),
          }),
        )
        .default([]),
    })
    .default({}),
  cross_brand_preferences: z
    .record(z.string(), z.record(z.string(), z.array(z.string().min(1))))
    .default({}),
});

export type RuleFile = z.input<typeof ruleFileSchema>;

/**
 * Brand lookup for one retailer's product URLs: the first hyphen-separated
 * token of path segment `segment` is looked up in `brands`.
 */
export interface UrlBrandRule {
  host: string;
  segment: number;
  brands: ReadonlyMap<string, string>;
}

export interface CategoryKeywordRule {
  category: string;
  keywords: readonly CompiledPhrase[];
}

/**
 * Immutable, compiled rule tables. Built once at startup and handed to every
 * component explicitly.
 */
export interface RuleSet {
  readonly version: string;
  readonly weights: Readonly<WeightTable>;
  readonly houseBrandWeights: Readonly<WeightTable>;
  readonly houseBrandSpecWeights: Readonly<Partial<Record<SpecKey, number>>>;
  readonly strictSpecs: readonly SpecKey[];
  readonly aliases: readonly CompiledAlias[];
  readonly brands: readonly CompiledPhrase[];
  readonly urlBrands: readonly UrlBrandRule[];
  readonly categoryKeywords: readonly CategoryKeywordRule[];
  readonly conflictRules: readonly ConflictRule[];
  /** retailer → source brand → preferred target brands, all canonical. */
  readonly crossBrandPreferences: ReadonlyMap<string, ReadonlyMap<string, readonly string[]>>;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_RULES_PATH = path.join(__dirname, "default-rules.json");

function compileAliases(entries: z.infer<typeof ruleFileSchema>["aliases"]): CompiledAlias[] {
  const canonicalForms = new Set(entries.map((entry) => normalizeText(entry.canonical)));
  const seen = new Map<string, string>();
  const compiled: CompiledAlias[] = [];

  for (const entry of entries) {
    const canonical = normalizeText(entry.canonical);
    for (const alias of entry.aliases) {
      const item = compileAlias(alias, canonical);
      if (canonicalForms.has(item.alias)) {
        throw new Error(
          `Invalid rule table: alias '${alias}' collides with a canonical form and would not normalize idempotently.`,
        );
      }

      const previous = seen.get(item.alias);
      if (previous !== undefined && previous !== canonical) {
        throw new Error(
          `Invalid rule table: alias '${alias}' maps to both '${previous}' and '${canonical}'.`,
        );
      }

      seen.set(item.alias, canonical);
      compiled.push(item);
    }
  }

  // Longest first so "มิลลิลิตร" is consumed before "ลิตร".
  return compiled.sort(
    (left, right) => right.alias.length - left.alias.length || left.alias.localeCompare(right.alias),
  );
}

function compileCanonicalPhrases(values: string[], aliases: readonly CompiledAlias[]): CompiledPhrase[] {
  const phrases = new Map<string, CompiledPhrase>();
  for (const value of values) {
    const canonical = canonicalizeText(value, aliases);
    if (canonical && !phrases.has(canonical)) {
      phrases.set(canonical, compilePhrase(canonical));
    }
  }
  return [...phrases.values()];
}

export function compileRuleSet(input: unknown): RuleSet {
  const parsed = ruleFileSchema.safeParse(input);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid rule table: ${errors}`);
  }

  const file = parsed.data;
  validateWeightTable(file.weights, "weights");
  validateWeightTable(file.house_brand_weights, "house_brand_weights");

  const aliases = compileAliases(file.aliases);
  const canonical = (value: string): string => canonicalizeText(value, aliases);

  const brands = compileCanonicalPhrases(file.brands, aliases).sort(
    (left, right) => right.text.length - left.text.length || left.text.localeCompare(right.text),
  );

  const urlBrands: UrlBrandRule[] = file.url_brands.map((entry) =>
    Object.freeze({
      host: entry.host.trim().toLowerCase(),
      segment: entry.segment,
      brands: new Map(
        Object.entries(entry.brands).map(([slug, brand]) => [slug.trim().toLowerCase(), canonical(brand)]),
      ),
    }),
  );

  const categoryKeywords: CategoryKeywordRule[] = file.category_keywords.map((entry) =>
    Object.freeze({
      category: normalizeText(entry.category),
      keywords: Object.freeze(compileCanonicalPhrases(entry.keywords, aliases)),
    }),
  );

  const conflictRules = compileConflictRules({
    lineVariants: file.conflicts.line_variants.map((entry) => ({
      line: canonical(entry.line),
      variants: entry.variants.map(canonical).filter(Boolean),
    })),
    exclusiveGroups: file.conflicts.exclusive_groups.map((entry) => ({
      name: entry.name,
      members: entry.members.map(canonical).filter(Boolean),
    })),
    strictSpecs: file.strict_specs,
  });

  const crossBrandPreferences = new Map<string, ReadonlyMap<string, readonly string[]>>();
  for (const [retailer, bySourceBrand] of Object.entries(file.cross_brand_preferences)) {
    const brandMap = new Map<string, readonly string[]>();
    for (const [sourceBrand, targetBrands] of Object.entries(bySourceBrand)) {
      brandMap.set(canonical(sourceBrand), Object.freeze(targetBrands.map(canonical)));
    }
    crossBrandPreferences.set(normalizeText(retailer), brandMap);
  }

  return Object.freeze({
    version: file.schema_version,
    weights: Object.freeze({ ...file.weights }),
    houseBrandWeights: Object.freeze({ ...file.house_brand_weights }),
    houseBrandSpecWeights: Object.freeze({ ...file.house_brand_spec_weights }),
    strictSpecs: Object.freeze([...file.strict_specs]),
    aliases: Object.freeze(aliases),
    brands: Object.freeze(brands),
    urlBrands: Object.freeze(urlBrands),
    categoryKeywords: Object.freeze(categoryKeywords),
    conflictRules: Object.freeze(conflictRules),
    crossBrandPreferences,
  });
}

export function loadRuleSet(filePath: string = DEFAULT_RULES_PATH): RuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid rule table: could not read ${filePath} (${message})`);
  }

  return compileRuleSet(raw);
}

export function preferredTargetBrands(
  rules: RuleSet,
  retailer: string | undefined,
  sourceBrand: string | undefined,
): readonly string[] {
  if (!retailer || !sourceBrand) {
    return [];
  }
  return rules.crossBrandPreferences.get(normalizeText(retailer))?.get(sourceBrand) ?? [];
}
