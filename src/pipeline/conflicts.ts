import type { NormalizedProduct, SpecKey } from "../types.js";
import { compilePhrase, phraseMatches, type CompiledPhrase } from "../utils/text.js";
import { formatSpecValue, sameSpecValue } from "./spec-extraction.js";

export type ConflictRuleKind = "line_variant" | "exclusive_group" | "strict_spec";

/**
 * A single veto predicate. `evaluate` returns the reason string when the pair
 * is mutually exclusive under this rule, otherwise null.
 */
export interface ConflictRule {
  kind: ConflictRuleKind;
  name: string;
  evaluate(source: NormalizedProduct, target: NormalizedProduct): string | null;
}

export interface LineVariantTableEntry {
  line: string;
  variants: string[];
}

export interface ExclusiveGroupTableEntry {
  name: string;
  members: string[];
}

export interface ConflictTable {
  lineVariants: LineVariantTableEntry[];
  exclusiveGroups: ExclusiveGroupTableEntry[];
  strictSpecs: SpecKey[];
}

/** Name and model with the product's own brand masked, so "black decker" is not a finish. */
function productLineText(product: NormalizedProduct): string {
  const text = [product.canonical.name, product.canonical.model].filter(Boolean).join(" ");
  const brand = product.canonical.brand;
  if (!brand) {
    return text;
  }

  const brandPattern = new RegExp(compilePhrase(brand).pattern.source, "gu");
  return text.replace(brandPattern, " ").replace(/\s+/g, " ").trim();
}

function mentioned(text: string, phrases: CompiledPhrase[]): string[] {
  return phrases.filter((phrase) => phraseMatches(text, phrase)).map((phrase) => phrase.text);
}

function describeSet(values: string[]): string {
  return values.length > 0 ? values.join("+") : "none";
}

function sameMembers(left: string[], right: string[]): boolean {
  return left.length === right.length && left.every((value) => right.includes(value));
}

export function lineVariantRule(line: string, variants: string[]): ConflictRule {
  const linePhrase = compilePhrase(line);
  const variantPhrases = variants.map((variant) => compilePhrase(variant));

  return {
    kind: "line_variant",
    name: line,
    evaluate(source, target) {
      const sourceText = productLineText(source);
      const targetText = productLineText(target);
      if (!phraseMatches(sourceText, linePhrase) || !phraseMatches(targetText, linePhrase)) {
        return null;
      }

      const sourceVariants = mentioned(sourceText, variantPhrases);
      const targetVariants = mentioned(targetText, variantPhrases);
      if (sameMembers(sourceVariants, targetVariants)) {
        return null;
      }

      return `line_variant:${line}[${describeSet(sourceVariants)} vs ${describeSet(targetVariants)}]`;
    },
  };
}

export function exclusiveGroupRule(name: string, members: string[]): ConflictRule {
  const memberPhrases = members.map((member) => compilePhrase(member));

  return {
    kind: "exclusive_group",
    name,
    evaluate(source, target) {
      const sourceMembers = mentioned(productLineText(source), memberPhrases);
      const targetMembers = mentioned(productLineText(target), memberPhrases);
      if (sourceMembers.length === 0 || targetMembers.length === 0) {
        return null;
      }
      if (sourceMembers.some((member) => targetMembers.includes(member))) {
        return null;
      }

      return `exclusive_group:${name}[${describeSet(sourceMembers)} vs ${describeSet(targetMembers)}]`;
    },
  };
}

export function strictSpecRule(key: SpecKey): ConflictRule {
  return {
    kind: "strict_spec",
    name: key,
    evaluate(source, target) {
      const left = source.specs[key];
      const right = target.specs[key];
      if (!left || !right || sameSpecValue(left, right)) {
        return null;
      }

      return `strict_spec:${key}[${formatSpecValue(left)} vs ${formatSpecValue(right)}]`;
    },
  };
}

/** Table phrases must already be in canonical form. */
export function compileConflictRules(table: ConflictTable): ConflictRule[] {
  return [
    ...table.lineVariants.map((entry) => lineVariantRule(entry.line, entry.variants)),
    ...table.exclusiveGroups.map((entry) => exclusiveGroupRule(entry.name, entry.members)),
    ...table.strictSpecs.map((key) => strictSpecRule(key)),
  ];
}

export function detectConflicts(
  source: NormalizedProduct,
  target: NormalizedProduct,
  rules: readonly ConflictRule[],
): string[] {
  const reasons: string[] = [];
  for (const rule of rules) {
    const reason = rule.evaluate(source, target);
    if (reason) {
      reasons.push(reason);
    }
  }
  return reasons;
}
