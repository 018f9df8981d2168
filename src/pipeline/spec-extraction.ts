import type { ProductSpecs, SpecKey, SpecUnit, SpecValue } from "../types.js";
import { roundTo } from "../utils/text.js";

interface MeasureRule {
  key: SpecKey;
  pattern: RegExp;
  units: Record<string, { unit: SpecUnit; factor: number }>;
}

const NUMBER = String.raw`(\d+(?:\.\d+)?)`;
const NOT_LETTER_AFTER = String.raw`(?!\p{L})`;

const COUNT_PATTERN = /(?<![\p{L}\d.])(\d{1,3})\s*-?\s*(tier|line|step)s?(?!\p{L})/gu;
const COUNT_KEYS: Record<string, SpecKey> = {
  tier: "tiers",
  line: "lines",
  step: "steps",
};

const SOCKET_PATTERN = /(?<![\p{L}\d])(?:e27|e14|gu10|mr16)(?:\s*x\s*(\d{1,2}))?(?![\p{L}\d])/u;

const DIMENSION_PATTERN = new RegExp(
  String.raw`(?<![\p{L}\d.])${NUMBER}\s*x\s*${NUMBER}(?:\s*x\s*${NUMBER})?\s*(mm|cm|m|inch)?${NOT_LETTER_AFTER}`,
  "u",
);

const MEASURE_RULES: MeasureRule[] = [
  {
    key: "volume",
    pattern: new RegExp(String.raw`${NUMBER}\s*(ml|l|gal)${NOT_LETTER_AFTER}`, "u"),
    units: {
      ml: { unit: "l", factor: 0.001 },
      l: { unit: "l", factor: 1 },
      gal: { unit: "gal", factor: 1 },
    },
  },
  {
    key: "weight",
    pattern: new RegExp(String.raw`${NUMBER}\s*(kg|g)${NOT_LETTER_AFTER}`, "u"),
    units: {
      g: { unit: "kg", factor: 0.001 },
      kg: { unit: "kg", factor: 1 },
    },
  },
  {
    key: "wattage",
    pattern: new RegExp(String.raw`${NUMBER}\s*(w)${NOT_LETTER_AFTER}`, "u"),
    units: {
      w: { unit: "w", factor: 1 },
    },
  },
  {
    key: "size_inch",
    pattern: new RegExp(String.raw`${NUMBER}\s*(inch)${NOT_LETTER_AFTER}`, "u"),
    units: {
      inch: { unit: "inch", factor: 1 },
    },
  },
  {
    key: "length",
    pattern: new RegExp(String.raw`${NUMBER}\s*(mm|cm|m)${NOT_LETTER_AFTER}`, "u"),
    units: {
      mm: { unit: "cm", factor: 0.1 },
      cm: { unit: "cm", factor: 1 },
      m: { unit: "cm", factor: 100 },
    },
  },
];

const AXIS_FACTORS: Record<string, number> = {
  mm: 0.1,
  cm: 1,
  m: 100,
  inch: 2.54,
};

function countSpec(value: number): SpecValue {
  return { value, unit: "count" };
}

/**
 * Parses the first "AxB[xC] unit" group into centimetre axes. Unitless
 * groups are read as centimetres.
 */
export function parseDimensionAxes(text: string): { axes: number[]; span: string } | null {
  const match = DIMENSION_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const factor = AXIS_FACTORS[match[4] ?? "cm"] ?? 1;
  const axes = [match[1], match[2], match[3]]
    .filter((raw): raw is string => raw !== undefined)
    .map((raw) => roundTo(Number(raw) * factor, 4));

  if (axes.some((axis) => !Number.isFinite(axis) || axis <= 0)) {
    return null;
  }

  return { axes, span: match[0] };
}

export function extractSpecs(canonicalText: string): ProductSpecs {
  const specs: ProductSpecs = {};
  if (!canonicalText) {
    return specs;
  }

  for (const match of canonicalText.matchAll(COUNT_PATTERN)) {
    const key = COUNT_KEYS[match[2]];
    if (key && specs[key] === undefined) {
      specs[key] = countSpec(Number(match[1]));
    }
  }

  const socket = SOCKET_PATTERN.exec(canonicalText);
  if (socket) {
    specs.sockets = countSpec(socket[1] ? Number(socket[1]) : 1);
  }

  // Axis groups would otherwise leak their trailing unit into `length`.
  const dimensions = parseDimensionAxes(canonicalText);
  const measurable = dimensions ? canonicalText.replace(dimensions.span, " ") : canonicalText;

  for (const rule of MEASURE_RULES) {
    const match = rule.pattern.exec(measurable);
    if (!match) {
      continue;
    }

    const conversion = rule.units[match[2]];
    const raw = Number(match[1]);
    if (!conversion || !Number.isFinite(raw) || raw <= 0) {
      continue;
    }

    specs[rule.key] = { value: roundTo(raw * conversion.factor, 6), unit: conversion.unit };
  }

  return specs;
}

export function sameSpecValue(left: SpecValue, right: SpecValue): boolean {
  return left.unit === right.unit && left.value === right.value;
}

export function formatSpecValue(spec: SpecValue): string {
  return spec.unit === "count" ? String(spec.value) : `${spec.value}${spec.unit}`;
}
