import slugifyModule from "slugify";

const STOP_WORDS = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "for",
  "with",
  "of",
  "in",
  "to",
  "by",
  "size",
  "model",
  "ขนาด",
  "รุ่น",
  "ชนิด",
]);

const THAI_SCRIPT = /\p{Script=Thai}/u;

export interface CompiledAlias {
  alias: string;
  canonical: string;
  pattern: RegExp;
}

export interface CompiledPhrase {
  text: string;
  pattern: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case and accent folding shared by product text and rule phrases. Thai tone
 * and vowel marks are combining characters outside U+0300-036F and survive.
 */
export function foldText(value: string | undefined): string {
  if (!value) {
    return "";
  }

  return value
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .normalize("NFC")
    .toLowerCase()
    .replace(/(\d)\s*["”″]/g, "$1 inch")
    .replace(/(\d)\s*[×*]\s*(?=\d)/g, "$1x");
}

export function finalizeText(value: string): string {
  return value
    .replace(/[^\p{L}\p{M}\p{N}\s./-]/gu, " ")
    .replace(/(?<!\d)\.|\.(?!\d)/g, " ")
    .replace(/(?<![\p{L}\p{N}])[-/]+|[-/]+(?![\p{L}\p{N}])/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function normalizeText(value: string | undefined): string {
  return finalizeText(foldText(value));
}

/**
 * Thai has no word separators, so Thai aliases are replaced as substrings;
 * Latin aliases only where no letter touches them (digits may, as in "5liter").
 */
export function compileAlias(alias: string, canonical: string): CompiledAlias {
  const folded = foldText(alias).trim();
  const body = escapeRegExp(folded);
  const pattern = THAI_SCRIPT.test(folded)
    ? new RegExp(body, "gu")
    : new RegExp(`(?<!\\p{L})${body}(?!\\p{L})`, "gu");

  return { alias: folded, canonical, pattern };
}

export function applyAliases(value: string, aliases: readonly CompiledAlias[]): string {
  let output = value;
  for (const alias of aliases) {
    output = output.replace(alias.pattern, ` ${alias.canonical} `);
  }
  return output;
}

export function compilePhrase(canonicalPhrase: string): CompiledPhrase {
  const body = escapeRegExp(canonicalPhrase);
  const pattern = THAI_SCRIPT.test(canonicalPhrase)
    ? new RegExp(body, "u")
    : new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "u");

  return { text: canonicalPhrase, pattern };
}

export function phraseMatches(text: string, phrase: CompiledPhrase): boolean {
  return phrase.text.length > 0 && phrase.pattern.test(text);
}

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => token.length > 1 && !STOP_WORDS.has(token));
}

export function makeSlug(input: string): string {
  const slugify = slugifyModule as unknown as (
    value: string,
    options?: {
      lower?: boolean;
      strict?: boolean;
      trim?: boolean;
    },
  ) => string;

  const slug = slugify(input, {
    lower: true,
    strict: true,
    trim: true,
  });

  return slug.length > 0 ? slug.slice(0, 64) : "catalog";
}

export function trimToEmpty(value: string | undefined): string {
  return value?.trim() ?? "";
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
