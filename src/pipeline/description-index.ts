import type { NormalizedProduct } from "../types.js";
import { tokenize } from "../utils/text.js";

/**
 * Corpus statistics for description similarity. Built once per run over both
 * catalogs so a term shared by every product in the corpus counts for little
 * and a rare shared term counts for a lot.
 */
export interface DescriptionIndex {
  documentCount: number;
  idf: ReadonlyMap<string, number>;
}

export function computeTermFrequency(tokens: string[]): Map<string, number> {
  const tf = new Map<string, number>();
  if (tokens.length === 0) {
    return tf;
  }

  for (const token of tokens) {
    tf.set(token, (tf.get(token) ?? 0) + 1);
  }
  for (const [term, count] of tf.entries()) {
    tf.set(term, count / tokens.length);
  }
  return tf;
}

export function buildDescriptionIndex(products: readonly NormalizedProduct[]): DescriptionIndex {
  const documentFrequency = new Map<string, number>();
  let documentCount = 0;

  for (const product of products) {
    const description = product.canonical.description;
    if (!description) {
      continue;
    }

    documentCount += 1;
    for (const term of new Set(tokenize(description))) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  // Smoothed IDF: log((N + 1) / (df + 1)) + 1
  const idf = new Map<string, number>();
  for (const [term, frequency] of documentFrequency.entries()) {
    idf.set(term, Math.log((documentCount + 1) / (frequency + 1)) + 1);
  }

  return { documentCount, idf };
}

function weightedVector(text: string, index: DescriptionIndex): Map<string, number> {
  const vector = new Map<string, number>();
  for (const [term, frequency] of computeTermFrequency(tokenize(text)).entries()) {
    vector.set(term, frequency * (index.idf.get(term) ?? 1));
  }
  return vector;
}

export function cosineSimilarity(left: Map<string, number>, right: Map<string, number>): number {
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (const [term, value] of left.entries()) {
    leftNorm += value * value;
    const other = right.get(term);
    if (other !== undefined) {
      dot += value * other;
    }
  }
  for (const value of right.values()) {
    rightNorm += value * value;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/** Cosine of the two TF-IDF vectors, scaled to 0-100. */
export function descriptionSimilarity(left: string, right: string, index: DescriptionIndex): number {
  const similarity = cosineSimilarity(weightedVector(left, index), weightedVector(right, index));
  return Math.max(0, Math.min(100, similarity * 100));
}
