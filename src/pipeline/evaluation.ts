import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { MatchResult } from "../types.js";
import { roundTo, trimToEmpty } from "../utils/text.js";

export type EvaluationOutcome = "correct" | "wrong_target" | "false_positive" | "missed" | "correct_rejection";

export interface EvaluationRow {
  sourceId: string;
  expectedTargetId: string | null;
  predictedTargetId: string | null;
  outcome: EvaluationOutcome;
}

export interface EvaluationReport {
  total: number;
  counts: Record<EvaluationOutcome, number>;
  precision: number;
  recall: number;
  accuracy: number;
  rows: EvaluationRow[];
}

/** source id → expected target id, null when no valid match exists. */
export type GroundTruth = ReadonlyMap<string, string | null>;

const groundTruthRowSchema = z.object({
  source_id: z.string().trim().min(1),
  target_id: z.string().trim().optional().default(""),
});

function classify(expected: string | null, predicted: string | null): EvaluationOutcome {
  if (expected === null) {
    return predicted === null ? "correct_rejection" : "false_positive";
  }
  if (predicted === null) {
    return "missed";
  }
  return predicted === expected ? "correct" : "wrong_target";
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : roundTo(numerator / denominator, 4);
}

/**
 * Scores results against labelled pairs. Only labelled sources count; pass
 * `sourceIds` to restrict the report further, e.g. to the sources that
 * survived validation.
 */
export function evaluateMatches(
  results: readonly MatchResult[],
  groundTruth: GroundTruth,
  sourceIds?: Iterable<string>,
): EvaluationReport {
  const predicted = new Map(results.map((result) => [result.sourceId, result.targetId]));
  const scope = sourceIds ? new Set(sourceIds) : null;

  const counts: Record<EvaluationOutcome, number> = {
    correct: 0,
    wrong_target: 0,
    false_positive: 0,
    missed: 0,
    correct_rejection: 0,
  };
  const rows: EvaluationRow[] = [];

  for (const [sourceId, expectedTargetId] of groundTruth.entries()) {
    if (scope && !scope.has(sourceId)) {
      continue;
    }

    const predictedTargetId = predicted.get(sourceId) ?? null;
    const outcome = classify(expectedTargetId, predictedTargetId);
    counts[outcome] += 1;
    rows.push({ sourceId, expectedTargetId, predictedTargetId, outcome });
  }

  const predictions = counts.correct + counts.wrong_target + counts.false_positive;
  const positives = counts.correct + counts.wrong_target + counts.missed;

  return {
    total: rows.length,
    counts,
    precision: ratio(counts.correct, predictions),
    recall: ratio(counts.correct, positives),
    accuracy: ratio(counts.correct + counts.correct_rejection, rows.length),
    rows,
  };
}

export function parseGroundTruthCsv(content: string): GroundTruth {
  const records = parse(content, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    trim: true,
  }) as Record<string, unknown>[];

  const truth = new Map<string, string | null>();
  records.forEach((record, index) => {
    const parsed = groundTruthRowSchema.safeParse(record);
    if (!parsed.success) {
      const errors = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Invalid ground truth row ${index + 2}: ${errors}`);
    }

    const targetId = trimToEmpty(parsed.data.target_id);
    truth.set(parsed.data.source_id, targetId.length > 0 ? targetId : null);
  });
  return truth;
}

export async function readGroundTruthFile(filePath: string): Promise<GroundTruth> {
  return parseGroundTruthCsv(await readFile(filePath, "utf8"));
}
