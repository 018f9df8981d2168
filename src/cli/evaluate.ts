#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { evaluateMatches, readGroundTruthFile } from "../pipeline/evaluation.js";
import { hasFlag, parseArgs, requireArg } from "../utils/cli.js";

const resultsFileSchema = z.object({
  results: z.array(
    z.object({
      sourceId: z.string(),
      targetId: z.string(),
      aggregateScore: z.number(),
      method: z.enum(["weighted", "house_brand", "ai_reranked"]),
      priceDeltaAbsolute: z.number(),
      priceDeltaPercent: z.number(),
      degraded: z.boolean(),
      confidence: z.number().optional(),
      reason: z.string().optional(),
    }),
  ),
});

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const resultsPath = path.resolve(process.cwd(), requireArg(args, "results"));
  const groundTruthPath = path.resolve(process.cwd(), requireArg(args, "ground-truth"));
  const showRows = hasFlag(args, "rows");

  const parsed = resultsFileSchema.safeParse(JSON.parse(await readFile(resultsPath, "utf8")));
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid results file: ${errors}`);
  }

  const groundTruth = await readGroundTruthFile(groundTruthPath);
  const report = evaluateMatches(parsed.data.results, groundTruth);
  const { rows, ...summary } = report;

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(showRows ? report : summary, null, 2));
  if (!showRows && rows.length > 0) {
    // eslint-disable-next-line no-console
    console.error(`Pass --rows to include ${rows.length} per-source rows.`);
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Evaluation failed:", error);
  process.exitCode = 1;
});
