#!/usr/bin/env node
import { appendFile, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { getConfig } from "../config.js";
import { RunLogger } from "../logging/run-logger.js";
import { readCatalogFile } from "../pipeline/ingest.js";
import { runMatching } from "../pipeline/run.js";
import { buildMatchSettings, createProviders, parseMatchMode } from "../pipeline/settings.js";
import { loadRuleSet } from "../rules/load.js";
import { hasFlag, optionalArg, parseArgs, requireArg } from "../utils/cli.js";
import { makeSlug } from "../utils/text.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const sourcePath = path.resolve(process.cwd(), requireArg(args, "source"));
  const targetPath = path.resolve(process.cwd(), requireArg(args, "target"));
  const mode = parseMatchMode(optionalArg(args, "mode"));
  const retailer = optionalArg(args, "retailer");
  const oneToOne = hasFlag(args, "one-to-one") ? true : undefined;

  const config = getConfig();
  const rules = loadRuleSet(config.RULES_PATH ? path.resolve(process.cwd(), config.RULES_PATH) : undefined);

  const runId = `${makeSlug(path.parse(sourcePath).name)}-${new Date().toISOString().replace(/[:.]/g, "-")}`;
  const logDir = path.resolve(process.cwd(), config.OUTPUT_DIR, "logs");
  await mkdir(logDir, { recursive: true });
  const logPath = path.join(logDir, `${runId}.jsonl`);

  const logger = new RunLogger({
    runId,
    flushBatchSize: config.LOG_FLUSH_BATCH_SIZE,
    sink: async (rows) => {
      await appendFile(logPath, rows.map((row) => JSON.stringify(row)).join("\n") + "\n", "utf8");
    },
    consoleWrite: (line) => process.stderr.write(`${line}\n`),
  });

  try {
    const [sourceCatalog, targetCatalog] = await Promise.all([
      readCatalogFile(sourcePath),
      readCatalogFile(targetPath),
    ]);
    logger.info("ingest", "catalogs.loaded", "Catalogs loaded.", {
      source_path: sourcePath,
      target_path: targetPath,
      source_count: sourceCatalog.products.length,
      target_count: targetCatalog.products.length,
      source_rejected: sourceCatalog.rejected,
      target_rejected: targetCatalog.rejected,
    });

    const output = await runMatching({
      sources: sourceCatalog.products,
      targets: targetCatalog.products,
      rules,
      settings: buildMatchSettings(config, { mode, retailer, oneToOne }),
      providers: createProviders(config, (event) =>
        logger.log(event.level, event.stage, event.event, event.message, event.payload),
      ),
      logger,
    });

    const outputArg = optionalArg(args, "output");
    const outputPath = outputArg
      ? path.resolve(process.cwd(), outputArg)
      : path.resolve(process.cwd(), config.OUTPUT_DIR, `matches-${runId}.json`);
    await mkdir(path.dirname(outputPath), { recursive: true });

    const summary = {
      runId,
      mode,
      rulesVersion: rules.version,
      sourceCount: sourceCatalog.products.length,
      targetCount: targetCatalog.products.length,
      matchedCount: output.results.length,
      outputPath,
      logPath,
    };
    await writeFile(
      outputPath,
      JSON.stringify(
        {
          ...summary,
          results: output.results,
          rejected: {
            sources: [...sourceCatalog.rejected, ...output.rejected.sources],
            targets: [...targetCatalog.rejected, ...output.rejected.targets],
          },
        },
        null,
        2,
      ),
      "utf8",
    );

    // eslint-disable-next-line no-console
    console.log(JSON.stringify(summary, null, 2));
  } finally {
    await logger.flush("run_end");
  }
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Matching failed:", error);
  process.exitCode = 1;
});
