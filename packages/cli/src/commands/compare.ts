import { Command } from "commander";
import { parseRatio } from "@statute/core/config";
import { compareDocuments } from "@statute/core/compare/compareDocuments";
import type { ManualMatch } from "@statute/core/types";
import type { AppServices } from "../services";
import { loadManualMatchesFile } from "../sources";
import { buildComparisonReport, type ComparisonReport } from "../report/jsonReport";
import { renderHtmlReport } from "../report/htmlReport";
import { loadStatute } from "./parse";

export interface CompareOptions {
  threshold?: string;
  manualMatches?: string;
  outputPrefix?: string;
  html: boolean;
  json: boolean;
}

export async function runCompare(
  services: AppServices,
  oldPath: string,
  newPath: string,
  options: CompareOptions,
): Promise<ComparisonReport> {
  const { config, logger } = services;
  const threshold =
    options.threshold !== undefined ? parseRatio("--threshold", options.threshold) : config.similarityThreshold;
  const manualMatches: ManualMatch[] = options.manualMatches
    ? await loadManualMatchesFile(options.manualMatches, logger)
    : [];

  const oldDocument = await loadStatute(services, oldPath);
  const newDocument = await loadStatute(services, newPath);

  const comparison = compareDocuments(oldDocument, newDocument, {
    manualMatches,
    threshold,
    identicalThreshold: config.identicalThreshold,
  });

  for (const warning of comparison.warnings) {
    logger.warn({ warning }, "manual match skipped");
  }

  for (const item of comparison.modified) {
    logger.debug(
      {
        oldNumber: item.oldNumber,
        newNumber: item.newNumber,
        similarity: Number(item.similarity.toFixed(3)),
        matchType: item.matchType,
      },
      "modified article",
    );
  }

  const report = buildComparisonReport({
    oldSource: { filePath: oldPath, metadata: oldDocument.metadata },
    newSource: { filePath: newPath, metadata: newDocument.metadata },
    comparison,
    manualMatches,
    threshold,
  });

  const prefix = options.outputPrefix ?? config.outputPrefix;
  const outputs: string[] = [];

  if (options.html) {
    const written = await services.store.write(`${prefix}-report.html`, renderHtmlReport(report));
    outputs.push(written.absolutePath);
  }

  if (options.json) {
    const written = await services.store.writeJson(`${prefix}-data.json`, report);
    outputs.push(written.absolutePath);
  }

  logger.info(
    { statistics: comparison.statistics, outputs, dryRun: services.dryRun },
    "compare completed",
  );

  return report;
}

export function registerCompareCommand(
  program: Command,
  getServices: () => Promise<AppServices>,
): void {
  program
    .command("compare")
    .description("Align the articles of two statute versions and write JSON/HTML reports")
    .argument("<old>", "Old version text file")
    .argument("<new>", "New version text file")
    .option("-t, --threshold <ratio>", "Auto-match similarity threshold (default: SIMILARITY_THRESHOLD or 0.8)")
    .option("-m, --manual-matches <file>", "JSON file with forced old/new article pairs")
    .option("-o, --output-prefix <prefix>", "Report file prefix")
    .option("--no-html", "Skip the HTML report")
    .option("--no-json", "Skip the JSON data file")
    .action(async (oldPath: string, newPath: string, cmdOptions: CompareOptions) => {
      const services = await getServices();
      await runCompare(services, oldPath, newPath, cmdOptions);
    });
}
