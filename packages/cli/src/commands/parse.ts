import path from "node:path";
import { Command } from "commander";
import { parseStatute } from "@statute/core/parsers/parseStatute";
import { serializeStatuteDocument } from "@statute/core/parsers/serialize";
import type { StatuteDocument } from "@statute/core/types";
import type { AppServices } from "../services";
import { readStatuteFile } from "../sources";

export interface ParseOptions {
  output?: string;
  preview?: string;
}

function parsePreviewCount(value: string | undefined): number {
  if (value === undefined) {
    return 3;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`--preview must be a non-negative integer. Received: ${value}`);
  }
  return parsed;
}

export function defaultParseOutputName(inputPath: string): string {
  const baseName = path.basename(inputPath, path.extname(inputPath));
  return `parsed_${baseName}.json`;
}

export async function loadStatute(services: AppServices, filePath: string): Promise<StatuteDocument> {
  services.logger.info({ file: filePath }, "parsing statute");

  const text = await readStatuteFile(filePath);
  const document = parseStatute(text, { duplicatePolicy: services.config.duplicatePolicy });

  for (const duplicate of document.duplicates) {
    services.logger.warn({ file: filePath, duplicate }, "duplicate article number");
  }

  services.logger.info({ file: filePath, ...document.metadata }, "statute parsed");
  return document;
}

export async function runParse(
  services: AppServices,
  inputPath: string,
  options: ParseOptions,
): Promise<StatuteDocument> {
  const previewCount = parsePreviewCount(options.preview);
  const document = await loadStatute(services, inputPath);

  const outputName = options.output ?? defaultParseOutputName(inputPath);
  const written = await services.store.writeJson(outputName, serializeStatuteDocument(document));

  const preview = [...document.articles.values()]
    .sort((a, b) => a.number - b.number)
    .slice(0, previewCount)
    .map((article) => ({
      number: article.number,
      content: article.content.slice(0, services.config.previewLength),
    }));

  services.logger.info(
    {
      output: written.absolutePath,
      written: written.written,
      dryRun: services.dryRun,
      preview,
    },
    "parse completed",
  );

  return document;
}

export function registerParseCommand(
  program: Command,
  getServices: () => Promise<AppServices>,
): void {
  program
    .command("parse")
    .description("Parse a statute text file into chapters, sections and articles")
    .argument("<input>", "UTF-8 statute text file")
    .option("-o, --output <file>", "Output JSON file (default: parsed_<input>.json)")
    .option("--preview <count>", "Number of articles to preview", "3")
    .action(async (input: string, cmdOptions: ParseOptions) => {
      const services = await getServices();
      await runParse(services, input, cmdOptions);
    });
}
