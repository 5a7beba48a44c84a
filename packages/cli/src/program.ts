import { Command } from "commander";
import { registerParseCommand } from "./commands/parse";
import { registerCompareCommand } from "./commands/compare";
import type { AppServices } from "./services";

export interface GlobalOptions {
  dryRun: boolean;
  force: boolean;
  verbose: boolean;
}

/**
 * Builds the CLI. Services are created on first use, from the global flags
 * commander parsed, so `-vf` behaves like `-v -f`.
 */
export function createProgram(buildServices: (options: GlobalOptions) => AppServices): Command {
  const program = new Command();
  let services: AppServices | null = null;

  async function getServices(): Promise<AppServices> {
    if (services) {
      return services;
    }

    const opts = program.opts<{ dryRun?: boolean; force?: boolean; verbose?: boolean }>();
    services = buildServices({
      dryRun: opts.dryRun ?? false,
      force: opts.force ?? false,
      verbose: opts.verbose ?? false,
    });
    return services;
  }

  program
    .name("statute-diff")
    .description("Parse Chinese statute texts and compare two versions article by article")
    .option("--dry-run", "Run without writing any file")
    .option("-f, --force", "Overwrite existing output files")
    .option("-v, --verbose", "Enable debug logs");

  registerParseCommand(program, getServices);
  registerCompareCommand(program, getServices);

  return program;
}
