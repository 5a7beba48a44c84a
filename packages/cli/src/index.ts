import "dotenv/config";
import { loadConfig } from "@statute/core/config";
import { createLogger } from "@statute/core/logger";
import { ReportStore } from "./storage/reportStore";
import { createProgram } from "./program";

async function main(): Promise<void> {
  const config = loadConfig();

  const program = createProgram(({ dryRun, force, verbose }) => ({
    config,
    logger: createLogger(verbose),
    store: new ReportStore(config.outputDir, { force, dryRun }),
    dryRun,
  }));

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
