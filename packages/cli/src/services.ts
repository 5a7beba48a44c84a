import type { Logger } from "pino";
import type { AppConfig } from "@statute/core/config";
import type { ReportStore } from "./storage/reportStore";

export interface AppServices {
  config: AppConfig;
  logger: Logger;
  store: ReportStore;
  dryRun: boolean;
}
