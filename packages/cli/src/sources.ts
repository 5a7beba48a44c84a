import fs from "node:fs/promises";
import type { Logger } from "pino";
import { parseManualMatches } from "@statute/core/compare/manualMatches";
import type { ManualMatch } from "@statute/core/types";

export async function readStatuteFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    const maybeErr = error as NodeJS.ErrnoException;
    if (maybeErr.code === "ENOENT") {
      throw new Error(`Input file not found: ${filePath}`);
    }
    throw error;
  }
}

/**
 * Loads a manual-match file. A missing file is not fatal: the comparison
 * runs on similarity alone. Malformed JSON or entries still throw.
 */
export async function loadManualMatchesFile(filePath: string, logger: Logger): Promise<ManualMatch[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const maybeErr = error as NodeJS.ErrnoException;
    if (maybeErr.code === "ENOENT") {
      logger.warn({ file: filePath }, "manual match file not found, continuing without manual matches");
      return [];
    }
    throw error;
  }

  const matches = parseManualMatches(JSON.parse(raw));
  logger.info({ file: filePath, count: matches.length }, "manual matches loaded");
  return matches;
}
