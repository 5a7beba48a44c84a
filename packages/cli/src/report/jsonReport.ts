import path from "node:path";
import { toManualMatchesFile, type ManualMatchesFile } from "@statute/core/compare/manualMatches";
import type { ComparisonResult, ManualMatch, StatuteMetadata } from "@statute/core/types";

export interface ComparedSource {
  filePath: string;
  metadata: StatuteMetadata;
}

export interface ComparisonReport {
  metadata: {
    oldFile: string;
    newFile: string;
    threshold: number;
    generatedAt: string;
  };
  manualMatches: ManualMatchesFile;
  comparison: ComparisonResult;
  oldDocument: StatuteMetadata;
  newDocument: StatuteMetadata;
}

export function buildComparisonReport(input: {
  oldSource: ComparedSource;
  newSource: ComparedSource;
  comparison: ComparisonResult;
  manualMatches: readonly ManualMatch[];
  threshold: number;
  now?: () => Date;
}): ComparisonReport {
  const now = input.now ?? (() => new Date());

  return {
    metadata: {
      oldFile: path.basename(input.oldSource.filePath),
      newFile: path.basename(input.newSource.filePath),
      threshold: input.threshold,
      generatedAt: now().toISOString(),
    },
    manualMatches: toManualMatchesFile(input.manualMatches),
    comparison: input.comparison,
    oldDocument: input.oldSource.metadata,
    newDocument: input.newSource.metadata,
  };
}
