import type { DuplicateArticlePolicy } from "./types";

export interface AppConfig {
  similarityThreshold: number;
  identicalThreshold: number;
  duplicatePolicy: DuplicateArticlePolicy;
  outputDir: string;
  outputPrefix: string;
  previewLength: number;
}

function parseIntEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`ENV ${name} must be an integer. Received: ${raw}`);
  }
  return parsed;
}

export function parseRatio(label: string, raw: string): number {
  const parsed = Number(raw.trim());
  if (raw.trim().length === 0 || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`${label} must be a number between 0 and 1. Received: ${raw}`);
  }
  return parsed;
}

function parseRatioEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }
  return parseRatio(`ENV ${name}`, raw);
}

function parseEnumEnv<T extends string>(
  name: string,
  values: readonly T[],
  defaultValue: T,
): T {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  const match = values.find((value) => value === normalized);
  if (!match) {
    throw new Error(`ENV ${name} must be one of: ${values.join(", ")}. Received: ${raw}`);
  }

  return match;
}

export function loadConfig(): AppConfig {
  return {
    similarityThreshold: parseRatioEnv("SIMILARITY_THRESHOLD", 0.8),
    identicalThreshold: parseRatioEnv("IDENTICAL_THRESHOLD", 0.98),
    duplicatePolicy: parseEnumEnv(
      "DUPLICATE_ARTICLE_POLICY",
      ["last-wins", "first-wins"],
      "last-wins",
    ),
    outputDir: process.env.OUTPUT_DIR ?? ".",
    outputPrefix: process.env.OUTPUT_PREFIX ?? "statute-comparison",
    previewLength: parseIntEnv("PREVIEW_LENGTH", 150),
  };
}
