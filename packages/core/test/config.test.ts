import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, parseRatio } from "../src/config";

const ENV_KEYS = [
  "SIMILARITY_THRESHOLD",
  "IDENTICAL_THRESHOLD",
  "DUPLICATE_ARTICLE_POLICY",
  "OUTPUT_DIR",
  "OUTPUT_PREFIX",
  "PREVIEW_LENGTH",
] as const;

describe("loadConfig", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("uses defaults when nothing is set", () => {
    expect(loadConfig()).toEqual({
      similarityThreshold: 0.8,
      identicalThreshold: 0.98,
      duplicatePolicy: "last-wins",
      outputDir: ".",
      outputPrefix: "statute-comparison",
      previewLength: 150,
    });
  });

  it("reads overrides from the environment", () => {
    process.env.SIMILARITY_THRESHOLD = "0.65";
    process.env.DUPLICATE_ARTICLE_POLICY = "First-Wins";
    process.env.OUTPUT_DIR = "reports";
    process.env.PREVIEW_LENGTH = "40";

    expect(loadConfig()).toMatchObject({
      similarityThreshold: 0.65,
      duplicatePolicy: "first-wins",
      outputDir: "reports",
      previewLength: 40,
    });
  });

  it("rejects invalid values", () => {
    process.env.IDENTICAL_THRESHOLD = "1.5";
    expect(() => loadConfig()).toThrow("ENV IDENTICAL_THRESHOLD must be a number between 0 and 1. Received: 1.5");

    delete process.env.IDENTICAL_THRESHOLD;
    process.env.DUPLICATE_ARTICLE_POLICY = "reject";
    expect(() => loadConfig()).toThrow("ENV DUPLICATE_ARTICLE_POLICY must be one of: last-wins, first-wins");

    delete process.env.DUPLICATE_ARTICLE_POLICY;
    process.env.PREVIEW_LENGTH = "many";
    expect(() => loadConfig()).toThrow("ENV PREVIEW_LENGTH must be an integer. Received: many");
  });
});

describe("parseRatio", () => {
  it("accepts values between 0 and 1", () => {
    expect(parseRatio("--threshold", "0")).toBe(0);
    expect(parseRatio("--threshold", " 0.75 ")).toBe(0.75);
    expect(parseRatio("--threshold", "1")).toBe(1);
  });

  it("rejects anything else", () => {
    expect(() => parseRatio("--threshold", "")).toThrow("--threshold must be a number between 0 and 1");
    expect(() => parseRatio("--threshold", "-0.1")).toThrow("--threshold must be a number between 0 and 1");
    expect(() => parseRatio("--threshold", "abc")).toThrow("--threshold must be a number between 0 and 1");
  });
});
