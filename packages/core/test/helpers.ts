import { readFileSync } from "node:fs";
import type { Article, StatuteDocument } from "../src/types";

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");
}

/** Document with bare articles and no chapters, built from `{ number: content }`. */
export function buildDocument(contents: Record<number, string>): StatuteDocument {
  return documentFromEntries(Object.entries(contents).map(([key, content]): [number, string] => [Number(key), content]));
}

/** Same as {@link buildDocument}, keeping the given insertion order. */
export function documentFromEntries(entries: ReadonlyArray<readonly [number, string]>): StatuteDocument {
  const articles = new Map<number, Article>();

  for (const [number, content] of entries) {
    articles.set(number, {
      number,
      content,
      fullText: content,
      chapter: null,
      section: null,
      lineCount: 1,
      lineNumber: number,
    });
  }

  return {
    chapters: new Map(),
    sections: new Map(),
    articles,
    duplicates: [],
    metadata: {
      totalChapters: 0,
      totalSections: 0,
      totalArticles: articles.size,
      totalContentLength: [...articles.values()].reduce((sum, article) => sum + article.content.length, 0),
    },
  };
}

export function cjkRun(start: number, length: number): string {
  return Array.from({ length }, (_, index) => String.fromCodePoint(0x4e00 + start + index)).join("");
}
