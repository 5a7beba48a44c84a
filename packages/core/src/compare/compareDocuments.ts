import type {
  Article,
  ComparisonResult,
  IdenticalArticle,
  ModifiedArticle,
  StandaloneArticle,
  StatuteDocument,
  StructureInfo,
} from "../types";
import { alignArticles, type AlignArticlesOptions } from "./alignArticles";
import { buildCharDiff } from "./charDiff";

export const DEFAULT_IDENTICAL_THRESHOLD = 0.98;

export interface CompareDocumentsOptions extends AlignArticlesOptions {
  identicalThreshold?: number;
}

export function resolveStructure(document: StatuteDocument, article: Article): StructureInfo {
  const chapter = article.chapter !== null ? document.chapters.get(article.chapter) : undefined;
  const section = article.section !== null ? document.sections.get(article.section) : undefined;

  return {
    chapterNumber: article.chapter,
    chapterTitle: chapter?.title ?? null,
    sectionNumber: article.section,
    sectionTitle: section?.title ?? null,
  };
}

function requireArticle(document: StatuteDocument, number: number, side: "old" | "new"): Article {
  const article = document.articles.get(number);
  if (!article) {
    throw new Error(`Alignment references ${side} article ${number}, which the document does not contain`);
  }
  return article;
}

function toStandalone(document: StatuteDocument, article: Article): StandaloneArticle {
  return {
    number: article.number,
    content: article.content,
    structure: resolveStructure(document, article),
  };
}

/**
 * Aligns two versions of a statute and classifies every article as identical,
 * modified, added or deleted. Modified pairs carry a character diff and the
 * chapter/section each side lives in.
 */
export function compareDocuments(
  oldDocument: StatuteDocument,
  newDocument: StatuteDocument,
  options: CompareDocumentsOptions = {},
): ComparisonResult {
  const identicalThreshold = options.identicalThreshold ?? DEFAULT_IDENTICAL_THRESHOLD;
  const alignment = alignArticles(oldDocument, newDocument, options);

  const identical: IdenticalArticle[] = [];
  const modified: ModifiedArticle[] = [];
  const deleted: StandaloneArticle[] = [];
  const mapping: Record<number, number> = {};

  for (const entry of alignment.entries) {
    const oldArticle = requireArticle(oldDocument, entry.oldNumber, "old");

    if (entry.newNumber === -1) {
      deleted.push(toStandalone(oldDocument, oldArticle));
      continue;
    }

    const newArticle = requireArticle(newDocument, entry.newNumber, "new");
    mapping[entry.oldNumber] = entry.newNumber;

    if (entry.similarity >= identicalThreshold) {
      identical.push({
        oldNumber: entry.oldNumber,
        newNumber: entry.newNumber,
        content: oldArticle.content,
        similarity: entry.similarity,
        matchType: entry.matchType,
        oldStructure: resolveStructure(oldDocument, oldArticle),
        newStructure: resolveStructure(newDocument, newArticle),
      });
      continue;
    }

    modified.push({
      oldNumber: entry.oldNumber,
      newNumber: entry.newNumber,
      oldContent: oldArticle.content,
      newContent: newArticle.content,
      similarity: entry.similarity,
      matchType: entry.matchType,
      oldStructure: resolveStructure(oldDocument, oldArticle),
      newStructure: resolveStructure(newDocument, newArticle),
      diff: buildCharDiff(oldArticle.content, newArticle.content),
    });
  }

  const added = alignment.added.map((number) =>
    toStandalone(newDocument, requireArticle(newDocument, number, "new")),
  );

  identical.sort((a, b) => a.oldNumber - b.oldNumber);
  modified.sort((a, b) => a.oldNumber - b.oldNumber);
  deleted.sort((a, b) => a.number - b.number);

  return {
    identical,
    modified,
    added,
    deleted,
    mapping,
    warnings: alignment.warnings,
    statistics: {
      ...alignment.statistics,
      identicalCount: identical.length,
      modifiedCount: modified.length,
    },
  };
}
