import type {
  AlignmentEntry,
  AlignmentResult,
  AlignmentWarning,
  Article,
  ManualMatch,
  StatuteDocument,
} from "../types";
import { similarityRatio } from "./sequenceMatcher";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

export interface AlignArticlesOptions {
  manualMatches?: readonly ManualMatch[];
  threshold?: number;
}

interface Candidate {
  number: number;
  similarity: number;
}

function sortedNumbers(articles: ReadonlyMap<number, Article>): number[] {
  return [...articles.keys()].sort((a, b) => a - b);
}

function findBestCandidate(
  target: Article,
  newArticles: ReadonlyMap<number, Article>,
  newOrder: number[],
  consumedNew: ReadonlySet<number>,
): Candidate | null {
  let best: Candidate | null = null;

  for (const number of newOrder) {
    if (consumedNew.has(number)) {
      continue;
    }

    const candidate = newArticles.get(number);
    if (!candidate) {
      continue;
    }

    const similarity = similarityRatio(target.content, candidate.content);
    // strict comparison: on ties the lowest new number is kept
    if (similarity > (best?.similarity ?? 0)) {
      best = { number, similarity };
    }
  }

  return best;
}

/**
 * Pairs the articles of two versions of a statute.
 *
 * Manual matches are applied first, in list order. Remaining old articles are
 * then visited in ascending order and take the most similar unclaimed new
 * article if it reaches `threshold`; otherwise they are recorded as deleted
 * (`newNumber: -1`). New articles nobody claimed are returned in `added`.
 */
export function alignArticles(
  oldDocument: StatuteDocument,
  newDocument: StatuteDocument,
  options: AlignArticlesOptions = {},
): AlignmentResult {
  const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const manualMatches = options.manualMatches ?? [];
  const oldArticles = oldDocument.articles;
  const newArticles = newDocument.articles;

  const entries: AlignmentEntry[] = [];
  const warnings: AlignmentWarning[] = [];
  const consumedOld = new Set<number>();
  const consumedNew = new Set<number>();

  for (const { oldNumber, newNumber } of manualMatches) {
    const oldArticle = oldArticles.get(oldNumber);
    const newArticle = newArticles.get(newNumber);

    if (!oldArticle || !newArticle) {
      warnings.push({
        kind: "missing_article",
        oldNumber,
        newNumber,
        message: `Manual match references a missing article: old ${oldNumber} -> new ${newNumber}`,
      });
      continue;
    }

    if (consumedOld.has(oldNumber) || consumedNew.has(newNumber)) {
      warnings.push({
        kind: "already_matched",
        oldNumber,
        newNumber,
        message: `Manual match reuses an article that is already matched: old ${oldNumber} -> new ${newNumber}`,
      });
      continue;
    }

    entries.push({
      oldNumber,
      newNumber,
      similarity: similarityRatio(oldArticle.content, newArticle.content),
      matchType: "manual",
    });
    consumedOld.add(oldNumber);
    consumedNew.add(newNumber);
  }

  const newOrder = sortedNumbers(newArticles);
  let autoCount = 0;
  let deletedCount = 0;

  for (const oldNumber of sortedNumbers(oldArticles)) {
    const oldArticle = oldArticles.get(oldNumber);
    if (!oldArticle || consumedOld.has(oldNumber)) {
      continue;
    }

    const best = findBestCandidate(oldArticle, newArticles, newOrder, consumedNew);

    if (best && best.similarity >= threshold) {
      entries.push({
        oldNumber,
        newNumber: best.number,
        similarity: best.similarity,
        matchType: "auto",
      });
      consumedNew.add(best.number);
      autoCount += 1;
      continue;
    }

    entries.push({ oldNumber, newNumber: -1, similarity: 0, matchType: "none" });
    deletedCount += 1;
  }

  const added = newOrder.filter((number) => !consumedNew.has(number));

  return {
    entries,
    added,
    warnings,
    statistics: {
      totalOld: oldArticles.size,
      totalNew: newArticles.size,
      manualCount: entries.length - autoCount - deletedCount,
      autoCount,
      deletedCount,
      addedCount: added.length,
    },
  };
}
