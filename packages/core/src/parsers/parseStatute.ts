import { CHINESE_NUMERAL_CHARS, convertChineseNumeral } from "../text/numerals";
import { cleanArticleContent, cleanText, normalizeStatuteLines, type RepairedLine } from "../text/normalize";
import type {
  Article,
  DuplicateArticle,
  DuplicateArticlePolicy,
  StatuteDocument,
  StructureHeader,
} from "../types";

export interface ParseStatuteOptions {
  duplicatePolicy?: DuplicateArticlePolicy;
}

const N = `[${CHINESE_NUMERAL_CHARS}]+`;

const RE_CHAPTER = new RegExp(`^第(${N})章\\s*(.+)$`);
const RE_SECTION = new RegExp(`^第(${N})节\\s*(.+)$`);
const RE_ARTICLE = new RegExp(`^第(${N})条\\s*(.+)$`);
const RE_ARTICLE_TOKEN = new RegExp(`^第${N}条\\s*`);
const RE_HEADER_LOOKALIKE = new RegExp(`^第${N}[章节]`);

interface OpenArticle {
  number: number;
  chapter: number | null;
  section: number | null;
  lineNumber: number;
  lines: string[];
  lineCount: number;
}

function matchHeader(pattern: RegExp, line: RepairedLine): StructureHeader | null {
  const match = pattern.exec(line.text);
  if (!match) {
    return null;
  }

  return {
    number: convertChineseNumeral(match[1]),
    title: match[2].replace(/\s+/g, ""),
    text: line.text,
    lineNumber: line.lineNumber,
  };
}

export function stripArticleToken(fullText: string): string {
  return fullText.replace(RE_ARTICLE_TOKEN, "").trim();
}

function buildArticle(open: OpenArticle): Article {
  const fullText = open.lines.join("\n").trim();

  return {
    number: open.number,
    content: cleanArticleContent(stripArticleToken(fullText)),
    fullText,
    chapter: open.chapter,
    section: open.section,
    lineCount: open.lineCount,
    lineNumber: open.lineNumber,
  };
}

/**
 * Rebuilds the chapter / section / article structure of a plain-text statute.
 *
 * Entering a chapter clears the current section. Text before the first
 * article that is not a header (title, preamble, table of contents) is
 * dropped, as are bare `第X章` / `第X节` lines found inside an article.
 */
export function parseStatute(text: string, options: ParseStatuteOptions = {}): StatuteDocument {
  const duplicatePolicy = options.duplicatePolicy ?? "last-wins";
  const chapters = new Map<number, StructureHeader>();
  const sections = new Map<number, StructureHeader>();
  const articles = new Map<number, Article>();
  const duplicates: DuplicateArticle[] = [];

  let currentChapter: number | null = null;
  let currentSection: number | null = null;
  let open: OpenArticle | null = null;

  const flush = (): void => {
    if (!open) {
      return;
    }

    const article = buildArticle(open);
    const existing = articles.get(article.number);

    if (existing) {
      duplicates.push({
        number: article.number,
        firstLine: existing.lineNumber,
        duplicateLine: article.lineNumber,
        kept: duplicatePolicy === "first-wins" ? "first" : "last",
      });

      if (duplicatePolicy === "first-wins") {
        open = null;
        return;
      }
    }

    articles.set(article.number, article);
    open = null;
  };

  for (const line of normalizeStatuteLines(text)) {
    const chapter = matchHeader(RE_CHAPTER, line);
    if (chapter) {
      chapters.set(chapter.number, chapter);
      currentChapter = chapter.number;
      currentSection = null;
      continue;
    }

    const section = matchHeader(RE_SECTION, line);
    if (section) {
      sections.set(section.number, section);
      currentSection = section.number;
      continue;
    }

    const articleMatch = RE_ARTICLE.exec(line.text);
    if (articleMatch) {
      flush();
      open = {
        number: convertChineseNumeral(articleMatch[1]),
        chapter: currentChapter,
        section: currentSection,
        lineNumber: line.lineNumber,
        lines: [line.text],
        lineCount: line.sourceLineCount,
      };
      continue;
    }

    if (open && !RE_HEADER_LOOKALIKE.test(line.text)) {
      open.lines.push(line.text);
      open.lineCount += line.sourceLineCount;
    }
  }

  flush();

  return {
    chapters,
    sections,
    articles,
    duplicates,
    metadata: {
      totalChapters: chapters.size,
      totalSections: sections.size,
      totalArticles: articles.size,
      totalContentLength: cleanText(text).length,
    },
  };
}
