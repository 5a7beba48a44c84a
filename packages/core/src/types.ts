export type DuplicateArticlePolicy = "last-wins" | "first-wins";

export interface StructureHeader {
  number: number;
  title: string;
  text: string;
  lineNumber: number;
}

export interface Article {
  number: number;
  /** Body without the leading article token, cleaned and re-segmented. */
  content: string;
  /** Body including the article token, one normalized line per `\n`. */
  fullText: string;
  chapter: number | null;
  section: number | null;
  /** Raw source lines covered, including lines folded in by line-break repair. */
  lineCount: number;
  lineNumber: number;
}

export interface DuplicateArticle {
  number: number;
  firstLine: number;
  duplicateLine: number;
  kept: "first" | "last";
}

export interface StatuteMetadata {
  totalChapters: number;
  totalSections: number;
  totalArticles: number;
  totalContentLength: number;
}

export interface StatuteDocument {
  readonly chapters: ReadonlyMap<number, StructureHeader>;
  // Flat namespace: sections are not scoped to their chapter.
  readonly sections: ReadonlyMap<number, StructureHeader>;
  readonly articles: ReadonlyMap<number, Article>;
  readonly duplicates: readonly DuplicateArticle[];
  readonly metadata: StatuteMetadata;
}

export interface ManualMatch {
  oldNumber: number;
  newNumber: number;
}

export type MatchType = "manual" | "auto" | "none";

export interface AlignmentEntry {
  oldNumber: number;
  /** -1 when the old article found no counterpart. */
  newNumber: number;
  similarity: number;
  matchType: MatchType;
}

export type AlignmentWarningKind = "missing_article" | "already_matched";

export interface AlignmentWarning {
  kind: AlignmentWarningKind;
  oldNumber: number;
  newNumber: number;
  message: string;
}

export interface AlignmentStatistics {
  totalOld: number;
  totalNew: number;
  manualCount: number;
  autoCount: number;
  deletedCount: number;
  addedCount: number;
}

export interface AlignmentResult {
  entries: AlignmentEntry[];
  added: number[];
  warnings: AlignmentWarning[];
  statistics: AlignmentStatistics;
}

export type DiffSegmentKind = "equal" | "removed" | "added";

export interface DiffSegment {
  kind: DiffSegmentKind;
  value: string;
}

export interface StructureInfo {
  chapterNumber: number | null;
  chapterTitle: string | null;
  sectionNumber: number | null;
  sectionTitle: string | null;
}

export interface IdenticalArticle {
  oldNumber: number;
  newNumber: number;
  content: string;
  similarity: number;
  matchType: MatchType;
  oldStructure: StructureInfo;
  newStructure: StructureInfo;
}

export interface ModifiedArticle {
  oldNumber: number;
  newNumber: number;
  oldContent: string;
  newContent: string;
  similarity: number;
  matchType: MatchType;
  oldStructure: StructureInfo;
  newStructure: StructureInfo;
  diff: DiffSegment[];
}

export interface StandaloneArticle {
  number: number;
  content: string;
  structure: StructureInfo;
}

export interface ComparisonStatistics extends AlignmentStatistics {
  identicalCount: number;
  modifiedCount: number;
}

export interface ComparisonResult {
  identical: IdenticalArticle[];
  modified: ModifiedArticle[];
  added: StandaloneArticle[];
  deleted: StandaloneArticle[];
  mapping: Record<number, number>;
  warnings: AlignmentWarning[];
  statistics: ComparisonStatistics;
}
