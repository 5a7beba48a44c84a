import type { Article, DuplicateArticle, StatuteDocument, StatuteMetadata, StructureHeader } from "../types";

export interface SerializedStatuteDocument {
  chapters: Record<number, StructureHeader>;
  sections: Record<number, StructureHeader>;
  articles: Record<number, Article>;
  duplicates: DuplicateArticle[];
  metadata: StatuteMetadata;
}

function mapToRecord<T>(map: ReadonlyMap<number, T>): Record<number, T> {
  const record: Record<number, T> = {};
  for (const [key, value] of map) {
    record[key] = value;
  }
  return record;
}

export function serializeStatuteDocument(document: StatuteDocument): SerializedStatuteDocument {
  return {
    chapters: mapToRecord(document.chapters),
    sections: mapToRecord(document.sections),
    articles: mapToRecord(document.articles),
    duplicates: [...document.duplicates],
    metadata: { ...document.metadata },
  };
}
