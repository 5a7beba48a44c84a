import type { StructureInfo } from "@statute/core/types";

const UNSTRUCTURED_LABEL = "未分章节";

function formatPart(number: number | null, unit: "章" | "节", title: string | null): string | null {
  if (number === null) {
    return null;
  }
  return title ? `第${number}${unit}《${title}》` : `第${number}${unit}`;
}

export function formatStructureLabel(info: StructureInfo): string {
  const parts = [
    formatPart(info.chapterNumber, "章", info.chapterTitle),
    formatPart(info.sectionNumber, "节", info.sectionTitle),
  ].filter((part): part is string => part !== null);

  return parts.length > 0 ? parts.join(" - ") : UNSTRUCTURED_LABEL;
}

/** One label when both sides sit in the same place, `old → new` otherwise. */
export function formatStructureChange(oldInfo: StructureInfo, newInfo: StructureInfo): string {
  const oldLabel = formatStructureLabel(oldInfo);
  const newLabel = formatStructureLabel(newInfo);
  return oldLabel === newLabel ? oldLabel : `${oldLabel} → ${newLabel}`;
}
