import type {
  AlignmentWarning,
  DiffSegment,
  IdenticalArticle,
  MatchType,
  ModifiedArticle,
  StandaloneArticle,
} from "@statute/core/types";
import type { ComparisonReport } from "./jsonReport";
import { formatStructureChange, formatStructureLabel } from "./structureLabel";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

const MATCH_TYPE_LABELS: Record<MatchType, string> = {
  manual: "手动匹配",
  auto: "智能匹配",
  none: "未匹配",
};

const STYLES = `
body { font-family: "PingFang SC", "Microsoft YaHei", sans-serif; margin: 2rem; line-height: 1.6; color: #222; }
h1 { font-size: 1.5rem; }
table.stats td, table.stats th { padding: 0.25rem 0.75rem; border-bottom: 1px solid #ddd; text-align: left; }
article { border: 1px solid #ddd; border-radius: 6px; padding: 0.75rem 1rem; margin: 0.75rem 0; }
article header { font-weight: bold; }
.structure { color: #666; font-size: 0.9rem; }
.content { white-space: pre-wrap; }
.diff-removed { background: #fdd; text-decoration: line-through; }
.diff-added { background: #dfd; }
.warning { color: #a60; }
.filter-button { margin-right: 0.5rem; padding: 0.25rem 0.75rem; border: 1px solid #ccc; border-radius: 4px; background: #fff; cursor: pointer; }
.filter-button.active { background: #333; color: #fff; }
`.trim();

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function renderDiffSegments(segments: readonly DiffSegment[]): string {
  return segments
    .map((segment) => {
      const text = escapeHtml(segment.value);
      if (segment.kind === "removed") {
        return `<span class="diff-removed">${text}</span>`;
      }
      if (segment.kind === "added") {
        return `<span class="diff-added">${text}</span>`;
      }
      return text;
    })
    .join("");
}

function formatPercent(similarity: number): string {
  return `${(similarity * 100).toFixed(1)}%`;
}

function renderModified(item: ModifiedArticle): string {
  return `<article>
<header>第${item.oldNumber}条 → 第${item.newNumber}条 · ${MATCH_TYPE_LABELS[item.matchType]} · 相似度 ${formatPercent(item.similarity)}</header>
<div class="structure">${escapeHtml(formatStructureChange(item.oldStructure, item.newStructure))}</div>
<div class="content">${renderDiffSegments(item.diff)}</div>
</article>`;
}

function renderStandalone(item: StandaloneArticle): string {
  return `<article>
<header>第${item.number}条</header>
<div class="structure">${escapeHtml(formatStructureLabel(item.structure))}</div>
<div class="content">${escapeHtml(item.content)}</div>
</article>`;
}

function renderIdentical(item: IdenticalArticle): string {
  const numbers =
    item.oldNumber === item.newNumber ? `第${item.oldNumber}条` : `第${item.oldNumber}条 → 第${item.newNumber}条`;

  return `<article>
<header>${numbers} · ${MATCH_TYPE_LABELS[item.matchType]}</header>
<div class="structure">${escapeHtml(formatStructureChange(item.oldStructure, item.newStructure))}</div>
<div class="content">${escapeHtml(item.content)}</div>
</article>`;
}

function renderWarning(warning: AlignmentWarning): string {
  return `<li class="warning">${escapeHtml(warning.message)}</li>`;
}

type ReportCategory = "modified" | "added" | "deleted" | "identical";

const FILTERS: ReadonlyArray<[ReportCategory | "all", string]> = [
  ["all", "全部"],
  ["modified", "修改条文"],
  ["identical", "相同条文"],
  ["deleted", "删除条文"],
  ["added", "新增条文"],
];

// Shows only the sections whose data-category matches the pressed button.
const FILTER_SCRIPT = `
document.querySelectorAll(".filter-button").forEach((button) => {
  button.addEventListener("click", () => {
    const filter = button.dataset.filter;
    document.querySelectorAll(".filter-button").forEach((other) => other.classList.toggle("active", other === button));
    document.querySelectorAll("section[data-category]").forEach((section) => {
      section.hidden = filter !== "all" && section.dataset.category !== filter;
    });
  });
});
`.trim();

function renderFilters(): string {
  const buttons = FILTERS.map(
    ([filter, label]) =>
      `<button type="button" class="filter-button${filter === "all" ? " active" : ""}" data-filter="${filter}">${label}</button>`,
  );
  return `<nav class="filters">${buttons.join("")}</nav>`;
}

function renderSection<T>(
  category: ReportCategory,
  title: string,
  items: readonly T[],
  render: (item: T) => string,
): string {
  const body = items.length > 0 ? items.map(render).join("\n") : "<p>无</p>";
  return `<section data-category="${category}">
<h2>${title}（${items.length}）</h2>
${body}
</section>`;
}

/** Renders a self-contained HTML page for a comparison report. */
export function renderHtmlReport(report: ComparisonReport): string {
  const { comparison, metadata } = report;
  const stats = comparison.statistics;

  const warnings =
    comparison.warnings.length > 0
      ? `<section><h2>警告</h2><ul>${comparison.warnings.map(renderWarning).join("")}</ul></section>`
      : "";

  return `<!DOCTYPE html>
<html lang="zh-CN">
<head>
<meta charset="UTF-8">
<title>法律条文对比结果</title>
<style>${STYLES}</style>
</head>
<body>
<h1>${escapeHtml(metadata.oldFile)} → ${escapeHtml(metadata.newFile)}</h1>
<table class="stats">
<tr><th>原版本条文</th><td>${stats.totalOld}</td></tr>
<tr><th>新版本条文</th><td>${stats.totalNew}</td></tr>
<tr><th>相同</th><td>${stats.identicalCount}</td></tr>
<tr><th>修改</th><td>${stats.modifiedCount}</td></tr>
<tr><th>新增</th><td>${stats.addedCount}</td></tr>
<tr><th>删除</th><td>${stats.deletedCount}</td></tr>
<tr><th>手动 / 智能匹配</th><td>${stats.manualCount} / ${stats.autoCount}</td></tr>
<tr><th>相似度阈值</th><td>${metadata.threshold}</td></tr>
</table>
${warnings}
${renderFilters()}
${renderSection("modified", "修改条文", comparison.modified, renderModified)}
${renderSection("added", "新增条文", comparison.added, renderStandalone)}
${renderSection("deleted", "删除条文", comparison.deleted, renderStandalone)}
${renderSection("identical", "相同条文", comparison.identical, renderIdentical)}
<footer>生成时间 ${escapeHtml(metadata.generatedAt)}</footer>
<script>${FILTER_SCRIPT}</script>
</body>
</html>
`;
}
