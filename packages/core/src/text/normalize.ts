export interface RepairedLine {
  text: string;
  /** 1-based number of the first source line folded into this one. */
  lineNumber: number;
  sourceLineCount: number;
}

const TERMINAL_PUNCTUATION = new Set([".", "。", ";", "；", ":", "：", "!", "！", "?", "？"]);
const CONTINUATION_PUNCTUATION = new Set([",", "，", "、"]);
const NO_MERGE_PREFIXES = ["(", "（", "第", "条", "章", "节"];

const RE_TRAILING_PUNCTUATION = /[。，；：！？、.;:!?]$/;
const RE_ENUMERATOR = /^[(（][零一二三四五六七八九十百千万\d]+[)）]/;

const PUNCTUATION_MAP = new Map<string, string>([
  [",", "，"],
  [".", "。"],
  [";", "；"],
  [":", "："],
  ["?", "？"],
  ["!", "！"],
  ["(", "（"],
  [")", "）"],
  ["[", "［"],
  ["]", "］"],
  ["{", "｛"],
  ["}", "｝"],
  ["<", "《"],
  [">", "》"],
  ["«", "《"],
  ["»", "》"],
]);

const QUOTE_PAIRS = new Map<string, readonly [string, string]>([
  ['"', ["“", "”"]],
  ["'", ["‘", "’"]],
]);

function lastChar(value: string): string {
  return value.slice(-1);
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= "0" && char <= "9";
}

export function endsWithTerminalPunctuation(line: string): boolean {
  return TERMINAL_PUNCTUATION.has(lastChar(line));
}

export function isEnumeratorLine(line: string): boolean {
  return RE_ENUMERATOR.test(line);
}

export function shouldMergeLines(current: string, next: string): boolean {
  if (endsWithTerminalPunctuation(current)) {
    return false;
  }

  if (NO_MERGE_PREFIXES.some((prefix) => next.startsWith(prefix)) || isEnumeratorLine(next)) {
    return false;
  }

  if (CONTINUATION_PUNCTUATION.has(lastChar(current))) {
    return true;
  }

  return !RE_TRAILING_PUNCTUATION.test(current);
}

/**
 * Undoes hard wraps left by copy-paste: a line is folded into its successor
 * while {@link shouldMergeLines} allows it. Blank lines are dropped and are
 * never merged across.
 */
export function repairLines(text: string): RepairedLine[] {
  const lines = text.replace(/\r/g, "").split("\n");
  const repaired: RepairedLine[] = [];
  let index = 0;

  while (index < lines.length) {
    let current = lines[index].trim();
    if (!current) {
      index += 1;
      continue;
    }

    const lineNumber = index + 1;
    let sourceLineCount = 1;

    while (index + 1 < lines.length) {
      const next = lines[index + 1].trim();
      if (!next || !shouldMergeLines(current, next)) {
        break;
      }

      current += next;
      sourceLineCount += 1;
      index += 1;
    }

    repaired.push({ text: current, lineNumber, sourceLineCount });
    index += 1;
  }

  return repaired;
}

export function repairLineBreaks(text: string): string {
  return repairLines(text)
    .map((line) => line.text)
    .join("\n");
}

/**
 * Maps half-width punctuation to full-width and strips every whitespace
 * character. A period touching a digit (`1.`, `3.5`) stays as it is.
 * Running it twice gives the same result as running it once.
 */
export function normalizePunctuation(text: string): string {
  const chars = Array.from(text);
  const quoteOpen = new Map<string, boolean>();
  let result = "";

  chars.forEach((char, index) => {
    if (char === ".") {
      result += isDigit(chars[index - 1]) || isDigit(chars[index + 1]) ? "." : "。";
      return;
    }

    const quotes = QUOTE_PAIRS.get(char);
    if (quotes) {
      const open = !(quoteOpen.get(char) ?? false);
      quoteOpen.set(char, open);
      result += open ? quotes[0] : quotes[1];
      return;
    }

    result += PUNCTUATION_MAP.get(char) ?? char;
  });

  return result.replace(/\s+/g, "");
}

/** Repairs line breaks and normalizes each resulting line, keeping line structure. */
export function normalizeStatuteLines(text: string): RepairedLine[] {
  return repairLines(text)
    .map((line) => ({ ...line, text: normalizePunctuation(line.text) }))
    .filter((line) => line.text.length > 0);
}

/**
 * Cleans an article body: repairs wraps again, then keeps enumerated sub-items
 * such as （一） on their own lines while folding plain continuation lines into
 * the sentence they continue.
 */
export function cleanArticleContent(content: string): string {
  if (!content) {
    return content;
  }

  const segments: string[] = [];

  for (const line of normalizeStatuteLines(content)) {
    const previous = segments[segments.length - 1];

    if (
      previous !== undefined &&
      !isEnumeratorLine(line.text) &&
      !isEnumeratorLine(previous) &&
      !endsWithTerminalPunctuation(previous)
    ) {
      segments[segments.length - 1] = previous + line.text;
      continue;
    }

    segments.push(line.text);
  }

  return segments.join("\n");
}

/** Trims every line and drops blank ones. */
export function cleanText(text: string): string {
  return text
    .replace(/\r/g, "")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}
