const DIGITS = new Map<string, number>([
  ["零", 0],
  ["一", 1],
  ["二", 2],
  ["三", 3],
  ["四", 4],
  ["五", 5],
  ["六", 6],
  ["七", 7],
  ["八", 8],
  ["九", 9],
]);

const UNITS = new Map<string, number>([
  ["十", 10],
  ["百", 100],
  ["千", 1000],
  ["万", 10000],
]);

/** Character class accepted in 第…章 / 第…节 / 第…条 headers. */
export const CHINESE_NUMERAL_CHARS = "零一二三四五六七八九十百千万";

/**
 * Converts a Chinese numeral such as 一百零五 to 105. Unknown characters are
 * skipped and an empty or unrecognised token yields 0.
 *
 * 万 multiplies like any other unit instead of opening a new magnitude group,
 * so 二十万 gives 10020. Article numbering never gets there.
 */
export function convertChineseNumeral(token: string): number {
  let total = 0;
  let pending = 0;

  Array.from(token).forEach((char, index) => {
    const digit = DIGITS.get(char);
    if (digit !== undefined) {
      // 零 only holds a place
      if (digit > 0) {
        pending = digit;
      }
      return;
    }

    const unit = UNITS.get(char);
    if (unit === undefined) {
      return;
    }

    if ((char === "十" && index === 0) || pending === 0) {
      pending = 1;
    }

    total += pending * unit;
    pending = 0;
  });

  return total + pending;
}
