import { describe, expect, it } from "vitest";
import { buildCharDiff } from "../../src/compare/charDiff";

describe("buildCharDiff", () => {
  it("reports a replaced character as removed then added", () => {
    expect(buildCharDiff("本条例自发布之日起施行。", "本条例自公布之日起施行。")).toEqual([
      { kind: "equal", value: "本条例自" },
      { kind: "removed", value: "发" },
      { kind: "added", value: "公" },
      { kind: "equal", value: "布之日起施行。" },
    ]);
  });

  it("reports insertions", () => {
    expect(buildCharDiff("abd", "abcd")).toEqual([
      { kind: "equal", value: "ab" },
      { kind: "added", value: "c" },
      { kind: "equal", value: "d" },
    ]);
  });

  it("handles one side being empty", () => {
    expect(buildCharDiff("", "新增")).toEqual([{ kind: "added", value: "新增" }]);
    expect(buildCharDiff("删除", "")).toEqual([{ kind: "removed", value: "删除" }]);
    expect(buildCharDiff("", "")).toEqual([]);
  });

  it("rebuilds both texts from its segments", () => {
    const oldText = "本条例适用于本市行政区域内的道路交通管理。";
    const newText = "本条例适用于本市行政区域内的道路交通管理活动。";
    const segments = buildCharDiff(oldText, newText);

    const rebuiltOld = segments.filter((s) => s.kind !== "added").map((s) => s.value).join("");
    const rebuiltNew = segments.filter((s) => s.kind !== "removed").map((s) => s.value).join("");

    expect(rebuiltOld).toBe(oldText);
    expect(rebuiltNew).toBe(newText);
  });
});
