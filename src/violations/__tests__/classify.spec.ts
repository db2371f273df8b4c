import { describe, it, expect } from "vitest";
import { classify, compareInline, mergeGroups } from "../classify.js";
import { areEquivalent, emptyGroups, isInline, violation } from "../model.js";

describe("violation model", () => {
  it("treats a finding as inline only with both a file and a line", () => {
    expect(isInline(violation("warning", { content: "x", file: "a.ts", line: 1 }))).toBe(true);
    expect(isInline(violation("warning", { content: "x", file: "a.ts" }))).toBe(false);
    expect(isInline(violation("warning", { content: "x", line: 3 }))).toBe(false);
  });

  it("compares findings by file, line and content, ignoring stickiness", () => {
    const a = violation("error", { content: "bad", file: "a.ts", line: 2, sticky: true });
    const b = violation("error", { content: "bad", file: "a.ts", line: 2 });
    expect(areEquivalent(a, b)).toBe(true);
    expect(areEquivalent(a, { ...b, line: 3 })).toBe(false);
    expect(areEquivalent(a, { ...b, content: "worse" })).toBe(false);
  });
});

describe("compareInline", () => {
  it("puts unanchored findings first", () => {
    const plain = violation("warning", { content: "p" });
    const anchored = violation("warning", { content: "a", file: "a.ts", line: 1 });
    expect(compareInline(plain, anchored)).toBeLessThan(0);
    expect(compareInline(anchored, plain)).toBeGreaterThan(0);
    expect(compareInline(plain, violation("warning", { content: "q" }))).toBe(0);
  });

  it("orders by file, then line", () => {
    const a10 = violation("warning", { content: "x", file: "a.ts", line: 10 });
    const a2 = violation("warning", { content: "x", file: "a.ts", line: 2 });
    const b1 = violation("warning", { content: "x", file: "b.ts", line: 1 });
    expect([b1, a10, a2].sort(compareInline)).toEqual([a2, a10, b1]);
  });
});

describe("classify", () => {
  it("splits findings into regular and sorted inline groups", () => {
    const groups = emptyGroups();
    groups.warning.push(
      violation("warning", { content: "w-b", file: "src/b.ts", line: 4 }),
      violation("warning", { content: "general" }),
      violation("warning", { content: "w-a", file: "src/a.ts", line: 9 }),
    );
    groups.markdown.push(violation("markdown", { content: "## notes", file: "src/a.ts", line: 1 }));

    const { regular, inline } = classify(groups);

    expect(regular.warning.map((v) => v.content)).toEqual(["general"]);
    expect(inline.warning.map((v) => v.content)).toEqual(["w-a", "w-b"]);
    expect(inline.markdown.map((v) => v.content)).toEqual(["## notes"]);
    expect(regular.markdown).toEqual([]);
  });

  it("keeps input order for equal anchors", () => {
    const groups = emptyGroups();
    groups.error.push(
      violation("error", { content: "first", file: "a.ts", line: 1 }),
      violation("error", { content: "second", file: "a.ts", line: 1 }),
    );
    expect(classify(groups).inline.error.map((v) => v.content)).toEqual(["first", "second"]);
  });
});

describe("mergeGroups", () => {
  it("concatenates per kind in argument order", () => {
    const left = emptyGroups();
    const right = emptyGroups();
    left.error.push(violation("error", { content: "l" }));
    right.error.push(violation("error", { content: "r" }));
    right.message.push(violation("message", { content: "m" }));

    const merged = mergeGroups(left, right);
    expect(merged.error.map((v) => v.content)).toEqual(["l", "r"]);
    expect(merged.message.map((v) => v.content)).toEqual(["m"]);
    expect(left.error).toHaveLength(1);
  });
});
