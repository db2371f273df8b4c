import { describe, it, expect } from "vitest";
import { applyIgnored, ignoredContents } from "../ignored.js";
import { emptyGroups, violation } from "../model.js";

describe("ignoredContents", () => {
  it("reads quoted ignore directives, case-insensitively", () => {
    const description = [
      "Refactors the parser.",
      "",
      '> Ignore "Missing CHANGELOG entry"',
      '>ignore "Big PR"',
      '  > IGNORE "Trailing spaces"  ',
      'Ignore "not a quote line"',
    ].join("\n");

    expect([...ignoredContents(description)]).toEqual(["Missing CHANGELOG entry", "Big PR", "Trailing spaces"]);
  });

  it("accepts directives with a Danger: prefix", () => {
    const description = ['> Danger: Ignore "Big PR"', '> danger:ignore "Missing tests"'].join("\n");
    expect([...ignoredContents(description)]).toEqual(["Big PR", "Missing tests"]);
  });

  it("handles a missing description", () => {
    expect(ignoredContents(null).size).toBe(0);
    expect(ignoredContents("").size).toBe(0);
  });

  it("skips empty quotes", () => {
    expect(ignoredContents('> Ignore ""').size).toBe(0);
  });
});

describe("applyIgnored", () => {
  it("drops matching warnings and errors but never messages or markdowns", () => {
    const groups = emptyGroups();
    groups.warning.push(violation("warning", { content: "Big PR" }), violation("warning", { content: "keep" }));
    groups.error.push(violation("error", { content: "Big PR", file: "a.ts", line: 1 }));
    groups.message.push(violation("message", { content: "Big PR" }));
    groups.markdown.push(violation("markdown", { content: "Big PR" }));

    const filtered = applyIgnored(groups, new Set(["Big PR"]));

    expect(filtered.warning.map((v) => v.content)).toEqual(["keep"]);
    expect(filtered.error).toEqual([]);
    expect(filtered.message).toHaveLength(1);
    expect(filtered.markdown).toHaveLength(1);
  });

  it("returns the same groups when nothing is ignored", () => {
    const groups = emptyGroups();
    expect(applyIgnored(groups, new Set())).toBe(groups);
  });
});
