import { describe, it, expect } from "vitest";
import { parseBody, parsePrevious, renderInline, renderSummary, resolvedSince } from "../codec.js";
import { isGeneratedBy } from "../comment.js";
import { emptyGroups, violation } from "../../violations/model.js";

function stripMeta(body: string): string {
  return body.replace(/ ?<!-- v:[A-Za-z0-9_-]+ -->/g, "");
}

describe("renderInline", () => {
  it("renders a finding with its kind and a tool marker", () => {
    const v = violation("warning", { content: "Unused import", file: "src/a.ts", line: 3 });
    const body = renderInline(v, { dangerId: "lint" });

    expect(stripMeta(body)).toBe("<!-- generated_by_lint -->\n\n⚠️ **warning:** Unused import\n\n");
    expect(isGeneratedBy(body, "lint")).toBe(true);
    expect(parseBody(body)).toEqual([v]);
  });

  it("renders markdown as is", () => {
    const v = violation("markdown", { content: "**Heads up**", file: "a.ts", line: 1 });
    expect(stripMeta(renderInline(v, { dangerId: "lint" }))).toBe("<!-- generated_by_lint -->\n\n**Heads up**\n\n");
  });

  it("strikes through resolved findings and keeps them decodable", () => {
    const v = violation("error", { content: "Null check", file: "a.ts", line: 9, sticky: true });
    const body = renderInline(v, { dangerId: "lint", resolved: true });
    expect(stripMeta(body)).toBe("<!-- generated_by_lint -->\n\n✅ <del>Null check</del>\n\n");
    expect(parseBody(body)).toEqual([v]);
  });
});

describe("renderSummary", () => {
  it("lays out tables per kind with resolved sticky rows", () => {
    const current = emptyGroups();
    current.error.push(violation("error", { content: "Tests failing" }));
    current.warning.push(violation("warning", { content: "Unused | import", file: "a.ts", line: 2 }));
    current.markdown.push(violation("markdown", { content: "## Coverage" }));

    const previous = emptyGroups();
    previous.error.push(violation("error", { content: "Old failure", sticky: true }));
    previous.warning.push(violation("warning", { content: "Unused | import", file: "a.ts", line: 2, sticky: true }));
    previous.markdown.push(violation("markdown", { content: "old md", sticky: true }));

    const body = renderSummary(current, { dangerId: "danger", previous });

    expect(stripMeta(body).split("\n")).toEqual([
      "<!-- generated_by_danger -->",
      "",
      "## 🚫 1 Error, ⚠️ 1 Warning",
      "",
      "### Errors",
      "",
      "| | |",
      "|---|---|",
      "| 🚫 | Tests failing |",
      "| ✅ | <del>Old failure</del> |",
      "",
      "### Warnings",
      "",
      "| | |",
      "|---|---|",
      "| ⚠️ | `a.ts:2` Unused \\| import |",
      "",
      "## Coverage",
      "",
      "",
      "✅ <del>old md</del>",
      "",
      "",
      "---",
      "🤖 *Kept in sync by mr-thread-sync*",
    ]);
  });

  it("says so when everything is resolved", () => {
    const previous = emptyGroups();
    previous.warning.push(violation("warning", { content: "gone", sticky: true }));
    const lines = stripMeta(renderSummary(emptyGroups(), { dangerId: "danger", previous })).split("\n");
    expect(lines[2]).toBe("## ✅ Nothing left to address");
    expect(lines).toContain("| ✅ | <del>gone</del> |");
  });

  it("pluralizes counts", () => {
    const current = emptyGroups();
    current.message.push(violation("message", { content: "a" }), violation("message", { content: "b" }));
    expect(renderSummary(current, { dangerId: "danger" }).split("\n")[2]).toBe("## 📖 2 Messages");
  });

  it("keeps multi-line content on one table row", () => {
    const current = emptyGroups();
    current.warning.push(violation("warning", { content: "line one\nline two" }));
    const body = renderSummary(current, { dangerId: "danger" });
    expect(stripMeta(body)).toContain("| ⚠️ | line one<br>line two |");
    expect(parseBody(body)[0].content).toBe("line one\nline two");
  });
});

describe("parsing", () => {
  it("recovers every finding of a summary in order", () => {
    const current = emptyGroups();
    current.error.push(violation("error", { content: "Use <!-- x --> carefully", sticky: true }));
    current.warning.push(violation("warning", { content: "Ünïcode ✓", file: "src/ä.ts", line: 1 }));
    current.message.push(violation("message", { content: "fyi" }));

    expect(parseBody(renderSummary(current, { dangerId: "danger" }))).toEqual([
      current.error[0],
      current.warning[0],
      current.message[0],
    ]);
  });

  it("keeps only sticky findings as previous state", () => {
    const current = emptyGroups();
    current.error.push(violation("error", { content: "sticky", sticky: true }), violation("error", { content: "loose" }));
    const previous = parsePrevious(renderSummary(current, { dangerId: "danger" }));
    expect(previous.error.map((v) => v.content)).toEqual(["sticky"]);
    expect(previous.warning).toEqual([]);
  });

  it("skips metadata it can't decode", () => {
    expect(parseBody("<!-- v:abc -->\nplain text")).toEqual([]);
    expect(parseBody("no metadata here")).toEqual([]);
  });
});

describe("resolvedSince", () => {
  it("lists sticky previous findings no current finding repeats, once each", () => {
    const current = emptyGroups();
    current.error.push(violation("error", { content: "still here", file: "a.ts", line: 1 }));
    const previous = emptyGroups();
    previous.error.push(
      violation("error", { content: "still here", file: "a.ts", line: 1, sticky: true }),
      violation("error", { content: "fixed", sticky: true }),
      violation("error", { content: "fixed", sticky: true }),
      violation("error", { content: "not sticky" }),
    );

    expect(resolvedSince(current, previous).error.map((v) => v.content)).toEqual(["fixed"]);
  });
});
