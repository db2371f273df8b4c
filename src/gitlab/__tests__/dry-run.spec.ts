import { describe, it, expect } from "vitest";
import { DryRunGateway } from "../dry-run.js";
import { createRootLogger } from "../../logger.js";
import { FakeGateway } from "../../__tests__/helpers/fake-gateway.js";

describe("DryRunGateway", () => {
  it("reads through and logs writes without performing them", async () => {
    const inner = new FakeGateway();
    inner.seed({ id: "1", body: "<!-- generated_by_danger -->" });
    const lines: string[] = [];
    const gateway = new DryRunGateway(inner, createRootLogger("info", (_level, line) => lines.push(line)));

    expect(await gateway.fetchComments("notes", "danger")).toHaveLength(1);
    const created = await gateway.createComment("body");
    const anchored = await gateway.createAnchoredComment("b", { file: "a.ts", line: 2 }, { baseSha: "b", startSha: "s", headSha: "abcdef123" });
    await gateway.updateComment("1", "new");
    await gateway.deleteComment("1");

    expect(created.id).toBe("dry-run-1");
    expect(anchored).toEqual({ id: "dry-run-2", discussionId: "dry-run-2", target: { file: "a.ts", line: 2 }, body: "b", authorIsTool: true });
    expect(inner.writes).toEqual([]);
    expect(inner.note("1")?.body).toBe("<!-- generated_by_danger -->");
    expect(lines.map((l) => JSON.parse(l).msg)).toEqual([
      "Dry run: would create comment",
      "Dry run: would create anchored comment",
      "Dry run: would update comment",
      "Dry run: would delete comment",
    ]);
    expect(JSON.parse(lines[1]).headSha).toBe("abcdef1");
  });
});
