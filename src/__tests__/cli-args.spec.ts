import { describe, it, expect } from "vitest";
import { parseArgs, parseMergeRequest, UsageError } from "../cli-args.js";

describe("parseMergeRequest", () => {
  it("splits project path and iid", () => {
    expect(parseMergeRequest("group/sub/app!42")).toEqual({ project: "group/sub/app", iid: 42 });
    expect(parseMergeRequest("1234!5")).toEqual({ project: "1234", iid: 5 });
  });

  it("rejects malformed references", () => {
    expect(() => parseMergeRequest("app!1")).toThrow(UsageError);
    expect(() => parseMergeRequest("group/app#1")).toThrow('Invalid --mr format "group/app#1"');
    expect(() => parseMergeRequest("group/app!0")).toThrow('Invalid merge request iid in "group/app!0"');
  });
});

describe("parseArgs", () => {
  it("reads an update run", () => {
    expect(
      parseArgs(["--mr", "group/app!7", "--report", "out/report.json", "--danger-id", "lint", "--new-comment"]),
    ).toEqual({
      command: "update",
      mr: { project: "group/app", iid: 7 },
      configPath: "config.yaml",
      dangerId: "lint",
      reportPath: "out/report.json",
      newComment: true,
      removePreviousComments: false,
    });
  });

  it("reads a delete-all run", () => {
    expect(parseArgs(["--delete-all", "--mr", "group/app!7", "--except", "99", "--config", "ci.yaml"])).toEqual({
      command: "delete-all",
      mr: { project: "group/app", iid: 7 },
      configPath: "ci.yaml",
      dangerId: undefined,
      except: "99",
    });
  });

  it("answers help and version before validating", () => {
    expect(parseArgs(["--help"])).toEqual({ command: "help" });
    expect(parseArgs(["--mr", "nope", "--version"])).toEqual({ command: "version" });
  });

  it("explains what is missing", () => {
    expect(() => parseArgs([])).toThrow("--mr is required");
    expect(() => parseArgs(["--mr", "group/app!7"])).toThrow("--report is required unless --delete-all is given");
    expect(() => parseArgs(["--mr", "group/app!7", "--report"])).toThrow("--report requires a value");
    expect(() => parseArgs(["--mr", "group/app!7", "--report", "r.json", "--except", "1"])).toThrow(
      "--except only applies to --delete-all",
    );
    expect(() => parseArgs(["--mr", "group/app!7", "--delete-all", "--report", "r.json"])).toThrow(
      "--delete-all does not take a --report",
    );
  });

  it("rejects unknown arguments and bad danger ids", () => {
    expect(() => parseArgs(["--pr", "1"])).toThrow('Unknown argument "--pr"');
    expect(() => parseArgs(["--mr", "group/app!7", "--report", "r.json", "--danger-id", "a b"])).toThrow(
      'Invalid --danger-id "a b"',
    );
  });
});
