import { describe, it, expect } from "vitest";
import { parseAuthStatus } from "../auth-check.js";

describe("parseAuthStatus", () => {
  it("finds the user logged in to the host", () => {
    const output = [
      "gitlab.example.com",
      "  ✓ Logged in to gitlab.example.com as ci-bot (GITLAB_TOKEN)",
      "  ✓ Git operations for gitlab.example.com configured to use https protocol.",
    ].join("\n");
    expect(parseAuthStatus(output, "gitlab.example.com")).toEqual({ authenticated: true, username: "ci-bot" });
  });

  it("doesn't let dots in the host match any character", () => {
    expect(parseAuthStatus("✓ Logged in to gitlabXexample.com as someone", "gitlab.example.com")).toEqual({
      authenticated: true,
    });
  });

  it("reports a missing login", () => {
    expect(parseAuthStatus("x gitlab.com: api call failed: 401 Unauthorized", "gitlab.com")).toEqual({ authenticated: false });
  });
});
