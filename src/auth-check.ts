import { execFile } from "node:child_process";
import type { GitLabConfig } from "./types.js";

export interface AuthStatus {
  available: boolean;
  authenticated: boolean;
  username?: string;
  error?: string;
}

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/** Read the output of `glab auth status` for one host. */
export function parseAuthStatus(output: string, host: string): Pick<AuthStatus, "authenticated" | "username"> {
  const escaped = host.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const match = output.match(new RegExp(`Logged in to ${escaped} as (\\S+)`));
  if (match) return { authenticated: true, username: match[1] };
  return { authenticated: /Logged in to/.test(output) };
}

/**
 * Check glab CLI availability and auth status for the configured host.
 * Uses `glab auth status`, which exits non-zero when no token is usable.
 */
export function checkGlabAuth(config: Pick<GitLabConfig, "host" | "token">, timeoutMs: number = 5000): Promise<AuthStatus> {
  const { host } = config;
  const env = { ...process.env };
  if (config.token) env.GITLAB_TOKEN = config.token;

  return new Promise((resolve) => {
    execFile("glab", ["auth", "status", "--hostname", host], { timeout: timeoutMs, env }, (err, stdout, stderr) => {
      if (err) {
        const code = errorCode(err);
        // ENOENT = command not found
        if (code === "ENOENT") {
          resolve({ available: false, authenticated: false, error: "glab CLI not found" });
          return;
        }
        // EACCES = permission denied (exists but not executable)
        if (code === "EACCES") {
          resolve({ available: false, authenticated: false, error: "glab CLI not executable (permission denied)" });
          return;
        }
        const output = stdout + stderr;
        resolve({ available: true, authenticated: false, error: output.trim().slice(0, 200) });
        return;
      }
      // glab prints its status report on stderr
      resolve({ available: true, ...parseAuthStatus(stdout + stderr, host) });
    });
  });
}
