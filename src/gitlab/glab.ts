import { execFile } from "node:child_process";
import type { GitLabConfig, MergeRequestRef } from "../types.js";
import type { GitLabDiscussion, GitLabNote } from "../comments/comment.js";
import { isGitLabDiscussion, isGitLabNote } from "../comments/comment.js";
import { isRecord } from "../guards.js";

export type GlabRunner = (args: string[], input?: string) => Promise<string>;

export class GitLabCliError extends Error {
  constructor(
    public args: string[],
    public stderr: string,
    cause?: unknown,
  ) {
    super(`glab ${args.join(" ")} failed: ${stderr.trim() || (cause instanceof Error ? cause.message : String(cause))}`);
    this.name = "GitLabCliError";
  }
}

export function createGlabRunner(config: GitLabConfig): GlabRunner {
  return (args, input) => new Promise((resolve, reject) => {
    const env = { ...process.env };
    if (config.token) env.GITLAB_TOKEN = config.token;
    if (config.host) env.GITLAB_HOST = config.host;

    let stdinError: Error | undefined;
    const child = execFile("glab", args, {
      encoding: "utf-8",
      maxBuffer: 10 * 1024 * 1024,
      env,
      timeout: config.cliTimeoutMs,
    }, (err, stdout, stderr) => {
      if (err) return reject(new GitLabCliError(args, stderr, err));
      // glab exited cleanly without reading the whole body
      if (stdinError) return reject(new GitLabCliError(args, stderr, stdinError));
      resolve(stdout.trim());
    });

    if (input !== undefined && child.stdin) {
      child.stdin.on("error", (err) => {
        stdinError = err;
      });
      child.stdin.write(input);
      child.stdin.end();
    }
  });
}

const PER_PAGE = 100;

/** Anchor of a new diff discussion, in the shape the discussions endpoint takes. */
export interface NotePosition {
  position_type: "text";
  new_path: string;
  new_line: number;
  base_sha: string;
  start_sha: string;
  head_sha: string;
}

export interface MergeRequestDetails {
  description: string;
  diffRefs: { baseSha: string; startSha: string; headSha: string } | null;
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Failed to parse ${what} response: ${text.slice(0, 200)}`);
  }
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Thin wrapper around `glab api` for the merge request endpoints the
 * reconciler needs. Every call is one child process; nothing is cached.
 */
export class GlabClient {
  private base: string;

  constructor(
    private mr: MergeRequestRef,
    private run: GlabRunner,
  ) {
    this.base = `projects/${encodeURIComponent(mr.project)}/merge_requests/${mr.iid}`;
  }

  get label(): string {
    return `${this.mr.project}!${this.mr.iid}`;
  }

  private async paginate(path: string, what: string): Promise<unknown[]> {
    const items: unknown[] = [];
    const sep = path.includes("?") ? "&" : "?";
    for (let page = 1; ; page++) {
      const text = await this.run(["api", `${path}${sep}per_page=${PER_PAGE}&page=${page}`]);
      const data = text ? parseJson(text, what) : [];
      if (!Array.isArray(data)) {
        throw new Error(`Expected an array from ${what}, got ${typeof data}`);
      }
      items.push(...data);
      if (data.length < PER_PAGE) return items;
    }
  }

  private async send(method: "POST" | "PUT" | "DELETE", path: string, payload?: object): Promise<string> {
    const args = ["api", "--method", method, path];
    if (payload === undefined) return this.run(args);
    // Bodies go through stdin, never argv
    return this.run([...args, "--header", "Content-Type: application/json", "--input", "-"], JSON.stringify(payload));
  }

  async listNotes(): Promise<GitLabNote[]> {
    const raw = await this.paginate(`${this.base}/notes?sort=asc&order_by=created_at`, "notes");
    return raw.filter(isGitLabNote);
  }

  async listDiscussions(): Promise<GitLabDiscussion[]> {
    const raw = await this.paginate(`${this.base}/discussions`, "discussions");
    return raw.filter(isGitLabDiscussion);
  }

  async getMergeRequest(): Promise<MergeRequestDetails> {
    const data = parseJson(await this.run(["api", this.base]), "merge request");
    if (!isRecord(data)) throw new Error(`Unexpected merge request response for ${this.label}`);

    const refs = data.diff_refs;
    let diffRefs: MergeRequestDetails["diffRefs"] = null;
    if (isRecord(refs)) {
      const baseSha = stringField(refs, "base_sha");
      const startSha = stringField(refs, "start_sha");
      const headSha = stringField(refs, "head_sha");
      if (baseSha && startSha && headSha) diffRefs = { baseSha, startSha, headSha };
    }

    return { description: stringField(data, "description") ?? "", diffRefs };
  }

  async listChangedPaths(): Promise<string[]> {
    const raw = await this.paginate(`${this.base}/diffs`, "diffs");
    const paths: string[] = [];
    for (const change of raw) {
      if (!isRecord(change)) continue;
      const path = stringField(change, "new_path");
      if (path) paths.push(path);
    }
    return paths;
  }

  async createNote(body: string): Promise<GitLabNote> {
    const data = parseJson(await this.send("POST", `${this.base}/notes`, { body }), "create note");
    if (!isGitLabNote(data)) throw new Error(`Unexpected create note response for ${this.label}`);
    return data;
  }

  async editNote(noteId: string, body: string): Promise<void> {
    await this.send("PUT", `${this.base}/notes/${noteId}`, { body });
  }

  async deleteNote(noteId: string): Promise<void> {
    await this.send("DELETE", `${this.base}/notes/${noteId}`);
  }

  async createDiscussion(body: string, position: NotePosition): Promise<GitLabDiscussion> {
    const data = parseJson(
      await this.send("POST", `${this.base}/discussions`, { body, position }),
      "create discussion",
    );
    if (!isGitLabDiscussion(data)) throw new Error(`Unexpected create discussion response for ${this.label}`);
    return data;
  }

  async updateDiscussionNote(discussionId: string, noteId: string, body: string): Promise<void> {
    await this.send("PUT", `${this.base}/discussions/${discussionId}/notes/${noteId}`, { body });
  }

  /** Version of the GitLab instance, e.g. "16.5.1-ee". */
  async serverVersion(): Promise<string | null> {
    const data = parseJson(await this.run(["api", "version"]), "version");
    return isRecord(data) ? stringField(data, "version") ?? null : null;
  }

  /** Version of the installed glab CLI, or null when it can't be read. */
  async clientVersion(): Promise<string | null> {
    const text = await this.run(["--version"]);
    return text.match(/(\d+\.\d+\.\d+)/)?.[1] ?? null;
  }
}
