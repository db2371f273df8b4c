// --- Config ---

export interface GitLabConfig {
  token: string;
  apiBaseUrl: string;
  host: string;
  cliTimeoutMs: number;
}

export interface SyncConfig {
  dangerId: string;
  newComment: boolean;
  removePreviousComments: boolean;
  dryRun: boolean;
  minInlineVersion: string; // first GitLab version with anchored discussions
}

export interface HistoryConfig {
  enabled: boolean;
  dbPath: string;
  retentionDays: number;
}

export interface MetricsConfig {
  textfilePath: string; // empty = don't write
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  logLevel: LogLevel;
  gitlab: GitLabConfig;
  sync: SyncConfig;
  history: HistoryConfig;
  metrics: MetricsConfig;
}

// --- Violations ---

export type ViolationKind = "warning" | "error" | "message" | "markdown";

export const VIOLATION_KINDS: readonly ViolationKind[] = ["warning", "error", "message", "markdown"];

export interface Violation {
  kind: ViolationKind;
  content: string;
  file?: string;
  line?: number;
  sticky: boolean;
}

export type ViolationGroups = Record<ViolationKind, Violation[]>;

/** Sticky violations recovered from the last summary comment, per kind. */
export type PreviousViolations = ViolationGroups;

// --- Remote comments ---

export interface Anchor {
  file: string;
  line: number;
}

export interface Comment {
  id: string;
  discussionId?: string;
  target?: Anchor;
  body: string;
  authorIsTool: boolean;
}

export interface DiffRefs {
  baseSha: string;
  startSha: string;
  headSha: string;
}

export interface MergeRequestRef {
  project: string; // "group/project" or numeric id
  iid: number;
}

// --- Pass outcome ---

export type ActionKind = "create" | "update" | "resolve" | "delete";

export type ActionOutcome = "ok" | "failed" | "skipped";

export interface ActionRecord {
  action: ActionKind;
  outcome: ActionOutcome;
  commentId?: string;
  anchor?: Anchor;
  error?: string;
}

export interface PassResult {
  inline: boolean;
  actions: ActionRecord[];
  reported: ViolationGroups;
  durationMs: number;
}
