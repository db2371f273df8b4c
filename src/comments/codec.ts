import type { PreviousViolations, Violation, ViolationGroups, ViolationKind } from "../types.js";
import { VIOLATION_KINDS } from "../types.js";
import { areEquivalent, emptyGroups, isInline } from "../violations/model.js";
import { toolMarker } from "./comment.js";
import { isRecord } from "../guards.js";

const KIND_EMOJI: Record<ViolationKind, string> = {
  warning: "⚠️",
  error: "🚫",
  message: "📖",
  markdown: "📝",
};

const RESOLVED_EMOJI = "✅";

const KIND_LABELS: Record<ViolationKind, [singular: string, plural: string]> = {
  warning: ["Warning", "Warnings"],
  error: ["Error", "Errors"],
  message: ["Message", "Messages"],
  markdown: ["Note", "Notes"],
};

// Summary tables list errors first.
const SUMMARY_ORDER: ViolationKind[] = ["error", "warning", "message", "markdown"];

const META_PATTERN = /<!-- v:([A-Za-z0-9_-]+) -->/g;

const FOOTER = "🤖 *Kept in sync by mr-thread-sync*";

// --- Row metadata ---

interface RowMeta {
  k: ViolationKind;
  c: string;
  f?: string;
  l?: number;
  s?: true;
}

function encodeMeta(v: Violation): string {
  const meta: RowMeta = { k: v.kind, c: v.content };
  if (v.file !== undefined) meta.f = v.file;
  if (v.line !== undefined) meta.l = v.line;
  if (v.sticky) meta.s = true;
  return `<!-- v:${Buffer.from(JSON.stringify(meta), "utf-8").toString("base64url")} -->`;
}

function isKind(value: unknown): value is ViolationKind {
  return typeof value === "string" && VIOLATION_KINDS.some((k) => k === value);
}

function decodeMeta(encoded: string): Violation | null {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(encoded, "base64url").toString("utf-8"));
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const { k, c, f, l, s } = data;
  if (!isKind(k) || typeof c !== "string") return null;

  const v: Violation = { kind: k, content: c, sticky: s === true };
  if (typeof f === "string") v.file = f;
  if (typeof l === "number") v.line = l;
  return v;
}

// --- Rendering ---

function location(v: Violation): string {
  return isInline(v) ? `\`${v.file}:${v.line}\` ` : "";
}

function tableCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, "<br>");
}

function heading(kind: ViolationKind, count: number): string {
  const [singular, plural] = KIND_LABELS[kind];
  return `${KIND_EMOJI[kind]} ${count} ${count === 1 ? singular : plural}`;
}

export interface SummaryOptions {
  dangerId: string;
  previous?: PreviousViolations;
}

/** Sticky findings from the previous run that no current finding repeats. */
export function resolvedSince(current: ViolationGroups, previous: PreviousViolations | undefined): ViolationGroups {
  const resolved = emptyGroups();
  if (!previous) return resolved;
  for (const kind of VIOLATION_KINDS) {
    const seen: Violation[] = [];
    for (const pv of previous[kind]) {
      if (!pv.sticky) continue;
      if (current[kind].some((v) => areEquivalent(v, pv))) continue;
      if (seen.some((v) => areEquivalent(v, pv))) continue;
      seen.push(pv);
    }
    resolved[kind] = seen;
  }
  return resolved;
}

/**
 * Render the single summary comment: one table per kind with current
 * findings, followed by sticky findings from earlier runs marked resolved.
 */
export function renderSummary(current: ViolationGroups, options: SummaryOptions): string {
  const resolved = resolvedSince(current, options.previous);
  const parts: string[] = [`<!-- ${toolMarker(options.dangerId)} -->`, ""];

  const counts = SUMMARY_ORDER
    .filter((kind) => kind !== "markdown" && current[kind].length > 0)
    .map((kind) => heading(kind, current[kind].length));
  parts.push(counts.length > 0 ? `## ${counts.join(", ")}` : `## ${RESOLVED_EMOJI} Nothing left to address`);
  parts.push("");

  for (const kind of SUMMARY_ORDER) {
    if (kind === "markdown") continue;
    const rows = current[kind];
    const done = resolved[kind];
    if (rows.length === 0 && done.length === 0) continue;

    parts.push(`### ${KIND_LABELS[kind][1]}`);
    parts.push("");
    parts.push("| | |");
    parts.push("|---|---|");
    for (const v of rows) {
      parts.push(`| ${KIND_EMOJI[kind]} | ${location(v)}${tableCell(v.content)} ${encodeMeta(v)} |`);
    }
    for (const v of done) {
      parts.push(`| ${RESOLVED_EMOJI} | ${location(v)}<del>${tableCell(v.content)}</del> ${encodeMeta(v)} |`);
    }
    parts.push("");
  }

  for (const v of current.markdown) {
    parts.push(v.content);
    parts.push(encodeMeta(v));
    parts.push("");
  }
  for (const v of resolved.markdown) {
    parts.push(`${RESOLVED_EMOJI} <del>${v.content}</del>`);
    parts.push(encodeMeta(v));
    parts.push("");
  }

  parts.push("---");
  parts.push(FOOTER);
  return parts.join("\n");
}

export interface InlineOptions {
  dangerId: string;
  resolved?: boolean;
}

/** Render the body of a comment anchored to one diff line. */
export function renderInline(v: Violation, options: InlineOptions): string {
  const parts: string[] = [`<!-- ${toolMarker(options.dangerId)} -->`, ""];

  if (options.resolved) {
    parts.push(`${RESOLVED_EMOJI} <del>${v.content}</del>`);
  } else if (v.kind === "markdown") {
    parts.push(v.content);
  } else {
    parts.push(`${KIND_EMOJI[v.kind]} **${v.kind}:** ${v.content}`);
  }

  parts.push("");
  parts.push(encodeMeta(v));
  return parts.join("\n");
}

// --- Parsing ---

/** Recover every finding recorded in a body rendered by this module, in order. */
export function parseBody(body: string): Violation[] {
  const found: Violation[] = [];
  for (const match of body.matchAll(META_PATTERN)) {
    const v = decodeMeta(match[1]);
    if (v) found.push(v);
  }
  return found;
}

/**
 * Previous-run state carried by a summary comment. Only sticky findings
 * survive: a non-sticky finding that disappears is simply dropped.
 */
export function parsePrevious(body: string): PreviousViolations {
  const previous = emptyGroups();
  for (const v of parseBody(body)) {
    if (v.sticky) previous[v.kind].push(v);
  }
  return previous;
}
