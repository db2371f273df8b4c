import { readFileSync } from "node:fs";
import type { Violation, ViolationGroups, ViolationKind } from "../types.js";
import { emptyGroups, violation } from "./model.js";
import { isRecord } from "../guards.js";

/** Report keys as written by the analysis step, mapped to violation kinds. */
const REPORT_KEYS: Record<string, ViolationKind> = {
  warnings: "warning",
  errors: "error",
  messages: "message",
  markdowns: "markdown",
};

export class ReportError extends Error {
  constructor(public field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "ReportError";
  }
}

function parseEntry(kind: ViolationKind, raw: unknown, field: string): Violation {
  if (typeof raw === "string") {
    return violation(kind, { content: raw });
  }
  if (!isRecord(raw)) {
    throw new ReportError(field, "must be a string or an object");
  }

  const { content, file, line, sticky } = raw;
  if (typeof content !== "string" || content.length === 0) {
    throw new ReportError(`${field}.content`, "must be a non-empty string");
  }
  if (file !== undefined && file !== null && (typeof file !== "string" || file.length === 0)) {
    throw new ReportError(`${field}.file`, "must be a non-empty string");
  }
  if (line !== undefined && line !== null && (typeof line !== "number" || !Number.isInteger(line) || line < 1)) {
    throw new ReportError(`${field}.line`, "must be a positive integer");
  }
  if (sticky !== undefined && typeof sticky !== "boolean") {
    throw new ReportError(`${field}.sticky`, "must be a boolean");
  }

  return violation(kind, {
    content,
    file: typeof file === "string" ? file : undefined,
    line: typeof line === "number" ? line : undefined,
    sticky,
  });
}

/** Validate a decoded violation report. Unknown top-level keys are rejected. */
export function parseViolationReport(data: unknown): ViolationGroups {
  if (!isRecord(data)) {
    throw new ReportError("report", "must be a JSON object");
  }

  const groups = emptyGroups();
  for (const [key, entries] of Object.entries(data)) {
    const kind = Object.hasOwn(REPORT_KEYS, key) ? REPORT_KEYS[key] : undefined;
    if (!kind) {
      throw new ReportError(key, `unknown key (expected one of: ${Object.keys(REPORT_KEYS).join(", ")})`);
    }
    if (!Array.isArray(entries)) {
      throw new ReportError(key, "must be an array");
    }
    entries.forEach((entry: unknown, i) => {
      groups[kind].push(parseEntry(kind, entry, `${key}[${i}]`));
    });
  }
  return groups;
}

export function loadViolationReport(path: string): ViolationGroups {
  const raw = readFileSync(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ReportError("report", `invalid JSON in ${path} (${err instanceof Error ? err.message : String(err)})`);
  }
  return parseViolationReport(data);
}
