import type { Anchor, Violation, ViolationGroups, ViolationKind } from "../types.js";
import { VIOLATION_KINDS } from "../types.js";

export interface ViolationInit {
  content: string;
  file?: string;
  line?: number;
  sticky?: boolean;
}

export function violation(kind: ViolationKind, init: ViolationInit): Violation {
  const v: Violation = { kind, content: init.content, sticky: init.sticky ?? false };
  if (init.file !== undefined) v.file = init.file;
  if (init.line !== undefined) v.line = init.line;
  return v;
}

export function isInline(v: Violation): v is Violation & Anchor {
  return v.file !== undefined && v.line !== undefined;
}

/** Two findings are the same finding when they point at the same place with the same text. */
export function areEquivalent(a: Violation, b: Violation): boolean {
  return a.file === b.file && a.line === b.line && a.content === b.content;
}

export function emptyGroups(): ViolationGroups {
  return { warning: [], error: [], message: [], markdown: [] };
}

export function countGroups(groups: ViolationGroups): number {
  return VIOLATION_KINDS.reduce((sum, kind) => sum + groups[kind].length, 0);
}

export function isEmptyGroups(groups: ViolationGroups): boolean {
  return countGroups(groups) === 0;
}

export function cloneGroups(groups: ViolationGroups): ViolationGroups {
  return {
    warning: [...groups.warning],
    error: [...groups.error],
    message: [...groups.message],
    markdown: [...groups.markdown],
  };
}
