import type { Violation, ViolationGroups } from "../types.js";
import { VIOLATION_KINDS } from "../types.js";
import { emptyGroups, isInline } from "./model.js";

export interface Classified {
  regular: ViolationGroups;
  inline: ViolationGroups;
}

/**
 * Total order for inline findings: unanchored first, then by file path, then by line.
 * Keeps comments for the same file next to each other regardless of input order.
 */
export function compareInline(a: Violation, b: Violation): number {
  const aAnchored = isInline(a);
  const bAnchored = isInline(b);
  if (aAnchored !== bAnchored) return aAnchored ? 1 : -1;
  if (!isInline(a) || !isInline(b)) return 0;

  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  return a.line - b.line;
}

export function classify(groups: ViolationGroups): Classified {
  const regular = emptyGroups();
  const inline = emptyGroups();

  for (const kind of VIOLATION_KINDS) {
    for (const v of groups[kind]) {
      if (isInline(v)) {
        inline[kind].push(v);
      } else {
        regular[kind].push(v);
      }
    }
    inline[kind].sort(compareInline);
  }

  return { regular, inline };
}

export function mergeGroups(...sources: ViolationGroups[]): ViolationGroups {
  const merged = emptyGroups();
  for (const source of sources) {
    for (const kind of VIOLATION_KINDS) {
      merged[kind].push(...source[kind]);
    }
  }
  return merged;
}
