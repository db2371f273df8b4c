import type { ViolationGroups } from "../types.js";

const IGNORE_LINE = /^\s*>\s*(?:danger:\s*)?ignore\s+"(.*)"\s*$/i;

/**
 * Collect the contents a merge request description asks to silence.
 * Each directive sits on its own quoted line: `> Ignore "Some warning text"`,
 * optionally written `> Danger: Ignore "Some warning text"`.
 */
export function ignoredContents(description: string | null | undefined): Set<string> {
  const ignored = new Set<string>();
  if (!description) return ignored;

  for (const line of description.split(/\r?\n/)) {
    const match = line.match(IGNORE_LINE);
    if (match && match[1]) ignored.add(match[1]);
  }
  return ignored;
}

/** Drop ignored warnings and errors. Messages and markdowns always go through. */
export function applyIgnored(groups: ViolationGroups, ignored: Set<string>): ViolationGroups {
  if (ignored.size === 0) return groups;
  return {
    ...groups,
    warning: groups.warning.filter((v) => !ignored.has(v.content)),
    error: groups.error.filter((v) => !ignored.has(v.content)),
  };
}
