import type { Anchor, Comment } from "../types.js";
import { isRecord } from "../guards.js";

export function toolMarker(dangerId: string): string {
  return `generated_by_${dangerId}`;
}

export function isGeneratedBy(body: string, dangerId: string): boolean {
  return body.includes(toolMarker(dangerId));
}

export function sameAnchor(a: Anchor | undefined, b: Anchor | undefined): boolean {
  if (!a || !b) return false;
  return a.file === b.file && a.line === b.line;
}

/** GitLab note as returned by the notes and discussions endpoints (fields we read). */
export interface GitLabNote {
  id: number | string;
  body: string;
  system?: boolean;
  position?: {
    new_path?: string | null;
    new_line?: number | null;
  } | null;
}

export interface GitLabDiscussion {
  id: string;
  notes: GitLabNote[];
}

export function isGitLabNote(value: unknown): value is GitLabNote {
  if (!isRecord(value)) return false;
  return (typeof value.id === "number" || typeof value.id === "string") && typeof value.body === "string";
}

export function isGitLabDiscussion(value: unknown): value is GitLabDiscussion {
  if (!isRecord(value)) return false;
  return typeof value.id === "string" && Array.isArray(value.notes) && value.notes.every(isGitLabNote);
}

function anchorOf(note: GitLabNote): Anchor | undefined {
  const position = note.position;
  if (!position || typeof position.new_path !== "string" || typeof position.new_line !== "number") {
    return undefined;
  }
  return { file: position.new_path, line: position.new_line };
}

export function fromGitLabNote(note: GitLabNote, dangerId: string, discussionId?: string): Comment {
  const comment: Comment = {
    id: String(note.id),
    body: note.body,
    authorIsTool: isGeneratedBy(note.body, dangerId),
  };
  if (discussionId !== undefined) comment.discussionId = discussionId;
  const target = anchorOf(note);
  if (target) comment.target = target;
  return comment;
}

/** Flatten discussions into their notes, each remembering the discussion it belongs to. */
export function fromGitLabDiscussions(discussions: GitLabDiscussion[], dangerId: string): Comment[] {
  return discussions.flatMap((d) => d.notes.map((note) => fromGitLabNote(note, dangerId, d.id)));
}

/** Tool-authored comments that are not anchored to a diff line (the summary comment). */
export function summaryComments(snapshot: Comment[]): Comment[] {
  return snapshot.filter((c) => c.authorIsTool && !c.target);
}

/** Tool-authored comments anchored to a diff line. */
export function anchoredToolComments(snapshot: Comment[]): Comment[] {
  return snapshot.filter((c) => c.authorIsTool && c.target !== undefined);
}

/**
 * A tool comment has a human reply when a non-tool comment shares its
 * discussion or its anchor.
 */
export function hasHumanReply(comment: Comment, snapshot: Comment[]): boolean {
  return snapshot.some((other) => {
    if (other.authorIsTool || other.id === comment.id) return false;
    if (comment.discussionId !== undefined && other.discussionId === comment.discussionId) return true;
    return sameAnchor(other.target, comment.target);
  });
}
