import type { Anchor, Comment, DiffRefs } from "../types.js";
import { fromGitLabDiscussions, fromGitLabNote } from "../comments/comment.js";
import type { GlabClient } from "./glab.js";

/**
 * `discussions` reads every note with its thread and anchor (needed for
 * inline comments); `notes` is the flat listing used when anchored comments
 * are unavailable.
 */
export type CommentSource = "discussions" | "notes";

export interface CommentGateway {
  fetchChangedPaths(): Promise<string[]>;
  fetchComments(source: CommentSource, dangerId: string): Promise<Comment[]>;
  fetchDiffRefs(): Promise<DiffRefs>;
  fetchDescription(): Promise<string>;
  createComment(body: string): Promise<Comment>;
  createAnchoredComment(body: string, anchor: Anchor, refs: DiffRefs): Promise<Comment>;
  updateComment(id: string, body: string): Promise<void>;
  updateAnchoredComment(discussionId: string, id: string, body: string): Promise<void>;
  deleteComment(id: string): Promise<void>;
  clientVersion(): Promise<string | null>;
  serverVersion(): Promise<string | null>;
}

export class GlabGateway implements CommentGateway {
  constructor(private client: GlabClient) {}

  fetchChangedPaths(): Promise<string[]> {
    return this.client.listChangedPaths();
  }

  async fetchComments(source: CommentSource, dangerId: string): Promise<Comment[]> {
    if (source === "discussions") {
      return fromGitLabDiscussions(await this.client.listDiscussions(), dangerId);
    }
    const notes = await this.client.listNotes();
    return notes.map((note) => fromGitLabNote(note, dangerId));
  }

  async fetchDiffRefs(): Promise<DiffRefs> {
    const details = await this.client.getMergeRequest();
    if (!details.diffRefs) {
      throw new Error(`Merge request ${this.client.label} has no diff refs yet`);
    }
    return details.diffRefs;
  }

  async fetchDescription(): Promise<string> {
    return (await this.client.getMergeRequest()).description;
  }

  async createComment(body: string): Promise<Comment> {
    const note = await this.client.createNote(body);
    return { id: String(note.id), body: note.body, authorIsTool: true };
  }

  async createAnchoredComment(body: string, anchor: Anchor, refs: DiffRefs): Promise<Comment> {
    const discussion = await this.client.createDiscussion(body, {
      position_type: "text",
      new_path: anchor.file,
      new_line: anchor.line,
      base_sha: refs.baseSha,
      start_sha: refs.startSha,
      head_sha: refs.headSha,
    });
    const first = discussion.notes[0];
    return {
      id: first ? String(first.id) : "",
      discussionId: discussion.id,
      target: anchor,
      body,
      authorIsTool: true,
    };
  }

  updateComment(id: string, body: string): Promise<void> {
    return this.client.editNote(id, body);
  }

  updateAnchoredComment(discussionId: string, id: string, body: string): Promise<void> {
    return this.client.updateDiscussionNote(discussionId, id, body);
  }

  deleteComment(id: string): Promise<void> {
    return this.client.deleteNote(id);
  }

  async clientVersion(): Promise<string | null> {
    return this.client.clientVersion();
  }

  async serverVersion(): Promise<string | null> {
    return this.client.serverVersion();
  }
}
