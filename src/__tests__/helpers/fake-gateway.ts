import type { Anchor, Comment, DiffRefs } from "../../types.js";
import type { CommentGateway, CommentSource } from "../../gitlab/gateway.js";
import { isGeneratedBy } from "../../comments/comment.js";

export interface FakeNote {
  id: string;
  body: string;
  discussionId?: string;
  target?: Anchor;
}

export interface FakeCall {
  method: keyof CommentGateway;
  args: unknown[];
}

const WRITE_METHODS = new Set<string>([
  "createComment",
  "createAnchoredComment",
  "updateComment",
  "updateAnchoredComment",
  "deleteComment",
]);

/** In-memory merge request thread that records every gateway call. */
export class FakeGateway implements CommentGateway {
  notes: FakeNote[] = [];
  changedPaths: string[] = [];
  description = "";
  refs: DiffRefs | null = { baseSha: "base000", startSha: "start000", headSha: "head000" };
  client: string | null = "1.36.0";
  server: string | null = "16.5.1-ee";
  calls: FakeCall[] = [];
  failWhen: ((call: FakeCall) => boolean) | null = null;
  private nextId = 100;

  seed(note: Omit<FakeNote, "id"> & { id?: string }): FakeNote {
    const seeded: FakeNote = { ...note, id: note.id ?? String(this.nextId++) };
    this.notes.push(seeded);
    return seeded;
  }

  get writes(): FakeCall[] {
    return this.calls.filter((c) => WRITE_METHODS.has(c.method));
  }

  note(id: string): FakeNote | undefined {
    return this.notes.find((n) => n.id === id);
  }

  private track(method: keyof CommentGateway, ...args: unknown[]): void {
    const call: FakeCall = { method, args };
    this.calls.push(call);
    if (this.failWhen?.(call)) {
      throw new Error(`${method} failed`);
    }
  }

  async fetchChangedPaths(): Promise<string[]> {
    this.track("fetchChangedPaths");
    return [...this.changedPaths];
  }

  async fetchComments(source: CommentSource, dangerId: string): Promise<Comment[]> {
    this.track("fetchComments", source, dangerId);
    return this.notes.map((n) => {
      const comment: Comment = { id: n.id, body: n.body, authorIsTool: isGeneratedBy(n.body, dangerId) };
      if (source === "discussions" && n.discussionId !== undefined) comment.discussionId = n.discussionId;
      if (n.target) comment.target = { ...n.target };
      return comment;
    });
  }

  async fetchDiffRefs(): Promise<DiffRefs> {
    this.track("fetchDiffRefs");
    if (!this.refs) throw new Error("no diff refs yet");
    return this.refs;
  }

  async fetchDescription(): Promise<string> {
    this.track("fetchDescription");
    return this.description;
  }

  async createComment(body: string): Promise<Comment> {
    this.track("createComment", body);
    const note = this.seed({ body });
    return { id: note.id, body, authorIsTool: true };
  }

  async createAnchoredComment(body: string, anchor: Anchor, refs: DiffRefs): Promise<Comment> {
    this.track("createAnchoredComment", body, anchor, refs);
    const id = String(this.nextId++);
    const note = this.seed({ id, body, discussionId: `d${id}`, target: { ...anchor } });
    return { id: note.id, discussionId: note.discussionId, target: anchor, body, authorIsTool: true };
  }

  async updateComment(id: string, body: string): Promise<void> {
    this.track("updateComment", id, body);
    this.mustFind(id).body = body;
  }

  async updateAnchoredComment(discussionId: string, id: string, body: string): Promise<void> {
    this.track("updateAnchoredComment", discussionId, id, body);
    const note = this.mustFind(id);
    if (note.discussionId !== discussionId) throw new Error(`note ${id} is not in discussion ${discussionId}`);
    note.body = body;
  }

  async deleteComment(id: string): Promise<void> {
    this.track("deleteComment", id);
    this.mustFind(id);
    this.notes = this.notes.filter((n) => n.id !== id);
  }

  async clientVersion(): Promise<string | null> {
    this.track("clientVersion");
    return this.client;
  }

  async serverVersion(): Promise<string | null> {
    this.track("serverVersion");
    return this.server;
  }

  private mustFind(id: string): FakeNote {
    const note = this.note(id);
    if (!note) throw new Error(`404 Note ${id} not found`);
    return note;
  }
}
