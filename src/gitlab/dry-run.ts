import type { Anchor, Comment, DiffRefs } from "../types.js";
import type { Logger } from "../logger.js";
import type { CommentGateway, CommentSource } from "./gateway.js";

/**
 * Reads from the wrapped gateway, logs writes instead of performing them.
 * Created comments get placeholder ids so a pass can run to completion.
 */
export class DryRunGateway implements CommentGateway {
  private nextId = 1;

  constructor(
    private inner: CommentGateway,
    private logger: Logger,
  ) {}

  fetchChangedPaths(): Promise<string[]> {
    return this.inner.fetchChangedPaths();
  }

  fetchComments(source: CommentSource, dangerId: string): Promise<Comment[]> {
    return this.inner.fetchComments(source, dangerId);
  }

  fetchDiffRefs(): Promise<DiffRefs> {
    return this.inner.fetchDiffRefs();
  }

  fetchDescription(): Promise<string> {
    return this.inner.fetchDescription();
  }

  clientVersion(): Promise<string | null> {
    return this.inner.clientVersion();
  }

  serverVersion(): Promise<string | null> {
    return this.inner.serverVersion();
  }

  async createComment(body: string): Promise<Comment> {
    const id = this.placeholderId();
    this.logger.info("Dry run: would create comment", { id, bodyLength: body.length });
    return { id, body, authorIsTool: true };
  }

  async createAnchoredComment(body: string, anchor: Anchor, refs: DiffRefs): Promise<Comment> {
    const id = this.placeholderId();
    this.logger.info("Dry run: would create anchored comment", {
      id,
      file: anchor.file,
      line: anchor.line,
      headSha: refs.headSha.slice(0, 7),
    });
    return { id, discussionId: id, target: anchor, body, authorIsTool: true };
  }

  async updateComment(id: string, body: string): Promise<void> {
    this.logger.info("Dry run: would update comment", { id, bodyLength: body.length });
  }

  async updateAnchoredComment(discussionId: string, id: string, body: string): Promise<void> {
    this.logger.info("Dry run: would update anchored comment", { discussionId, id, bodyLength: body.length });
  }

  async deleteComment(id: string): Promise<void> {
    this.logger.info("Dry run: would delete comment", { id });
  }

  private placeholderId(): string {
    return `dry-run-${this.nextId++}`;
  }
}
