import type { DiffRefs, PassResult, Violation, ViolationGroups, ViolationKind } from "../types.js";
import type { CommentGateway } from "../gitlab/gateway.js";
import type { Logger } from "../logger.js";
import { summaryComments } from "../comments/comment.js";
import { parsePrevious } from "../comments/codec.js";
import { classify, mergeGroups } from "../violations/classify.js";
import { countGroups, emptyGroups } from "../violations/model.js";
import type { PassContext } from "./context.js";
import { detectInlineSupport, DEFAULT_MIN_INLINE_VERSION } from "./capability.js";
import { submitInlineComments } from "./inline.js";
import { ActionLog, attempt } from "./outcome.js";
import { errorMessage } from "../logger.js";
import { deleteSummaryComments, syncSummary } from "./summary.js";

export interface UpdateRequest {
  warnings?: Violation[];
  errors?: Violation[];
  messages?: Violation[];
  markdowns?: Violation[];
  dangerId: string;
  newComment?: boolean;
  removePreviousComments?: boolean;
}

export interface DeleteAllRequest {
  except?: string;
  dangerId: string;
}

export interface ReconcilerOptions {
  minInlineVersion?: string;
}

function withKind(kind: ViolationKind, violations: Violation[] | undefined): Violation[] {
  return (violations ?? []).map((v) => (v.kind === kind ? v : { ...v, kind }));
}

/**
 * Converges a merge request's comment thread onto the current findings.
 * Each call is one pass over a single snapshot of the remote comments.
 */
export class Reconciler {
  private minInlineVersion: string;

  constructor(
    private gateway: CommentGateway,
    private logger: Logger,
    options: ReconcilerOptions = {},
  ) {
    this.minInlineVersion = options.minInlineVersion ?? DEFAULT_MIN_INLINE_VERSION;
  }

  async update(request: UpdateRequest): Promise<PassResult> {
    const started = Date.now();
    const { dangerId } = request;
    const newComment = request.newComment ?? false;
    const removePrevious = request.removePreviousComments ?? false;

    const log = this.logger.child({ dangerId, phase: "reconcile" });
    const ctx: PassContext = { gateway: this.gateway, dangerId, logger: log, actions: new ActionLog() };

    const groups: ViolationGroups = {
      warning: withKind("warning", request.warnings),
      error: withKind("error", request.errors),
      message: withKind("message", request.messages),
      markdown: withKind("markdown", request.markdowns),
    };

    const inline = await detectInlineSupport(this.gateway, this.minInlineVersion, log);
    const snapshot = await this.gateway.fetchComments(inline ? "discussions" : "notes", dangerId);

    const summaries = summaryComments(snapshot);
    const canonical = summaries.length > 0 ? summaries[summaries.length - 1] : undefined;
    const createNew = newComment || removePrevious || !canonical;
    let previous = createNew || !canonical ? emptyGroups() : parsePrevious(canonical.body);

    log.info("Reconciling comments", {
      inline,
      violations: countGroups(groups),
      comments: snapshot.length,
      toolComments: snapshot.filter((c) => c.authorIsTool).length,
      createNew,
    });

    let reported: ViolationGroups;
    if (inline) {
      const classified = classify(groups);
      const hasInline = countGroups(classified.inline) > 0;
      const changedPaths = hasInline ? await this.gateway.fetchChangedPaths() : [];
      const refs = hasInline ? await this.diffRefs(log) : null;

      const result = await submitInlineComments(ctx, {
        inline: classified.inline,
        changedPaths,
        previous,
        snapshot,
        refs,
      });
      previous = result.previous;
      reported = mergeGroups(classified.regular, result.rest);
    } else {
      reported = groups;
    }

    await syncSummary(ctx, {
      current: reported,
      previous,
      canonical,
      createNew,
      removePrevious,
      inline,
      snapshot,
    });

    const actions = ctx.actions.all;
    log.info("Reconciliation finished", {
      actions: actions.length,
      failed: actions.filter((a) => a.outcome === "failed").length,
      reported: countGroups(reported),
    });

    return { inline, actions, reported, durationMs: Date.now() - started };
  }

  /** Without diff refs nothing new can be anchored; those findings go to the summary. */
  private async diffRefs(log: Logger): Promise<DiffRefs | null> {
    const refs = await attempt(() => this.gateway.fetchDiffRefs());
    if (!refs.ok) {
      log.warn("Diff refs unavailable, new findings will only appear in the summary", { error: errorMessage(refs.error) });
      return null;
    }
    return refs.value;
  }

  /** Remove every tool summary comment except `except`. Returns how many went away. */
  async deleteAllToolComments(request: DeleteAllRequest): Promise<number> {
    const log = this.logger.child({ dangerId: request.dangerId, phase: "cleanup" });
    const ctx: PassContext = {
      gateway: this.gateway,
      dangerId: request.dangerId,
      logger: log,
      actions: new ActionLog(),
    };
    const snapshot = await this.gateway.fetchComments("notes", request.dangerId);
    const removed = await deleteSummaryComments(ctx, snapshot, request.except);
    log.info("Deleted tool comments", { removed });
    return removed;
  }
}
