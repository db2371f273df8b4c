import type { Comment, PreviousViolations, ViolationGroups } from "../types.js";
import { summaryComments } from "../comments/comment.js";
import { renderSummary } from "../comments/codec.js";
import { isEmptyGroups } from "../violations/model.js";
import { errorMessage } from "../logger.js";
import type { PassContext } from "./context.js";
import { attempt } from "./outcome.js";

export interface SummaryInput {
  current: ViolationGroups;
  previous: PreviousViolations;
  /** Most recent tool summary comment, if any. */
  canonical: Comment | undefined;
  createNew: boolean;
  removePrevious: boolean;
  /** Whether the pass runs with anchored comments. */
  inline: boolean;
  snapshot: Comment[];
}

/**
 * Keep exactly one summary comment in step with the findings that aren't
 * shown inline. In inline mode a forced removal is followed by a fresh
 * summary; otherwise it only deletes. Create/update failures propagate: the
 * pass has failed if the summary can't be written.
 */
export async function syncSummary(ctx: PassContext, input: SummaryInput): Promise<void> {
  const nothingToSay = isEmptyGroups(input.previous) && isEmptyGroups(input.current);

  if (nothingToSay || input.removePrevious) {
    const removed = await deleteSummaryComments(ctx, input.snapshot);
    ctx.logger.info("Removed previous summary comments", { removed });
    // Without anchored comments a forced removal leaves no summary behind
    if (!input.inline) return;
  }
  if (nothingToSay) return;

  const body = renderSummary(input.current, { dangerId: ctx.dangerId, previous: input.previous });

  if (input.createNew || !input.canonical) {
    try {
      const created = await ctx.gateway.createComment(body);
      ctx.actions.record("create", "ok", { commentId: created.id });
      ctx.logger.info("Created summary comment", { commentId: created.id });
    } catch (err) {
      ctx.actions.record("create", "failed", { error: err });
      throw err;
    }
    return;
  }

  const canonical = input.canonical;
  if (canonical.body === body) {
    ctx.logger.debug("Summary comment already up to date", { commentId: canonical.id });
    return;
  }

  try {
    await ctx.gateway.updateComment(canonical.id, body);
    ctx.actions.record("update", "ok", { commentId: canonical.id });
    ctx.logger.info("Updated summary comment", { commentId: canonical.id });
  } catch (err) {
    ctx.actions.record("update", "failed", { commentId: canonical.id, error: err });
    throw err;
  }
}

/**
 * Best-effort removal of every tool summary comment in the snapshot except
 * `except`. A failed delete is folded into a skipped action.
 */
export async function deleteSummaryComments(ctx: PassContext, snapshot: Comment[], except?: string): Promise<number> {
  let removed = 0;
  for (const comment of summaryComments(snapshot)) {
    if (comment.id === except) continue;

    const deleted = await attempt(() => ctx.gateway.deleteComment(comment.id));
    ctx.actions.recordOutcome("delete", deleted, "skipped", { commentId: comment.id });
    if (deleted.ok) {
      removed++;
    } else {
      ctx.logger.debug("Summary comment already gone", { commentId: comment.id, error: errorMessage(deleted.error) });
    }
  }
  return removed;
}
