import type { Anchor, Comment, DiffRefs, PreviousViolations, Violation, ViolationGroups } from "../types.js";
import { VIOLATION_KINDS } from "../types.js";
import { anchoredToolComments, hasHumanReply, sameAnchor } from "../comments/comment.js";
import { parseBody, renderInline } from "../comments/codec.js";
import { areEquivalent, cloneGroups, emptyGroups, isInline } from "../violations/model.js";
import { errorMessage } from "../logger.js";
import type { PassContext } from "./context.js";
import { attempt } from "./outcome.js";

export interface InlineInput {
  /** Inline findings per kind, already in comparator order. */
  inline: ViolationGroups;
  changedPaths: string[];
  previous: PreviousViolations;
  snapshot: Comment[];
  refs: DiffRefs | null;
}

export interface InlineResult {
  /** Findings that didn't make it into an anchored comment; they go to the summary. */
  rest: ViolationGroups;
  /** Previous state minus findings now shown inline. */
  previous: PreviousViolations;
}

interface InlineState {
  pool: Comment[];
  changed: Set<string>;
  previous: PreviousViolations;
  refs: DiffRefs | null;
}

/**
 * Post, refresh, resolve or remove anchored comments so they match the
 * current inline findings. Kinds share one pool of existing tool comments:
 * whatever is still in the pool at the end no longer has a finding.
 */
export async function submitInlineComments(ctx: PassContext, input: InlineInput): Promise<InlineResult> {
  const state: InlineState = {
    pool: anchoredToolComments(input.snapshot),
    changed: new Set(input.changedPaths),
    previous: cloneGroups(input.previous),
    refs: input.refs,
  };
  const rest = emptyGroups();

  for (const kind of VIOLATION_KINDS) {
    for (const v of input.inline[kind]) {
      const consumed = await submitOne(ctx, state, v);
      if (!consumed) rest[kind].push(v);
    }
  }

  await settleStale(ctx, state.pool, input.snapshot);

  return { rest, previous: state.previous };
}

async function submitOne(ctx: PassContext, state: InlineState, v: Violation): Promise<boolean> {
  if (!isInline(v)) return false;

  // The platform can only render anchors on files in the current diff
  if (!state.changed.has(v.file)) {
    ctx.logger.debug("Finding outside the diff, leaving it for the summary", { file: v.file, line: v.line });
    return false;
  }

  const body = renderInline(v, { dangerId: ctx.dangerId });
  const anchor: Anchor = { file: v.file, line: v.line };

  // Now shown inline, so it no longer belongs in the summary's resolved rows
  if (v.kind !== "markdown") {
    state.previous[v.kind] = state.previous[v.kind].filter((pv) => !areEquivalent(pv, v));
  }

  const existing = claimFromPool(state, v, anchor);

  if (!existing) {
    if (!state.refs) return false;
    const refs = state.refs;
    const created = await attempt(() => ctx.gateway.createAnchoredComment(body, anchor, refs));
    ctx.actions.recordOutcome("create", created, "failed", {
      anchor,
      commentId: created.ok ? created.value.id : undefined,
    });
    if (!created.ok) {
      ctx.logger.error("Failed to create anchored comment", {
        file: anchor.file,
        line: anchor.line,
        error: errorMessage(created.error),
        body,
      });
      return false;
    }
    return true;
  }

  if (existing.body === body) return true;

  const updated = await attempt(() => updateAnchored(ctx, existing, body));
  ctx.actions.recordOutcome("update", updated, "failed", { anchor, commentId: existing.id });
  if (!updated.ok) {
    ctx.logger.error("Failed to update anchored comment", {
      commentId: existing.id,
      file: anchor.file,
      line: anchor.line,
      error: errorMessage(updated.error),
      body,
    });
    return false;
  }
  return true;
}

/**
 * Take one pool comment for a finding: the one already showing it, else the
 * first at its anchor. Other comments at that anchor stay in the pool.
 */
function claimFromPool(state: InlineState, v: Violation, anchor: Anchor): Comment | undefined {
  const atAnchor = state.pool.filter((c) => sameAnchor(c.target, anchor));
  const claimed = atAnchor.find((c) => parseBody(c.body).some((decoded) => areEquivalent(decoded, v))) ?? atAnchor[0];
  if (claimed) state.pool = state.pool.filter((c) => c !== claimed);
  return claimed;
}

function updateAnchored(ctx: PassContext, comment: Comment, body: string): Promise<void> {
  if (comment.discussionId === undefined) {
    return ctx.gateway.updateComment(comment.id, body);
  }
  return ctx.gateway.updateAnchoredComment(comment.discussionId, comment.id, body);
}

async function settleStale(ctx: PassContext, stale: Comment[], snapshot: Comment[]): Promise<void> {
  for (const comment of stale) {
    const [decoded] = parseBody(comment.body);

    if (decoded?.sticky) {
      const body = renderInline(decoded, { dangerId: ctx.dangerId, resolved: true });
      if (body === comment.body) continue;

      const resolved = await attempt(() => updateAnchored(ctx, comment, body));
      ctx.actions.recordOutcome("resolve", resolved, "failed", { commentId: comment.id, anchor: comment.target });
      if (!resolved.ok) {
        ctx.logger.error("Failed to mark anchored comment resolved", {
          commentId: comment.id,
          error: errorMessage(resolved.error),
        });
      }
      continue;
    }

    if (hasHumanReply(comment, snapshot)) {
      ctx.logger.debug("Keeping stale comment with replies", { commentId: comment.id });
      continue;
    }

    const deleted = await attempt(() => ctx.gateway.deleteComment(comment.id));
    ctx.actions.recordOutcome("delete", deleted, "skipped", { commentId: comment.id, anchor: comment.target });
    if (!deleted.ok) {
      ctx.logger.debug("Stale comment already gone", { commentId: comment.id, error: errorMessage(deleted.error) });
    }
  }
}
