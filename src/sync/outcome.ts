import type { ActionKind, ActionOutcome, ActionRecord, Anchor } from "../types.js";
import { errorMessage } from "../logger.js";

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/** Run a remote call and capture its failure as a value instead of a throw. */
export async function attempt<T>(call: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await call() };
  } catch (error) {
    return { ok: false, error };
  }
}

/** Ordered record of every remote write a pass issued and how it ended. */
export class ActionLog {
  private records: ActionRecord[] = [];

  record(action: ActionKind, outcome: ActionOutcome, details: { commentId?: string; anchor?: Anchor; error?: unknown } = {}): void {
    const entry: ActionRecord = { action, outcome };
    if (details.commentId !== undefined) entry.commentId = details.commentId;
    if (details.anchor) entry.anchor = details.anchor;
    if (details.error !== undefined) entry.error = errorMessage(details.error);
    this.records.push(entry);
  }

  /** Record the result of an attempted call; failures count as `failOutcome`. */
  recordOutcome<T>(
    action: ActionKind,
    outcome: Outcome<T>,
    failOutcome: Exclude<ActionOutcome, "ok">,
    details: { commentId?: string; anchor?: Anchor } = {},
  ): void {
    if (outcome.ok) {
      this.record(action, "ok", details);
    } else {
      this.record(action, failOutcome, { ...details, error: outcome.error });
    }
  }

  get all(): ActionRecord[] {
    return [...this.records];
  }

  count(action: ActionKind, outcome: ActionOutcome = "ok"): number {
    return this.records.filter((r) => r.action === action && r.outcome === outcome).length;
  }
}
