import type { AppConfig, MergeRequestRef, PassResult, ViolationGroups } from "./types.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./logger.js";
import type { CommentGateway } from "./gitlab/gateway.js";
import { GlabGateway } from "./gitlab/gateway.js";
import { GlabClient, createGlabRunner, type GlabRunner } from "./gitlab/glab.js";
import { DryRunGateway } from "./gitlab/dry-run.js";
import { Reconciler } from "./sync/reconciler.js";
import { applyIgnored, ignoredContents } from "./violations/ignored.js";
import { countGroups } from "./violations/model.js";
import type { MetricsCollector } from "./metrics.js";
import type { PrometheusExporter } from "./prometheus.js";
import { HistoryStore } from "./history/store.js";

export type RunTarget =
  | { mode: "update"; mr: MergeRequestRef; report: ViolationGroups }
  | { mode: "delete-all"; mr: MergeRequestRef; except?: string };

export type RunOutcome =
  | { mode: "update"; result: PassResult; ignored: number }
  | { mode: "delete-all"; removed: number };

export interface RunDeps {
  gateway: CommentGateway;
  logger: Logger;
  metrics: MetricsCollector;
  exporter?: PrometheusExporter;
  history?: HistoryStore;
}

export function formatMergeRequest(mr: MergeRequestRef): string {
  return `${mr.project}!${mr.iid}`;
}

/** Gateway for one merge request, wrapped for dry runs when configured. */
export function createGateway(
  config: AppConfig,
  mr: MergeRequestRef,
  logger: Logger,
  run: GlabRunner = createGlabRunner(config.gitlab),
): CommentGateway {
  const gateway = new GlabGateway(new GlabClient(mr, run));
  return config.sync.dryRun ? new DryRunGateway(gateway, logger.child({ phase: "dry-run" })) : gateway;
}

async function filterIgnored(gateway: CommentGateway, report: ViolationGroups, log: Logger): Promise<{ groups: ViolationGroups; ignored: number }> {
  // Only warnings and errors can be silenced, so skip the read when there are none
  if (report.warning.length === 0 && report.error.length === 0) {
    return { groups: report, ignored: 0 };
  }
  const ignored = ignoredContents(await gateway.fetchDescription());
  const groups = applyIgnored(report, ignored);
  const dropped = countGroups(report) - countGroups(groups);
  if (dropped > 0) {
    log.info("Ignoring violations listed in the merge request description", { ignored: dropped });
  }
  return { groups, ignored: dropped };
}

/**
 * Run one reconciliation pass for a merge request and record its outcome in
 * metrics and history. Fatal errors are recorded, then rethrown.
 */
export async function runPass(config: AppConfig, target: RunTarget, deps: RunDeps): Promise<RunOutcome> {
  const { gateway, metrics, history, exporter } = deps;
  const { dangerId } = config.sync;
  const log = deps.logger.child({ mr: formatMergeRequest(target.mr), dangerId });
  const reconciler = new Reconciler(gateway, log, { minInlineVersion: config.sync.minInlineVersion });
  const started = Date.now();

  try {
    if (target.mode === "delete-all") {
      const removed = await reconciler.deleteAllToolComments({ dangerId, except: target.except });
      return { mode: "delete-all", removed };
    }

    const { groups, ignored } = await filterIgnored(gateway, target.report, log);
    const result = await reconciler.update({
      warnings: groups.warning,
      errors: groups.error,
      messages: groups.message,
      markdowns: groups.markdown,
      dangerId,
      newComment: config.sync.newComment,
      removePreviousComments: config.sync.removePreviousComments,
    });

    metrics.recordPass(result);
    history?.record(HistoryStore.fromResult(target.mr, dangerId, result));
    return { mode: "update", result, ignored };
  } catch (err) {
    const durationMs = Date.now() - started;
    metrics.recordFailure(durationMs);
    history?.record(HistoryStore.fromFailure(target.mr, dangerId, errorMessage(err), durationMs));
    throw err;
  } finally {
    if (exporter && config.metrics.textfilePath) {
      exporter.updateMetrics(metrics.snapshot());
      try {
        await exporter.writeTextfile(config.metrics.textfilePath);
      } catch (err) {
        log.warn("Failed to write metrics textfile", { path: config.metrics.textfilePath, error: errorMessage(err) });
      }
    }
  }
}
