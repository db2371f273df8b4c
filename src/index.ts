#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { loadConfig } from "./config.js";
import { createRootLogger, errorMessage } from "./logger.js";
import { isRecord } from "./guards.js";
import { checkGlabAuth } from "./auth-check.js";
import { parseArgs, UsageError, USAGE, type CliArgs } from "./cli-args.js";
import { loadViolationReport } from "./violations/report.js";
import { MetricsCollector } from "./metrics.js";
import { PrometheusExporter } from "./prometheus.js";
import { HistoryStore } from "./history/store.js";
import { createGateway, formatMergeRequest, runPass, type RunTarget } from "./run.js";

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    return isRecord(pkg) && typeof pkg.version === "string" ? pkg.version : "unknown";
  } catch {
    return "unknown";
  }
}

const VERSION = readVersion();

async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`Error: ${err.message}`);
    console.error(USAGE);
    return 1;
  }

  if (args.command === "help") {
    console.log(USAGE);
    return 0;
  }
  if (args.command === "version") {
    console.log(VERSION);
    return 0;
  }

  const config = loadConfig(args.configPath, createRootLogger());
  if (args.dangerId) config.sync.dangerId = args.dangerId;
  if (args.command === "update") {
    if (args.newComment) config.sync.newComment = true;
    if (args.removePreviousComments) config.sync.removePreviousComments = true;
  }

  const logger = createRootLogger(config.logLevel);
  const label = formatMergeRequest(args.mr);

  // Bad input is fatal before any remote call
  const target: RunTarget = args.command === "update"
    ? { mode: "update", mr: args.mr, report: loadViolationReport(args.reportPath) }
    : { mode: "delete-all", mr: args.mr, except: args.except };

  const auth = await checkGlabAuth(config.gitlab);
  if (!auth.available || !auth.authenticated) {
    logger.error("glab CLI is not ready", { host: config.gitlab.host, error: auth.error });
    return 1;
  }

  logger.info("mr-thread-sync starting", {
    version: VERSION,
    mr: label,
    mode: target.mode,
    dangerId: config.sync.dangerId,
    glabUser: auth.username,
    dryRun: config.sync.dryRun,
  });
  if (config.sync.dryRun) {
    logger.warn("DRY RUN MODE: comments will be computed but NOT written to GitLab");
  }

  const history = config.history.enabled ? new HistoryStore(config.history.dbPath) : undefined;
  const exporter = config.metrics.textfilePath ? new PrometheusExporter() : undefined;

  try {
    const outcome = await runPass(config, target, {
      gateway: createGateway(config, args.mr, logger),
      logger,
      metrics: new MetricsCollector(),
      exporter,
      history,
    });

    if (outcome.mode === "delete-all") {
      console.log(`Removed ${outcome.removed} comment(s) from ${label}`);
    } else {
      const { result } = outcome;
      const failed = result.actions.filter((a) => a.outcome === "failed").length;
      console.log(
        `Synced ${label} (${result.inline ? "inline" : "summary only"}): ` +
          `${result.actions.length} action(s), ${failed} failed, ${outcome.ignored} ignored`,
      );
    }
    return 0;
  } catch (err) {
    logger.error("Reconciliation failed", { mr: label, error: errorMessage(err) });
    return 1;
  } finally {
    if (history) {
      const removed = history.cleanup(config.history.retentionDays);
      if (removed > 0) logger.debug("Pruned run history", { removed });
      history.close();
    }
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("mr-thread-sync failed:", errorMessage(err));
    process.exit(1);
  },
);
