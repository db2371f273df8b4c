import { writeFileSync, mkdirSync, renameSync } from "node:fs";
import { dirname } from "node:path";
import { Registry, Gauge } from "prom-client";
import type { MetricsSnapshot } from "./metrics.js";

/**
 * Prometheus exporter for reconciliation passes.
 *
 * A pass is a short-lived process, so metrics are synced from a snapshot into
 * gauges and written in text format for the node_exporter textfile collector.
 */
export class PrometheusExporter {
  private registry: Registry;

  private passesGauge: Gauge<string>;
  private failedPassesGauge: Gauge;
  private actionsGauge: Gauge<string>;
  private reportedGauge: Gauge;

  private passDurationAvg: Gauge;
  private passDurationP95: Gauge;
  private passDurationMax: Gauge;

  constructor() {
    this.registry = new Registry();

    this.passesGauge = new Gauge({
      name: "mr_thread_sync_passes_total",
      help: "Reconciliation passes completed, by mode (inline or regular)",
      labelNames: ["mode"],
      registers: [this.registry],
    });

    this.failedPassesGauge = new Gauge({
      name: "mr_thread_sync_failed_passes_total",
      help: "Reconciliation passes that ended with a fatal error",
      registers: [this.registry],
    });

    this.actionsGauge = new Gauge({
      name: "mr_thread_sync_actions_total",
      help: "Remote comment writes by action and outcome",
      labelNames: ["action", "outcome"],
      registers: [this.registry],
    });

    this.reportedGauge = new Gauge({
      name: "mr_thread_sync_reported_violations_total",
      help: "Violations reported through the summary comment",
      registers: [this.registry],
    });

    this.passDurationAvg = new Gauge({
      name: "mr_thread_sync_pass_duration_avg_seconds",
      help: "Average pass duration (rolling window)",
      registers: [this.registry],
    });

    this.passDurationP95 = new Gauge({
      name: "mr_thread_sync_pass_duration_p95_seconds",
      help: "95th percentile pass duration (rolling window)",
      registers: [this.registry],
    });

    this.passDurationMax = new Gauge({
      name: "mr_thread_sync_pass_duration_max_seconds",
      help: "Maximum pass duration (rolling window)",
      registers: [this.registry],
    });
  }

  updateMetrics(snapshot: MetricsSnapshot): void {
    for (const [mode, count] of Object.entries(snapshot.passes.byMode)) {
      this.passesGauge.labels(mode).set(count);
    }
    this.failedPassesGauge.set(snapshot.passes.failed);

    for (const [action, outcomes] of Object.entries(snapshot.actions)) {
      for (const [outcome, count] of Object.entries(outcomes)) {
        this.actionsGauge.labels(action, outcome).set(count);
      }
    }

    this.reportedGauge.set(snapshot.reported);

    if (snapshot.timings) {
      this.passDurationAvg.set(snapshot.timings.avg / 1000);
      this.passDurationP95.set(snapshot.timings.p95 / 1000);
      this.passDurationMax.set(snapshot.timings.max / 1000);
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /** Write the current metrics through a temp file and rename it into place. */
  async writeTextfile(path: string): Promise<void> {
    const text = await this.getMetrics();
    mkdirSync(dirname(path), { recursive: true });
    const tmp = `${path}.${process.pid}.tmp`;
    writeFileSync(tmp, text, "utf-8");
    renameSync(tmp, path);
  }
}
