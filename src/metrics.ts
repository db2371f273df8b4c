import type { ActionKind, ActionOutcome, PassResult } from "./types.js";

export type PassMode = "inline" | "regular";

export interface TimingStats {
  min: number;
  max: number;
  avg: number;
  p95: number;
  count: number;
}

export interface MetricsSnapshot {
  passes: {
    total: number;
    failed: number;
    byMode: Record<PassMode, number>;
  };
  actions: Record<ActionKind, Record<ActionOutcome, number>>;
  reported: number;
  timings: TimingStats | null;
}

const ROLLING_WINDOW = 100;

function computeStats(values: number[]): TimingStats | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);
  const p95Index = Math.min(Math.floor(sorted.length * 0.95), sorted.length - 1);
  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Math.round(sum / sorted.length),
    p95: sorted[p95Index],
    count: sorted.length,
  };
}

function emptyOutcomes(): Record<ActionOutcome, number> {
  return { ok: 0, failed: 0, skipped: 0 };
}

export class MetricsCollector {
  private passCount = 0;
  private failedPassCount = 0;
  private modeCounts: Record<PassMode, number> = { inline: 0, regular: 0 };
  private actionCounts: Record<ActionKind, Record<ActionOutcome, number>> = {
    create: emptyOutcomes(),
    update: emptyOutcomes(),
    resolve: emptyOutcomes(),
    delete: emptyOutcomes(),
  };
  private reportedCount = 0;

  // Pass duration rolling window
  private durations: number[] = [];

  recordPass(result: PassResult): void {
    this.passCount++;
    this.modeCounts[result.inline ? "inline" : "regular"]++;
    for (const a of result.actions) {
      this.actionCounts[a.action][a.outcome]++;
    }
    for (const group of Object.values(result.reported)) {
      this.reportedCount += group.length;
    }
    this.recordDuration(result.durationMs);
  }

  recordFailure(durationMs: number): void {
    this.passCount++;
    this.failedPassCount++;
    this.recordDuration(durationMs);
  }

  private recordDuration(ms: number): void {
    this.durations.push(ms);
    if (this.durations.length > ROLLING_WINDOW) {
      this.durations.shift();
    }
  }

  snapshot(): MetricsSnapshot {
    const counts = this.actionCounts;
    return {
      passes: {
        total: this.passCount,
        failed: this.failedPassCount,
        byMode: { ...this.modeCounts },
      },
      actions: {
        create: { ...counts.create },
        update: { ...counts.update },
        resolve: { ...counts.resolve },
        delete: { ...counts.delete },
      },
      reported: this.reportedCount,
      timings: computeStats(this.durations),
    };
  }
}
