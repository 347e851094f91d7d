// src/metrics.ts

import type { Logger } from "./logger.js";
import type { ReconcileSummary } from "./types.js";

export type Counter = "rounds" | "polls" | "failedPolls" | "changes" | "fetched" | "deleted" | "skipped";

interface Timing {
  start: number;
  duration?: number;
}

export class Metrics {
  private timings = new Map<string, Timing>();
  private counters = new Map<Counter, number>();

  constructor(private readonly now: () => number = Date.now) {}

  startTimer(label: string): void {
    this.timings.set(label, { start: this.now() });
  }

  endTimer(label: string): void {
    const timing = this.timings.get(label);
    if (timing) timing.duration = this.now() - timing.start;
  }

  getTimer(label: string): number | undefined {
    return this.timings.get(label)?.duration;
  }

  increment(counter: Counter, by = 1): void {
    this.counters.set(counter, this.count(counter) + by);
  }

  count(counter: Counter): number {
    return this.counters.get(counter) ?? 0;
  }

  recordReconcile(summary: ReconcileSummary): void {
    this.increment("fetched", summary.fetched.length);
    this.increment("deleted", summary.deleted.length);
    this.increment("skipped", summary.skipped.length);
  }

  print(logger: Logger): void {
    logger.always("\n⏱️  Metrics:");
    logger.always("=".repeat(60));

    const sorted = [...this.timings.entries()]
      .filter(([, t]) => t.duration !== undefined)
      .sort(([, a], [, b]) => (b.duration ?? 0) - (a.duration ?? 0));

    for (const [label, timing] of sorted) {
      const seconds = ((timing.duration ?? 0) / 1000).toFixed(2);
      logger.always(`  ${label.padEnd(30)} ${seconds.padStart(8)}s`);
    }

    for (const [counter, value] of this.counters) {
      logger.always(`  ${counter.padEnd(30)} ${String(value).padStart(9)}`);
    }

    logger.always("=".repeat(60));
  }
}
