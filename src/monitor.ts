// src/monitor.ts

import { setTimeout as sleep } from "timers/promises";
import type { ChangeRecord, ReconcileSummary } from "./types.js";
import type { FeedReader } from "./reader.js";
import type { FeedWatcher } from "./watcher.js";
import type { Logger } from "./logger.js";
import type { Metrics } from "./metrics.js";
import { printChanges } from "./report.js";
import { errorMessage } from "./errors.js";

/** The part of the reconciliation engine the monitor drives */
export interface ReferenceSync {
  reconcile(activeReferences: Iterable<string>): Promise<ReconcileSummary>;
}

export interface MonitorContext {
  reader: FeedReader;
  watchers: FeedWatcher[];
  reconciler: ReferenceSync;
  logger: Logger;
  metrics?: Metrics;
  loopDelayMs?: number;
}

/**
 * Runs every watcher that is due, one at a time, and reconciles the union of
 * all watchers' references once per round in which at least one of them polled.
 */
export class Monitor {
  private readonly reader: FeedReader;
  private readonly watchers: FeedWatcher[];
  private readonly reconciler: ReferenceSync;
  private readonly logger: Logger;
  private readonly metrics: Metrics | undefined;
  private readonly loopDelayMs: number;

  constructor(ctx: MonitorContext) {
    this.reader = ctx.reader;
    this.watchers = ctx.watchers;
    this.reconciler = ctx.reconciler;
    this.logger = ctx.logger;
    this.metrics = ctx.metrics;
    this.loopDelayMs = ctx.loopDelayMs ?? 1000;
    this.logger.log(`Initialized ${this.watchers.length} watchers`);
  }

  activeReferences(): Set<string> {
    const all = new Set<string>();
    for (const watcher of this.watchers) {
      for (const reference of watcher.activeReferences) all.add(reference);
    }
    return all;
  }

  async runOnce(): Promise<ChangeRecord[]> {
    if (!(await this.reader.ensureConnected())) {
      this.logger.log("Could not connect to the rundown server", "error");
      return [];
    }

    this.metrics?.increment("rounds");
    let polled = false;
    const changes: ChangeRecord[] = [];

    for (const watcher of this.watchers) {
      if (!watcher.isDue()) continue;

      if (!(await this.reader.navigateTo(watcher.path))) {
        this.logger.log(`Failed navigating to ${watcher.path}`, "error");
        continue;
      }

      this.metrics?.startTimer(`poll:${watcher.name}`);
      const results = await watcher.poll();
      this.metrics?.endTimer(`poll:${watcher.name}`);
      this.metrics?.increment("polls");
      if (watcher.lastOutcome === "failed") this.metrics?.increment("failedPolls");
      polled = true;

      if (results.length) {
        this.metrics?.increment("changes", results.length);
        printChanges(results, this.logger);
        changes.push(...results);
      }
    }

    if (polled) {
      this.metrics?.startTimer("reconcile");
      const summary = await this.reconciler.reconcile(this.activeReferences());
      this.metrics?.endTimer("reconcile");
      this.metrics?.recordReconcile(summary);
    }

    return changes;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.log("Starting multi-feed monitoring...");
    try {
      while (!signal.aborted) {
        try {
          await this.runOnce();
        } catch (e) {
          this.logger.log(`Round failed: ${errorMessage(e)}`, "error");
        }

        try {
          await sleep(this.loopDelayMs, undefined, { signal });
        } catch {
          break; // aborted
        }
      }
    } finally {
      this.logger.log("Stopping...");
      this.reader.disconnect();
    }
  }
}
