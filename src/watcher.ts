// src/watcher.ts

import { createHash } from "crypto";
import type { ChangeRecord, Entry, FeedConfig } from "./types.js";
import type { FeedReader } from "./reader.js";
import type { Logger } from "./logger.js";
import { extractEntryInfo, hasMatch } from "./labels.js";
import { errorMessage } from "./errors.js";

export type WatcherState = "idle" | "polling";
export type PollOutcome = "completed" | "failed";

export interface WatcherContext {
  reader: FeedReader;
  logger: Logger;
  now?: () => number;
}

export function fingerprint(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Polls one feed: lists its entries, keeps a fingerprint per entry name to
 * report changes, and remembers the references found on the last poll that
 * managed to list the feed.
 */
export class FeedWatcher {
  readonly name: string;
  readonly path: string;
  state: WatcherState = "idle";
  lastOutcome: PollOutcome | undefined;
  lastRunAt = 0;

  private readonly intervalMs: number;
  private readonly reader: FeedReader;
  private readonly logger: Logger;
  private readonly now: () => number;
  private fingerprints = new Map<string, string>();
  private references: string[] = [];

  constructor(private readonly config: FeedConfig, ctx: WatcherContext) {
    this.name = config.name;
    this.path = config.path;
    this.intervalMs = config.intervalSeconds * 1000;
    this.reader = ctx.reader;
    this.logger = ctx.logger;
    this.now = ctx.now ?? Date.now;
  }

  get activeReferences(): readonly string[] {
    return this.references;
  }

  get knownEntries(): ReadonlyMap<string, string> {
    return this.fingerprints;
  }

  isDue(): boolean {
    return this.now() - this.lastRunAt >= this.intervalMs;
  }

  /** Lists the reader's current folder; the caller navigates to `path` first */
  async poll(): Promise<ChangeRecord[]> {
    this.logger.log(`Polling ${this.name} (${this.path})...`);
    this.state = "polling";
    this.lastRunAt = this.now();

    try {
      const entries = await this.list();
      if (entries.length === 0) {
        // Keep the previous references: an outage must not look like an empty feed
        this.logger.log(`No entries found or listing failed for ${this.path}`, "warn");
        this.lastOutcome = "failed";
        return [];
      }

      const changes: ChangeRecord[] = [];
      const current: string[] = [];

      for (const entry of entries) {
        if (!entry.name || entry.isDirectory) continue;

        const content = await this.read(entry.name);
        if (!content) continue;
        if (!hasMatch(content, this.config.filter, this.config.kinds)) continue;

        const info = extractEntryInfo(content, this.config.kinds);
        current.push(...info.references);

        const hash = fingerprint(content);
        if (this.fingerprints.get(entry.name) !== hash) {
          this.fingerprints.set(entry.name, hash);
          changes.push({
            entryName: entry.name,
            info,
            timestamp: new Date(this.now()).toISOString(),
            feed: this.name,
          });
        }
      }

      this.references = current;
      this.lastOutcome = "completed";
      this.logger.verbose(`${this.name}: ${changes.length} changed, ${current.length} references`);
      return changes;
    } finally {
      this.state = "idle";
    }
  }

  private async list(): Promise<Entry[]> {
    try {
      return await this.reader.listEntries();
    } catch (e) {
      this.logger.log(`Error listing ${this.path}: ${errorMessage(e)}`, "error");
      return [];
    }
  }

  private async read(name: string): Promise<string | undefined> {
    try {
      return await this.reader.readEntry(name);
    } catch (e) {
      this.logger.log(`Error reading ${name}: ${errorMessage(e)}`, "error");
      return undefined;
    }
  }
}
