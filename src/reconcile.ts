// src/reconcile.ts
/**
 * Keeps the local asset directory in line with the references that are
 * currently active across all feeds.
 *
 * The state file (reference -> asset id) is the only record that survives a
 * restart. It is written after every single change, so an interrupted pass
 * leaves it consistent with the operations that completed. The index file is
 * derived from it on every pass and can be deleted at any time.
 */

import fs from "fs/promises";
import path from "path";
import type { ContentConfig, IndexRecord, ReconcileSummary, ReconciliationState } from "./types.js";
import type { AssetFetcher } from "./fetcher.js";
import type { Logger } from "./logger.js";
import { isSafeAssetId, loadState, saveState } from "./state.js";
import { writeIndex } from "./index-file.js";
import { errorMessage } from "./errors.js";

export interface ReconcilerContext {
  content: ContentConfig;
  fetcher: AssetFetcher;
  logger: Logger;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export class Reconciler {
  private readonly content: ContentConfig;
  private readonly basePath: string;
  private readonly stateFile: string;
  private readonly indexFile: string;
  private readonly fetcher: AssetFetcher;
  private readonly logger: Logger;

  private constructor(ctx: ReconcilerContext, private state: ReconciliationState) {
    this.content = ctx.content;
    this.basePath = path.resolve(ctx.content.downloadBasePath);
    this.stateFile = path.resolve(this.basePath, ctx.content.stateFile);
    this.indexFile = path.resolve(this.basePath, ctx.content.indexFile);
    this.fetcher = ctx.fetcher;
    this.logger = ctx.logger;
  }

  static async open(ctx: ReconcilerContext): Promise<Reconciler> {
    const basePath = path.resolve(ctx.content.downloadBasePath);
    await fs.mkdir(basePath, { recursive: true });
    const state = await loadState(path.resolve(basePath, ctx.content.stateFile), ctx.logger);
    ctx.logger.verbose(`Loaded ${Object.keys(state).length} known references`);
    return new Reconciler(ctx, state);
  }

  get knownState(): Readonly<ReconciliationState> {
    return this.state;
  }

  assetDir(id: string): string {
    return path.join(this.basePath, id);
  }

  async reconcile(activeReferences: Iterable<string>): Promise<ReconcileSummary> {
    const active = new Set(activeReferences);
    const known = new Set(Object.keys(this.state));

    const newRefs = [...active].filter((r) => !known.has(r));
    const obsoleteRefs = [...known].filter((r) => !active.has(r));
    const summary: ReconcileSummary = { fetched: [], deleted: [], skipped: [], indexed: 0 };

    if (newRefs.length) {
      this.logger.log(`${newRefs.length} new references to fetch`);
    }
    for (const reference of newRefs) {
      const id = this.fetcher.identify(reference);
      if (!id || !isSafeAssetId(id)) {
        this.logger.log(`Invalid reference (no usable id could be derived): ${reference}`, "warn");
        summary.skipped.push(reference);
        continue;
      }

      this.logger.log(`Fetching ${reference}`);
      try {
        await this.fetcher.fetch(reference, this.assetDir(id));
      } catch (e) {
        this.logger.log(`Fetcher error for ${reference}: ${errorMessage(e)}`, "error");
      }

      // Recorded even when the fetch failed; a retry happens only if the reference disappears and returns
      this.state[reference] = id;
      await this.persist();
      summary.fetched.push(reference);
    }

    if (obsoleteRefs.length) {
      this.logger.log(`${obsoleteRefs.length} obsolete references, cleaning up...`);
    }
    for (const reference of obsoleteRefs) {
      const id = this.state[reference];
      delete this.state[reference];

      // Another reference may resolve to the same asset
      const shared = Object.values(this.state).includes(id);
      const dir = this.assetDir(id);
      if (path.dirname(dir) !== this.basePath) {
        this.logger.log(`Not removing ${dir}: outside ${this.basePath}`, "warn");
      } else if (!shared && (await exists(dir))) {
        try {
          this.logger.log(`Removing ${dir}`);
          await fs.rm(dir, { recursive: true, force: true });
        } catch (e) {
          this.logger.log(`Error removing ${dir}: ${errorMessage(e)}`, "error");
        }
      }

      await this.persist();
      summary.deleted.push(reference);
    }

    summary.indexed = await this.updateIndex();
    return summary;
  }

  async indexRecords(): Promise<IndexRecord[]> {
    const records: IndexRecord[] = [];
    for (const [reference, id] of Object.entries(this.state)) {
      const artifact = path.join(this.assetDir(id), this.content.descriptorFile);
      if (await exists(artifact)) {
        records.push({ reference, localPath: artifact });
      }
    }
    return records;
  }

  private async updateIndex(): Promise<number> {
    try {
      const records = await this.indexRecords();
      await writeIndex(this.indexFile, records);
      this.logger.verbose(`Index updated: ${this.indexFile} (${records.length} rows)`);
      return records.length;
    } catch (e) {
      this.logger.log(`Error updating index ${this.indexFile}: ${errorMessage(e)}`, "error");
      return 0;
    }
  }

  private async persist(): Promise<void> {
    try {
      await saveState(this.state, this.stateFile);
    } catch (e) {
      this.logger.log(`Error saving state ${this.stateFile}: ${errorMessage(e)}`, "error");
    }
  }
}
