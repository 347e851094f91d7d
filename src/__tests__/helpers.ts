// src/__tests__/helpers.ts

import { vi } from "vitest";
import fs from "fs/promises";
import path from "path";
import type { Entry } from "../types.js";
import type { FeedReader } from "../reader.js";
import type { AssetFetcher } from "../fetcher.js";
import type { Logger } from "../logger.js";

export function testLogger(): Logger {
  const logger: Logger = {
    log: vi.fn(),
    verbose: vi.fn(),
    always: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export function entry(content: string, title = "Story"): string {
  return `<nsml>
<fields>
<f id=title>${title}</f>
</fields>
<body>
${content}
</body>
</nsml>`;
}

/** In-memory rundown store: one listing per path, contents keyed by entry name */
export class MemoryReader implements FeedReader {
  connected = true;
  canConnect = true;
  disconnected = false;
  listError: Error | undefined;
  listings = new Map<string, Entry[]>();
  contents = new Map<string, string>();
  readErrors = new Set<string>();
  unreachable = new Set<string>();
  navigations: string[] = [];
  listed: (string | undefined)[] = [];
  private current = "";

  setFeed(feedPath: string, stories: Record<string, string>, dirs: string[] = []): void {
    const entries: Entry[] = dirs.map((name) => ({ name, isDirectory: true }));
    for (const [name, content] of Object.entries(stories)) {
      entries.push({ name, isDirectory: false });
      this.contents.set(name, content);
    }
    this.listings.set(feedPath, entries);
  }

  async connect(): Promise<boolean> {
    this.connected = this.canConnect;
    return this.connected;
  }

  async ensureConnected(): Promise<boolean> {
    return this.connected || this.connect();
  }

  async navigateTo(feedPath: string): Promise<boolean> {
    this.navigations.push(feedPath);
    if (this.unreachable.has(feedPath)) return false;
    this.current = feedPath;
    return true;
  }

  async listEntries(feedPath?: string): Promise<Entry[]> {
    this.listed.push(feedPath);
    if (this.listError) throw this.listError;
    return this.listings.get(feedPath ?? this.current) ?? [];
  }

  async readEntry(name: string): Promise<string | undefined> {
    if (this.readErrors.has(name)) throw new Error(`cannot read ${name}`);
    return this.contents.get(name);
  }

  disconnect(): void {
    this.connected = false;
    this.disconnected = true;
  }
}

/** Writes a descriptor for every reference except the ones listed in `failing` */
export class RecordingFetcher implements AssetFetcher {
  fetched: string[] = [];
  failing = new Set<string>();
  onFetch: ((reference: string) => Promise<void>) | undefined;

  constructor(private readonly descriptorFile = "asset.json") {}

  identify(reference: string): string | undefined {
    return /\/status\/(\d+)/.exec(reference)?.[1];
  }

  async fetch(reference: string, targetDir: string): Promise<void> {
    this.fetched.push(reference);
    await this.onFetch?.(reference);
    await fs.mkdir(targetDir, { recursive: true });
    if (this.failing.has(reference)) return;
    await fs.writeFile(path.join(targetDir, this.descriptorFile), JSON.stringify({ reference }));
  }
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}
