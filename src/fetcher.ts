// src/fetcher.ts

import fs from "fs/promises";
import path from "path";
import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

/**
 * Materializes the asset behind a reference into a local directory.
 * `fetch` is best-effort: it logs its own failures and never rejects.
 */
export interface AssetFetcher {
  /** Local identifier for `reference`, or undefined when it is malformed */
  identify(reference: string): string | undefined;
  fetch(reference: string, targetDir: string): Promise<void>;
}

export interface AssetDescriptor {
  reference: string;
  id: string;
  fetchedAt: string;
  status: number;
  contentType: string;
  finalUrl: string;
  bytes: number;
  title?: string;
}

export interface LinkFetcherOptions {
  descriptorFile: string;
  idPattern: string;
  timeoutMs: number;
}

export function extractTitle(html: string): string | undefined {
  const title = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i)?.[1];
  const cleaned = title?.replace(/\s+/g, " ").trim();
  return cleaned || undefined;
}

/**
 * Fetches a link and records what came back as a JSON descriptor next to
 * the asset directory. The descriptor is only written for 2xx responses.
 */
export class LinkAssetFetcher implements AssetFetcher {
  private readonly idPattern: RegExp;

  constructor(private readonly options: LinkFetcherOptions, private readonly logger: Logger) {
    this.idPattern = new RegExp(options.idPattern);
  }

  identify(reference: string): string | undefined {
    return this.idPattern.exec(reference)?.[1];
  }

  private async download(url: string): Promise<{ res: Response; data: Buffer }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const res = await fetch(url, { redirect: "follow", signal: controller.signal });
      return { res, data: Buffer.from(await res.arrayBuffer()) };
    } finally {
      clearTimeout(timer);
    }
  }

  async fetch(reference: string, targetDir: string): Promise<void> {
    const id = this.identify(reference);
    if (!id) {
      this.logger.log(`Cannot fetch ${reference}: no id`, "warn");
      return;
    }

    try {
      await fs.mkdir(targetDir, { recursive: true });

      const { res, data } = await this.download(reference);

      if (res.status < 200 || res.status >= 300) {
        this.logger.log(`Skip ${res.status} for ${reference}`, "warn");
        return;
      }

      const contentType = res.headers.get("content-type") ?? "";
      const descriptor: AssetDescriptor = {
        reference,
        id,
        fetchedAt: new Date().toISOString(),
        status: res.status,
        contentType,
        finalUrl: res.url || reference,
        bytes: data.byteLength,
      };
      if (contentType.includes("html")) {
        descriptor.title = extractTitle(data.toString("utf8"));
      }

      const descriptorPath = path.join(targetDir, this.options.descriptorFile);
      await fs.writeFile(descriptorPath, JSON.stringify(descriptor, null, 2), "utf8");
      this.logger.verbose(`Saved ${descriptorPath}`);
    } catch (e) {
      this.logger.log(`Fetch failed for ${reference}: ${errorMessage(e)}`, "error");
    }
  }
}
