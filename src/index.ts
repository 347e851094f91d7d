#!/usr/bin/env node
// src/index.ts
/**
 * Rundown monitor
 *
 * Features
 * - Polls one or more rundowns on a remote FTP store, each on its own interval
 * - Reports entries whose content changed since the previous poll
 * - Collects the references carried by allow-listed labels (`<ap>` tags)
 * - Fetches assets for new references and removes those no longer referenced
 * - Keeps content_state.json (reference -> asset id) and an index.csv for other tools
 *
 * Usage
 *   rundown-monitor --config ./config.json            # run until interrupted
 *   rundown-monitor --config ./config.json --once     # single round and exit
 *   rundown-monitor --log-level verbose
 *
 * FTP_HOST, FTP_PORT, FTP_USER, FTP_PASSWORD, DOWNLOAD_BASE_PATH and LOG_LEVEL
 * may be set in .env to override the config file.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { FtpFeedReader } from "./reader.js";
import { FeedWatcher } from "./watcher.js";
import { LinkAssetFetcher } from "./fetcher.js";
import { Reconciler } from "./reconcile.js";
import { Monitor } from "./monitor.js";
import { Metrics } from "./metrics.js";
import { ConfigError, errorMessage } from "./errors.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  const metrics = new Metrics();

  const reader = new FtpFeedReader(config.server, logger.child("ftp"));
  const fetcher = new LinkAssetFetcher(
    {
      descriptorFile: config.content.descriptorFile,
      idPattern: config.content.idPattern,
      timeoutMs: config.content.fetchTimeoutMs,
    },
    logger.child("fetch")
  );
  const reconciler = await Reconciler.open({ content: config.content, fetcher, logger: logger.child("sync") });
  const watchers = config.feeds.map(
    (feed) => new FeedWatcher(feed, { reader, logger: logger.child(`watcher:${feed.name}`) })
  );

  const monitor = new Monitor({
    reader,
    watchers,
    reconciler,
    logger,
    metrics,
    loopDelayMs: config.loopDelayMs,
  });

  if (config.once) {
    try {
      await monitor.runOnce();
    } finally {
      reader.disconnect();
    }
  } else {
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    process.once("SIGTERM", () => controller.abort());
    await monitor.run(controller.signal);
  }

  metrics.print(logger);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
    console.error("Usage: rundown-monitor --config ./config.json [--once] [--log-level quiet|normal|verbose]");
  } else {
    console.error(`❌ Fatal error: ${errorMessage(error)}`);
  }
  process.exit(1);
});
