// src/report.ts

import type { ChangeRecord } from "./types.js";
import type { Logger } from "./logger.js";

export function formatChange(record: ChangeRecord): string[] {
  const lines = [
    "=".repeat(60),
    `FEED: ${record.feed}`,
    `ENTRY: ${record.entryName}`,
    `TITLE: ${record.info.title}`,
    "-".repeat(60),
    "LABELS:",
  ];

  for (const label of record.info.matchedLabels) {
    lines.push(`  - Channel: ${label.channel}, Kind: ${label.kind}`);
    lines.push(`    Payload: ${label.payload}`);
  }

  lines.push("-".repeat(60), "REFERENCES:");
  for (const reference of record.info.references) {
    lines.push(`  → ${reference}`);
  }
  lines.push("=".repeat(60));
  return lines;
}

export function printChanges(records: ChangeRecord[], logger: Logger): void {
  for (const record of records) {
    logger.always("");
    for (const line of formatChange(record)) logger.always(line);
  }
}
