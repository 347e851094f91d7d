// src/index-file.ts

import type { IndexRecord } from "./types.js";
import { writeFileAtomic } from "./state.js";

export const INDEX_DELIMITER = ";";
export const INDEX_HEADER = ["reference", "local_path"];

function csvField(value: string): string {
  if (/[;"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatIndex(records: IndexRecord[]): string {
  const rows = [INDEX_HEADER, ...records.map((r) => [r.reference, r.localPath])];
  return rows.map((row) => row.map(csvField).join(INDEX_DELIMITER) + "\r\n").join("");
}

export async function writeIndex(indexFile: string, records: IndexRecord[]): Promise<void> {
  await writeFileAtomic(indexFile, formatIndex(records));
}
