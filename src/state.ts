// src/state.ts

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { ReconciliationState } from "./types.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

/** An asset id names one directory directly under the download folder */
export const AssetIdSchema = z
  .string()
  .min(1)
  .refine((id) => !/[\\/]/.test(id) && id !== "." && id !== "..", "not a single path segment");

export function isSafeAssetId(id: string): boolean {
  return AssetIdSchema.safeParse(id).success;
}

const StateSchema = z.record(z.string(), z.unknown());

export async function loadState(stateFile: string, logger?: Logger): Promise<ReconciliationState> {
  let raw: string;
  try {
    raw = await fs.readFile(stateFile, "utf8");
  } catch {
    return {};
  }

  let entries: Record<string, unknown>;
  try {
    entries = StateSchema.parse(JSON.parse(raw));
  } catch (e) {
    logger?.log(`Ignoring unreadable state file ${stateFile}: ${errorMessage(e)}`, "warn");
    return {};
  }

  const state: ReconciliationState = {};
  for (const [reference, id] of Object.entries(entries)) {
    const parsed = AssetIdSchema.safeParse(id);
    if (parsed.success) {
      state[reference] = parsed.data;
    } else {
      logger?.log(`Dropping state entry ${reference}: invalid asset id ${JSON.stringify(id)}`, "warn");
    }
  }
  return state;
}

/** Replaces `file` with `data` through a sibling temp file */
export async function writeFileAtomic(file: string, data: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(tmp, data, "utf8");
  await fs.rename(tmp, file);
}

export async function saveState(state: ReconciliationState, stateFile: string): Promise<void> {
  await writeFileAtomic(stateFile, JSON.stringify(state, null, 2));
}
