// src/labels.ts
/**
 * Heuristic parser for the label tags (`<ap>…</ap>`) embedded in rundown entries.
 *
 * Tag bodies come in several hand-typed shapes, e.g.
 *   [A1-A2-A3] 10 QR -- 00010829: |content|
 *   Faldon | 00013523: |content(
 *   [CG1] Faldon | 00013523: |content(
 *
 * Only these sub-regions are parsed; the rest of the entry markup is ignored.
 */

import type { EntryInfo, Label } from "./types.js";

export const DEFAULT_KINDS = ["X_Total", "X_Faldon"];

/** Filter value meaning "entry has at least one allow-listed label" */
export const LABELS_FILTER = "LABELS";

export type Rule = (text: string) => string | undefined;

const TAG_PATTERN = /<ap>([\s\S]*?)<\/ap>/g;
const CHANNEL_PATTERN = /\[([A-Za-z0-9-]+)\]/;
const STRUCTURAL_TOKENS = new Set(["]", "[[", "]]", "|", "--"]);

export function extractLabelTags(content: string): string[] {
  return Array.from(content.matchAll(TAG_PATTERN), (m) => m[1]);
}

// Kind rules, tried in order
export const kindRules: Rule[] = [
  // "-- 00010829: QR"
  (text) => text.match(/--\s+\d+:\s+([A-Za-z_0-9]+)/)?.[1],
  // "10 QR", "10 Titulo 2"
  (text) => text.match(/\d+\s+([A-Za-z_][A-Za-z_0-9]*(?:\s+\d+)?)/)?.[1],
  (text) =>
    text
      .split(/\s+/)
      .find((word) => word !== "" && !/^\d+$/.test(word.replace(/-/g, "")) && !STRUCTURAL_TOKENS.has(word)),
];

// Payload rules, tried in order
export const payloadRules: Rule[] = [
  // "00013523: |content(": the text after the code marker
  (text) => text.match(/\d+:\s*\|([^|(]*)/)?.[1],
  (text) => text.match(/\|([^|(]+)/)?.[1],
];

function firstKind(text: string): string | undefined {
  for (const rule of kindRules) {
    const kind = rule(text)?.trim();
    if (kind) return kind;
  }
  return undefined;
}

// First rule that matches wins, even when the match is blank
function firstPayload(text: string): string {
  for (const rule of payloadRules) {
    const payload = rule(text);
    if (payload !== undefined) return payload.trim().split(/\s+/).join(" ");
  }
  return "";
}

export function parseLabel(tagText: string): Label | undefined {
  if (!tagText || !tagText.trim()) return undefined;

  try {
    const channelMatch = CHANNEL_PATTERN.exec(tagText);
    const channel = channelMatch ? channelMatch[1] : "";
    const rest = channelMatch
      ? tagText.slice(channelMatch.index + channelMatch[0].length).trim()
      : tagText.trim();

    const kind = firstKind(rest);
    if (!kind) return undefined;

    return { channel, kind, payload: firstPayload(rest) };
  } catch {
    // Unparseable tags are dropped
    return undefined;
  }
}

export function extractLabels(content: string): Label[] {
  const labels: Label[] = [];
  for (const tag of extractLabelTags(content)) {
    const label = parseLabel(tag);
    if (label) labels.push(label);
  }
  return labels;
}

export function filterByKind(labels: Label[], allowedKinds: string[] = DEFAULT_KINDS): Label[] {
  const allowed = new Set(allowedKinds.map((k) => k.toLowerCase()));
  return labels.filter((l) => allowed.has(l.kind.toLowerCase()));
}

export function extractReferences(content: string, allowedKinds: string[] = DEFAULT_KINDS): string[] {
  return filterByKind(extractLabels(content), allowedKinds)
    .map((l) => l.payload)
    .filter(Boolean);
}

export function hasMatch(content: string, pattern: string, allowedKinds: string[] = DEFAULT_KINDS): boolean {
  if (pattern === "" || pattern === LABELS_FILTER) {
    return filterByKind(extractLabels(content), allowedKinds).length > 0;
  }

  let regex: RegExp | undefined;
  try {
    regex = new RegExp(pattern);
  } catch {
    regex = undefined; // not a valid expression; literal match only
  }

  return extractLabelTags(content).some((tag) => tag.includes(pattern) || (regex?.test(tag) ?? false));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Value of a `<f id=…>value</f>` field, if present */
export function extractField(content: string, fieldId: string): string | undefined {
  const match = content.match(new RegExp(`<f id=${escapeRegExp(fieldId)}[^>]*>([^<]*)</f>`));
  return match?.[1];
}

export function extractEntryInfo(content: string, allowedKinds: string[] = DEFAULT_KINDS): EntryInfo {
  const labels = extractLabels(content);
  const matchedLabels = filterByKind(labels, allowedKinds);

  return {
    title: extractField(content, "title") ?? "",
    status: extractField(content, "status") ?? "",
    modifiedBy: extractField(content, "modify-by") ?? "",
    modifiedAt: extractField(content, "modify-date") ?? "",
    audioTime: extractField(content, "audio-time") ?? "",
    tags: extractLabelTags(content),
    labels,
    matchedLabels,
    references: matchedLabels.map((l) => l.payload).filter(Boolean),
  };
}
