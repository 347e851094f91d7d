// src/types.ts

export interface Entry {
  name: string;
  isDirectory: boolean;
}

export interface Label {
  channel: string; // e.g. CG1, empty when absent
  kind: string; // e.g. Faldon, X_Total
  payload: string; // usually a URL
}

export interface EntryInfo {
  title: string;
  status: string;
  modifiedBy: string;
  modifiedAt: string;
  audioTime: string;
  tags: string[];
  labels: Label[];
  matchedLabels: Label[];
  references: string[];
}

export interface ChangeRecord {
  entryName: string;
  info: EntryInfo;
  timestamp: string;
  feed: string;
}

/** reference -> local asset id */
export interface ReconciliationState {
  [reference: string]: string;
}

export interface IndexRecord {
  reference: string;
  localPath: string;
}

export interface ReconcileSummary {
  fetched: string[];
  deleted: string[];
  skipped: string[];
  indexed: number;
}

export type LogLevel = "quiet" | "normal" | "verbose";

export interface ServerConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  timeoutMs: number;
}

export interface FeedConfig {
  name: string;
  path: string;
  intervalSeconds: number;
  filter: string;
  kinds: string[];
}

export interface ContentConfig {
  downloadBasePath: string;
  stateFile: string;
  indexFile: string;
  descriptorFile: string;
  idPattern: string;
  fetchTimeoutMs: number;
}

export interface Config {
  configPath: string;
  server: ServerConfig;
  feeds: FeedConfig[];
  content: ContentConfig;
  logLevel: LogLevel;
  logFile?: string;
  loopDelayMs: number;
  once: boolean;
}
