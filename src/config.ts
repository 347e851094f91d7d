// src/config.ts

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import type { Config } from "./types.js";
import { ConfigError, errorMessage } from "./errors.js";
import { DEFAULT_KINDS, LABELS_FILTER } from "./labels.js";

const LogLevelSchema = z.enum(["quiet", "normal", "verbose"]);

const FileConfigSchema = z.object({
  server: z.object({
    host: z.string().default(""),
    port: z.number().int().min(1).max(65535).default(21),
    user: z.string().default(""),
    password: z.string().default(""),
    timeoutMs: z.number().int().positive().default(30000),
  }).default({}),
  defaults: z.object({
    filter: z.string().default(LABELS_FILTER),
    kinds: z.array(z.string().min(1)).min(1).default(DEFAULT_KINDS),
    intervalSeconds: z.number().positive().default(30),
  }).default({}),
  feeds: z.array(
    z.object({
      name: z.string().min(1).optional(),
      path: z.string().min(1),
      intervalSeconds: z.number().positive().optional(),
      filter: z.string().optional(),
      kinds: z.array(z.string().min(1)).min(1).optional(),
    })
  ).min(1),
  content: z.object({
    downloadBasePath: z.string().min(1).default("downloads"),
    stateFile: z.string().min(1).default("content_state.json"),
    indexFile: z.string().min(1).default("index.csv"),
    descriptorFile: z.string().min(1).default("asset.json"),
    idPattern: z.string().default("/status/(\\d+)"),
    fetchTimeoutMs: z.number().int().positive().default(20000),
  }).default({}),
  logging: z.object({
    level: LogLevelSchema.default("normal"),
    file: z.string().optional(),
  }).default({}),
  loopDelayMs: z.number().int().positive().default(1000),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export function getArg(flag: string, fallback?: string, argv: string[] = process.argv): string | undefined {
  const i = argv.indexOf(flag);
  if (i >= 0 && i + 1 < argv.length) return argv[i + 1];
  return fallback;
}

function validRegExp(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

/**
 * Builds the runtime config from a parsed config file, with environment
 * variables overriding the server credentials, the download path and the log level.
 */
export function resolveConfig(
  raw: unknown,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv
): Config {
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config ${configPath}`,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  const file = parsed.data;
  const issues: string[] = [];

  const port = env.FTP_PORT ? parseInt(env.FTP_PORT, 10) : file.server.port;
  const server = {
    host: env.FTP_HOST || file.server.host,
    port,
    user: env.FTP_USER || file.server.user,
    password: env.FTP_PASSWORD || file.server.password,
    timeoutMs: file.server.timeoutMs,
  };
  if (!server.host) issues.push("server.host is required (or FTP_HOST)");
  if (!server.user) issues.push("server.user is required (or FTP_USER)");
  if (!Number.isInteger(port) || port < 1 || port > 65535) issues.push(`invalid FTP port: ${env.FTP_PORT}`);

  const level = getArg("--log-level", env.LOG_LEVEL || file.logging.level, argv);
  const logLevel = LogLevelSchema.safeParse(level);
  if (!logLevel.success) issues.push(`invalid log level: ${level}`);

  if (!validRegExp(file.content.idPattern)) issues.push("content.idPattern is not a valid expression");

  if (issues.length) throw new ConfigError(`Invalid config ${configPath}`, issues);

  const configDir = path.dirname(path.resolve(configPath));
  const downloadBasePath = path.resolve(configDir, env.DOWNLOAD_BASE_PATH || file.content.downloadBasePath);

  return {
    configPath,
    server,
    feeds: file.feeds.map((f, i) => ({
      name: f.name ?? `FEED_${i + 1}`,
      path: f.path,
      intervalSeconds: f.intervalSeconds ?? file.defaults.intervalSeconds,
      filter: f.filter ?? file.defaults.filter,
      kinds: f.kinds ?? file.defaults.kinds,
    })),
    content: { ...file.content, downloadBasePath },
    logLevel: logLevel.success ? logLevel.data : "normal",
    logFile: file.logging.file ? path.resolve(configDir, file.logging.file) : undefined,
    loopDelayMs: file.loopDelayMs,
    once: argv.includes("--once"),
  };
}

export function loadConfig(argv: string[] = process.argv): Config {
  dotenv.config();

  const configPath = getArg("--config", process.env.CONFIG_PATH || "config.json", argv) ?? "config.json";

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read config ${configPath}: ${errorMessage(e)}`);
  }

  return resolveConfig(raw, configPath, process.env, argv);
}
