// src/logger.ts

import fs from "fs";
import type { LogLevel } from "./types.js";

type Severity = "info" | "warn" | "error";

export interface Logger {
  log(message: string, level?: Severity): void;
  verbose(message: string): void;
  always(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Append every line to this file as well */
  file?: string;
}

function timestamp(date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "normal";
  const sink = options.file ? fs.createWriteStream(options.file, { flags: "a" }) : undefined;
  sink?.on("error", (err) => console.error(`Log file error: ${err.message}`));
  return build(level, options.scope, sink);
}

function build(level: LogLevel, scope: string | undefined, sink: fs.WriteStream | undefined): Logger {
  const prefix = scope ? `[${scope}] ` : "";

  const write = (severity: string, message: string) => {
    sink?.write(`${timestamp()} - ${scope ?? "main"} - ${severity} - ${message}\n`);
  };

  return {
    log(message, severity = "info") {
      write(severity.toUpperCase(), message);
      if (level === "quiet" && severity !== "error") return;

      if (severity === "error") {
        console.error(prefix + message);
      } else if (severity === "warn") {
        console.warn(prefix + message);
      } else {
        console.log(prefix + message);
      }
    },

    verbose(message) {
      if (level !== "verbose") return;
      write("DEBUG", message);
      console.log(`[DEBUG] ${prefix}${message}`);
    },

    always(message) {
      write("INFO", message);
      console.log(message);
    },

    child(childScope) {
      return build(level, scope ? `${scope}:${childScope}` : childScope, sink);
    },
  };
}
