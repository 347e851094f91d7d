// src/reader.ts

import { Writable } from "stream";
import { Client } from "basic-ftp";
import type { Entry, ServerConfig } from "./types.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

/**
 * Read access to a remote store of rundown feeds. Implementations report
 * failures through their return values and must tolerate repeated calls
 * without an explicit disconnect in between.
 */
export interface FeedReader {
  connect(): Promise<boolean>;
  ensureConnected(): Promise<boolean>;
  navigateTo(path: string): Promise<boolean>;
  listEntries(path?: string): Promise<Entry[]>;
  readEntry(name: string): Promise<string | undefined>;
  disconnect(): void;
}

export type FtpClient = Pick<
  Client,
  "access" | "close" | "closed" | "cd" | "list" | "downloadTo" | "send" | "sendIgnoringError"
>;

export class FtpFeedReader implements FeedReader {
  private client: FtpClient | undefined;

  constructor(
    private readonly server: ServerConfig,
    private readonly logger: Logger,
    private readonly createClient: () => FtpClient = () => new Client(server.timeoutMs)
  ) {}

  async connect(): Promise<boolean> {
    const client = this.createClient();
    try {
      this.logger.log(`Connecting to ${this.server.host}...`);
      await client.access({
        host: this.server.host,
        port: this.server.port,
        user: this.server.user,
        password: this.server.password,
      });
      // Not every server knows this command
      await client.sendIgnoringError("SITE CHARSET UTF-8");
      this.client = client;
      this.logger.log("Connected");
      return true;
    } catch (e) {
      client.close();
      this.logger.log(`Connection error: ${errorMessage(e)}`, "error");
      return false;
    }
  }

  private async isConnected(): Promise<boolean> {
    if (!this.client || this.client.closed) return false;
    try {
      await this.client.send("NOOP");
      return true;
    } catch {
      return false;
    }
  }

  async ensureConnected(): Promise<boolean> {
    if (await this.isConnected()) return true;
    this.disconnect();
    return this.connect();
  }

  async navigateTo(path: string): Promise<boolean> {
    if (!(await this.ensureConnected()) || !this.client) return false;
    try {
      await this.client.cd("/");
      for (const folder of path.replace(/\\/g, "/").split("/")) {
        if (folder) await this.client.cd(folder);
      }
      this.logger.verbose(`Navigated to ${path}`);
      return true;
    } catch (e) {
      this.logger.log(`Error navigating to ${path}: ${errorMessage(e)}`, "error");
      return false;
    }
  }

  async listEntries(path?: string): Promise<Entry[]> {
    if (!(await this.ensureConnected()) || !this.client) return [];
    if (path && !(await this.navigateTo(path))) return [];
    try {
      const list = await this.client.list();
      return list.filter((f) => f.name).map((f) => ({ name: f.name, isDirectory: f.isDirectory }));
    } catch (e) {
      this.logger.log(`Error listing ${path ?? "current directory"}: ${errorMessage(e)}`, "error");
      return [];
    }
  }

  async readEntry(name: string): Promise<string | undefined> {
    if (!(await this.ensureConnected()) || !this.client) return undefined;

    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    try {
      await this.client.downloadTo(sink, name);
      return Buffer.concat(chunks).toString("utf8").replace(/\r\n/g, "\n");
    } catch (e) {
      this.logger.log(`Error reading ${name}: ${errorMessage(e)}`, "error");
      return undefined;
    }
  }

  disconnect(): void {
    if (!this.client) return;
    this.client.close();
    this.client = undefined;
    this.logger.log("Disconnected");
  }
}
