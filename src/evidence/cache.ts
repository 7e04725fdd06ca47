import { createHash, randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorCode, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

/**
 * On-disk cache of network responses, keyed by a stable hash of the request.
 *
 * Entries never expire; delete the cache directory to invalidate. Concurrent
 * pipelines asking for the same key share one in-flight fetch, and writes go
 * through a temp file plus rename so readers never see a partial entry.
 */
export class ResponseCache {
  private readonly inFlight = new Map<string, Promise<unknown>>();

  /** With no directory the cache only de-duplicates concurrent requests. */
  constructor(private readonly dir?: string) {}

  static keyFor(...parts: string[]): string {
    return createHash("sha256").update(JSON.stringify(parts)).digest("hex");
  }

  async getOrFetch(key: string, fetcher: () => Promise<unknown>): Promise<unknown> {
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const task = this.load(key, fetcher);
    this.inFlight.set(key, task);
    try {
      return await task;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async load(key: string, fetcher: () => Promise<unknown>): Promise<unknown> {
    const cached = await this.read(key);
    if (cached !== undefined) {
      logger.debug(`Cache hit ${key.slice(0, 12)}`);
      return cached;
    }

    const value = await fetcher();
    await this.write(key, value);
    return value;
  }

  private entryPath(key: string): string | undefined {
    return this.dir ? path.join(this.dir, key.slice(0, 2), `${key}.json`) : undefined;
  }

  private async read(key: string): Promise<unknown> {
    const file = this.entryPath(key);
    if (!file) return undefined;
    try {
      const text = await fs.readFile(file, "utf-8");
      const entry: unknown = JSON.parse(text);
      if (entry !== null && typeof entry === "object" && "value" in entry) {
        return entry.value;
      }
      logger.debug(`Ignoring malformed cache entry ${file}`);
      return undefined;
    } catch (e) {
      if (errorCode(e) !== "ENOENT") {
        logger.debug(`Ignoring unreadable cache entry ${file}: ${errorMessage(e)}`);
      }
      return undefined;
    }
  }

  private async write(key: string, value: unknown): Promise<void> {
    const file = this.entryPath(key);
    if (!file) return;

    const tmp = `${file}.${randomBytes(6).toString("hex")}.tmp`;
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify({ storedAt: new Date().toISOString(), value }));
      await fs.rename(tmp, file);
    } catch (e) {
      // A cache that cannot be written only costs a repeat request next run
      logger.warn(`Could not write cache entry: ${errorMessage(e)}`);
      await fs.rm(tmp, { force: true });
    }
  }
}
