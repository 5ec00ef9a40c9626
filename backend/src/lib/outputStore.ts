import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import type { Readable } from "stream";
import type { FastifyBaseLogger } from "fastify";

const STAGING_DIR = ".staging";
const OUTPUT_NAME = /^[0-9a-f]{32}\.mp4$/;

export interface OutputHandle {
  stream: Readable;
  size: number;
}

export interface OutputStoreOptions {
  log: FastifyBaseLogger;
  generateId?: () => string;
}

/**
 * Directory of finished merges. Files are staged by the encoder, committed
 * under a generated name, served read-only and removed by `sweep`.
 */
export class OutputStore {
  private readonly reserved = new Set<string>();
  private readonly readers = new Map<string, number>();
  private readonly log: FastifyBaseLogger;
  private readonly generateId: () => string;

  constructor(
    readonly dir: string,
    { log, generateId = () => randomUUID().replace(/-/g, "") }: OutputStoreOptions,
  ) {
    this.log = log;
    this.generateId = generateId;
  }

  async init(): Promise<void> {
    await fsp.mkdir(path.join(this.dir, STAGING_DIR), { recursive: true });
  }

  static fileName(id: string) {
    return `${id}.mp4`;
  }

  isValidName(name: string) {
    return OUTPUT_NAME.test(name);
  }

  // Returns an id that is neither on disk nor held by another job.
  allocateId(): string {
    for (;;) {
      const id = this.generateId();
      const name = OutputStore.fileName(id);
      if (
        this.reserved.has(id) ||
        fs.existsSync(this.filePath(name)) ||
        fs.existsSync(this.stagingPath(name))
      ) {
        continue;
      }
      this.reserved.add(id);
      return id;
    }
  }

  release(id: string) {
    this.reserved.delete(id);
  }

  filePath(name: string) {
    return path.join(this.dir, name);
  }

  stagingPath(name: string) {
    return path.join(this.dir, STAGING_DIR, name);
  }

  // link() refuses to overwrite, so a committed name is never replaced.
  async commit(name: string): Promise<void> {
    await fsp.link(this.stagingPath(name), this.filePath(name));
    await fsp.unlink(this.stagingPath(name));
  }

  async discard(name: string): Promise<void> {
    await fsp.rm(this.stagingPath(name), { force: true });
  }

  async open(name: string): Promise<OutputHandle | null> {
    if (!this.isValidName(name)) return null;

    let size: number;
    try {
      const stat = await fsp.stat(this.filePath(name));
      if (!stat.isFile()) return null;
      size = stat.size;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    const stream = fs.createReadStream(this.filePath(name));
    this.readers.set(name, (this.readers.get(name) ?? 0) + 1);
    stream.once("close", () => {
      const count = (this.readers.get(name) ?? 1) - 1;
      if (count > 0) this.readers.set(name, count);
      else this.readers.delete(name);
    });

    return { stream, size };
  }

  activeReaders(name: string) {
    return this.readers.get(name) ?? 0;
  }

  /**
   * Deletes committed outputs and leftover staging files older than
   * `maxAgeMs`. Files with an open reader are kept for the next pass.
   */
  async sweep(maxAgeMs: number, now = Date.now()): Promise<string[]> {
    const removed: string[] = [];
    const candidates = [
      ...(await this.listFiles(this.dir)).map((name) => ({ name, staged: false })),
      ...(await this.listFiles(path.join(this.dir, STAGING_DIR))).map((name) => ({
        name,
        staged: true,
      })),
    ];

    for (const { name, staged } of candidates) {
      if (!this.isValidName(name) || this.inUse(name, staged)) continue;

      const fullPath = staged ? this.stagingPath(name) : this.filePath(name);
      const stat = await fsp.stat(fullPath).catch((err: unknown) => {
        if (isNotFound(err)) return null;
        throw err;
      });
      if (!stat || now - stat.mtimeMs <= maxAgeMs) continue;
      // a download may have opened the file while we were waiting on stat
      if (this.inUse(name, staged)) continue;

      await fsp.rm(fullPath, { force: true });
      removed.push(staged ? path.join(STAGING_DIR, name) : name);
    }

    if (removed.length > 0) {
      this.log.info({ removed: removed.length, maxAgeMs }, "[OutputStore] swept expired outputs");
    }
    return removed;
  }

  private inUse(name: string, staged: boolean) {
    return staged
      ? this.reserved.has(path.basename(name, ".mp4"))
      : this.activeReaders(name) > 0;
  }

  private async listFiles(dir: string): Promise<string[]> {
    try {
      const entries = await fsp.readdir(dir, { withFileTypes: true });
      return entries.filter((e) => e.isFile()).map((e) => e.name);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }
}

const isNotFound = (err: unknown) =>
  err instanceof Error && "code" in err && err.code === "ENOENT";
