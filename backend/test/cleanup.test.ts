import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cleanupOutputs } from "../src/cleanup";
import { listFiles, makeTempDir, silentLog } from "./helpers";

const HOUR = 3_600_000;

describe("cleanupOutputs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("cleanup");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("removes outputs past the age limit and keeps the rest", async () => {
    const expired = `${"a".repeat(32)}.mp4`;
    const fresh = `${"b".repeat(32)}.mp4`;
    await fs.writeFile(path.join(dir, expired), "old");
    await fs.writeFile(path.join(dir, fresh), "new");
    const old = new Date(Date.now() - 25 * HOUR);
    await fs.utimes(path.join(dir, expired), old, old);

    const removed = await cleanupOutputs({ outputDir: dir, outputMaxAgeMs: 24 * HOUR }, silentLog);

    expect(removed).toEqual([expired]);
    expect(await listFiles(dir)).toEqual([fresh]);
  });

  it("treats a missing output directory as empty", async () => {
    const removed = await cleanupOutputs(
      { outputDir: path.join(dir, "never-created"), outputMaxAgeMs: HOUR },
      silentLog,
    );

    expect(removed).toEqual([]);
  });
});
