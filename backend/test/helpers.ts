import fs from "fs/promises";
import os from "os";
import path from "path";
import pino from "pino";
import type { ClipOverlay, Downloader, Encoder, MediaInfo } from "../src/types";

export const silentLog = pino({ level: "silent" });

export const makeTempDir = (prefix: string) =>
  fs.mkdtemp(path.join(os.tmpdir(), `reels-${prefix}-`));

export const listFiles = async (dir: string) => {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
};

// Executable stand-in for an external binary
export const writeScript = async (dir: string, name: string, body: string) => {
  const file = path.join(dir, name);
  await fs.writeFile(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return file;
};

export const descriptor = (n: number, overrides: Record<string, unknown> = {}) => ({
  title: `Clip number ${n}`,
  author_fullname: `t2_user${n}`,
  url: `https://v.example.com/clip${n}`,
  secure_media: {
    reddit_video: { hls_url: `https://v.example.com/clip${n}/HLSPlaylist.m3u8` },
  },
  ...overrides,
});

export class FakeDownloader implements Downloader {
  readonly calls: string[] = [];

  constructor(private readonly failing: Set<string> = new Set()) {}

  async download(url: string, outputPath: string): Promise<void> {
    this.calls.push(url);
    if (this.failing.has(url)) throw new Error("HTTP Error 404: Not Found");
    await fs.writeFile(outputPath, `source:${url}`);
  }
}

export class FakeEncoder implements Encoder {
  readonly overlays: ClipOverlay[] = [];
  readonly renderTargets: string[] = [];
  readonly concatCalls: string[][] = [];

  constructor(
    private readonly opts: { failConcat?: boolean; media?: MediaInfo; onRender?: () => Promise<void> } = {},
  ) {}

  async probe(): Promise<MediaInfo> {
    return this.opts.media ?? { durationSeconds: 4.5, hasAudio: true };
  }

  async renderClip(
    _inputPath: string,
    outputPath: string,
    overlay: ClipOverlay,
  ): Promise<void> {
    if (this.opts.onRender) await this.opts.onRender();
    this.overlays.push(overlay);
    this.renderTargets.push(outputPath);
    await fs.writeFile(outputPath, `clip:${overlay.index}/${overlay.total}:${overlay.title}`);
  }

  async concat(inputPaths: string[], outputPath: string): Promise<void> {
    this.concatCalls.push(inputPaths);
    if (this.opts.failConcat) throw new Error("ffmpeg exited with code 1");
    const parts = await Promise.all(inputPaths.map((p) => fs.readFile(p, "utf-8")));
    await fs.writeFile(outputPath, parts.join("|"));
  }
}
