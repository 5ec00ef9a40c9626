import fs from "fs/promises";
import type { FastifyBaseLogger } from "fastify";
import type { Downloader } from "../types";
import { runProcess } from "./process";

export interface YtDlpOptions {
  binary: string;
  timeoutMs: number;
  log: FastifyBaseLogger;
}

export const buildDownloadArgs = (url: string, outputPath: string) => [
  "-f", "best",
  "--no-warnings",
  "--no-check-certificate",
  "--no-playlist",
  "--no-progress",
  "-o", outputPath,
  url,
];

export class YtDlpDownloader implements Downloader {
  constructor(private readonly options: YtDlpOptions) {}

  async download(url: string, outputPath: string): Promise<void> {
    const { binary, timeoutMs, log } = this.options;
    await runProcess(binary, buildDownloadArgs(url, outputPath), {
      timeoutMs,
      log,
      label: "yt-dlp",
    });

    // yt-dlp can exit 0 without writing anything (e.g. filtered formats)
    const stat = await fs.stat(outputPath).catch(() => null);
    if (!stat || stat.size === 0) {
      throw new Error(`yt-dlp produced no file for ${url}`);
    }
  }
}
