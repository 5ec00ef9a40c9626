import fs from "fs/promises";
import type { Worker } from "bullmq";
import { loadConfig } from "./config";
import { buildServer } from "./server";
import { createLogger } from "./lib/logger";
import { OutputStore } from "./lib/outputStore";
import { YtDlpDownloader } from "./lib/downloader";
import { FfmpegEncoder } from "./lib/ffmpeg";
import { errorMessage } from "./lib/errors";
import {
  BullMergeQueue,
  LocalMergeQueue,
  createRedisConnection,
  type MergeQueue,
} from "./lib/queue";
import { createMergeProcessor, startMergeWorker } from "./worker";

const start = async () => {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  try {
    await fs.mkdir(config.tempDir, { recursive: true });
    const store = new OutputStore(config.outputDir, { log });
    await store.init();

    const processor = createMergeProcessor({
      tempDir: config.tempDir,
      store,
      downloader: new YtDlpDownloader({
        binary: config.tools.ytDlp,
        timeoutMs: config.downloadTimeoutMs,
        log,
      }),
      encoder: new FfmpegEncoder({
        ffmpegPath: config.tools.ffmpeg,
        ffprobePath: config.tools.ffprobe,
        frame: config.reels,
        fontFile: config.encode.fontFile,
        preset: config.encode.preset,
        crf: config.encode.crf,
        timeoutMs: config.encodeTimeoutMs,
        log,
      }),
      log,
    });

    const limits = { concurrency: config.maxWorkers, maxWaiting: config.maxQueueSize };
    let queue: MergeQueue;
    let worker: Worker | undefined;

    if (config.redisUrl) {
      const connection = createRedisConnection(config.redisUrl);
      queue = new BullMergeQueue(connection, limits);
      if (config.runWorker) {
        worker = startMergeWorker(connection, processor, config.maxWorkers, log);
      }
      log.info({ queue: "redis", runWorker: config.runWorker }, "[startup] Using BullMQ merge queue");
    } else {
      queue = new LocalMergeQueue(processor, limits);
      log.info({ queue: "local", ...limits }, "[startup] Using in-process merge queue");
    }

    const server = await buildServer({ config, store, queue, log });

    const sweeper =
      config.sweepIntervalMs > 0
        ? setInterval(() => {
            store.sweep(config.outputMaxAgeMs).catch((err: unknown) => {
              log.error({ err: errorMessage(err) }, "[OutputStore] sweep failed");
            });
          }, config.sweepIntervalMs)
        : undefined;

    const shutdown = async (signal: string) => {
      log.info({ signal }, "[shutdown] closing");
      if (sweeper) clearInterval(sweeper);
      await server.close();
      await queue.close();
      if (worker) await worker.close();
      process.exit(0);
    };
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((err: unknown) => {
          log.error({ err: errorMessage(err) }, "[shutdown] failed");
          process.exit(1);
        });
      });
    }

    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    log.error(err);
    process.exit(1);
  }
};

void start();
