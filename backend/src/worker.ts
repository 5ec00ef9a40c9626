import { Worker } from "bullmq";
import type IORedis from "ioredis";
import path from "path";
import fs from "fs/promises";
import type { FastifyBaseLogger } from "fastify";
import type { Downloader, Encoder, MergeJobData, MergeResult } from "./types";
import { DownloadError, EncodeError, errorMessage } from "./lib/errors";
import { OutputStore } from "./lib/outputStore";
import { QUEUE_NAME, type MergeProcessor } from "./lib/queue";

export interface MergeDeps {
  tempDir: string;
  store: OutputStore;
  downloader: Downloader;
  encoder: Encoder;
  log: FastifyBaseLogger;
}

/**
 * Download → render each clip → concat → commit. All-or-nothing: any failed
 * video aborts the job and nothing reaches the output store.
 */
export async function processMergeJob(
  { videos }: MergeJobData,
  { tempDir, store, downloader, encoder, log: parentLog }: MergeDeps,
): Promise<MergeResult> {
  const jobId = store.allocateId();
  const outputName = OutputStore.fileName(jobId);
  const jobDir = path.join(tempDir, jobId);
  const log = parentLog.child({ jobId });
  const total = videos.length;
  let committed = false;

  log.info({ videos: total }, "[Worker] Starting merge job");

  try {
    await fs.mkdir(jobDir, { recursive: true });

    // 1. Download, in caller order
    const sources: string[] = [];
    for (const [i, video] of videos.entries()) {
      const target = path.join(jobDir, `video_${i}.mp4`);
      log.info({ index: i + 1, url: video.hlsUrl }, "[Worker] Downloading");
      try {
        await downloader.download(video.hlsUrl, target);
      } catch (err) {
        throw new DownloadError(i + 1, video.title, err);
      }
      sources.push(target);
    }

    // 2. Scale/pad + overlays per clip. A single clip renders straight to staging.
    const staging = store.stagingPath(outputName);
    const rendered: string[] = [];
    for (const [i, source] of sources.entries()) {
      const video = videos[i];
      if (!video) continue;
      const target = total === 1 ? staging : path.join(jobDir, `clip_${i}.mp4`);
      try {
        const info = await encoder.probe(source);
        log.info({ index: i + 1, ...info }, "[Worker] Rendering clip");
        await encoder.renderClip(
          source,
          target,
          { index: i + 1, total, title: video.title },
          { hasAudio: info.hasAudio },
        );
      } catch (err) {
        throw new EncodeError(`render video ${i + 1}`, err);
      }
      rendered.push(target);
    }

    // 3. Concatenate
    if (total > 1) {
      log.info({ clips: rendered.length }, "[Worker] Concatenating");
      try {
        await encoder.concat(rendered, staging);
      } catch (err) {
        throw new EncodeError("concatenate clips", err);
      }
    }

    // 4. Publish
    await store.commit(outputName);
    committed = true;
    log.info({ outputFile: outputName }, "[Worker] Merge job completed");
    return { outputFile: outputName, videoCount: total };
  } catch (error) {
    log.error({ err: errorMessage(error) }, "[Worker] Merge job failed");
    throw error;
  } finally {
    if (!committed) await store.discard(outputName);
    await fs.rm(jobDir, { recursive: true, force: true });
    store.release(jobId);
  }
}

export const createMergeProcessor =
  (deps: MergeDeps): MergeProcessor =>
  (data) =>
    processMergeJob(data, deps);

// Consumes the Redis-backed queue (see BullMergeQueue) with a fixed worker count.
export const startMergeWorker = (
  connection: IORedis,
  processor: MergeProcessor,
  concurrency: number,
  log: FastifyBaseLogger,
) => {
  const worker = new Worker<MergeJobData, MergeResult>(
    QUEUE_NAME,
    async (job) => processor(job.data),
    {
      connection,
      concurrency,
      lockDuration: 60000,
      lockRenewTime: 15000,
      drainDelay: 5,
      metrics: { maxDataPoints: 0 },
    },
  );

  worker.on("failed", (job, err) => {
    log.warn({ jobId: job?.id, err: err.message }, "[Worker] BullMQ job failed");
  });
  worker.on("error", (err) => {
    log.error({ err: err.message }, "[Worker] BullMQ worker error");
  });

  return worker;
};
