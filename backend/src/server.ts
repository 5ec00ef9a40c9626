import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import cors from "@fastify/cors";
import type { AppConfig } from "./config";
import type { MergeResponseBody } from "./types";
import type { MergeQueue } from "./lib/queue";
import type { OutputStore } from "./lib/outputStore";
import { parseMergeRequest } from "./lib/validation";

export interface ServerContext {
  config: Pick<AppConfig, "corsOrigin" | "bodyLimit" | "maxVideos">;
  store: OutputStore;
  queue: MergeQueue;
  log: FastifyBaseLogger;
}

export const SERVICE_NAME = "Reels Merger API";
export const SERVICE_VERSION = "1.0.0";

export async function buildServer({ config, store, queue, log }: ServerContext) {
  const server = Fastify({
    loggerInstance: log,
    bodyLimit: config.bodyLimit,
  });

  await server.register(cors, {
    origin: config.corsOrigin,
    methods: ["GET", "POST"],
  });

  server.setErrorHandler((error: FastifyError, req, reply) => {
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500 && statusCode !== 503) req.log.error(error);
    else req.log.info({ err: error.message }, "request rejected");

    const body: MergeResponseBody = { status: "error", message: error.message };
    return reply.code(statusCode).send(body);
  });

  server.setNotFoundHandler((req, reply) => {
    const body: MergeResponseBody = {
      status: "error",
      message: `Route ${req.method} ${req.url} not found`,
    };
    return reply.code(404).send(body);
  });

  server.get("/", async () => {
    return {
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        "POST /merge": "Merge videos",
        "GET /download/{filename}": "Download merged video",
        "GET /health": "Health check",
        "GET /queue": "Merge queue occupancy",
      },
    };
  });

  server.get("/health", async () => {
    return { status: "healthy" };
  });

  server.get("/queue", async () => {
    return queue.stats();
  });

  // 1. Merge: validate, queue, wait for the worker
  server.post("/merge", async (req, reply) => {
    const videos = parseMergeRequest(req.body, config.maxVideos);

    const result = await queue.submit({ videos });
    const body: MergeResponseBody = {
      status: "success",
      message: "Videos merged successfully",
      output_file: result.outputFile,
      video_count: result.videoCount,
    };
    return reply.send(body);
  });

  // 2. Download a committed output
  server.get<{ Params: { filename: string } }>(
    "/download/:filename",
    async (req, reply) => {
      const { filename } = req.params;
      const handle = await store.open(filename);

      if (!handle) {
        const body: MergeResponseBody = { status: "error", message: "File not found" };
        return reply.code(404).send(body);
      }

      return reply
        .type("video/mp4")
        .header("Content-Length", handle.size)
        .header("Content-Disposition", `attachment; filename="${filename}"`)
        .send(handle.stream);
    },
  );

  return server;
}
