import fs from "fs/promises";
import path from "path";
import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import type { ClipOverlay, Encoder, MediaInfo } from "../types";
import { buildClipFilter, wrapTitle, type FrameSize } from "./overlay";
import { runProcess } from "./process";

export interface FfmpegOptions {
  ffmpegPath: string;
  ffprobePath: string;
  frame: FrameSize;
  fontFile: string;
  preset: string;
  crf: number;
  timeoutMs: number;
  log: FastifyBaseLogger;
}

const ProbeSchema = z.object({
  streams: z.array(z.object({ codec_type: z.string().optional() })).default([]),
  format: z.object({ duration: z.coerce.number().optional().catch(undefined) }).default({}),
});

export const parseProbeOutput = (stdout: string): MediaInfo => {
  const probe = ProbeSchema.parse(JSON.parse(stdout));
  return {
    durationSeconds: probe.format.duration ?? 0,
    hasAudio: probe.streams.some((s) => s.codec_type === "audio"),
  };
};

export const buildProbeArgs = (inputPath: string) => [
  "-v", "error",
  "-show_entries", "format=duration:stream=codec_type",
  "-of", "json",
  inputPath,
];

export function buildRenderArgs(
  inputPath: string,
  outputPath: string,
  filter: string,
  { hasAudio, preset, crf }: { hasAudio: boolean; preset: string; crf: number },
): string[] {
  const inputs = ["-i", inputPath];
  // Silent track keeps every clip's stream layout identical for the concat demuxer
  if (!hasAudio) {
    inputs.push("-f", "lavfi", "-i", "anullsrc=channel_layout=stereo:sample_rate=44100");
  }

  return [
    "-y",
    ...inputs,
    "-vf", filter,
    "-map", "0:v:0",
    "-map", hasAudio ? "0:a:0" : "1:a:0",
    ...(hasAudio ? [] : ["-shortest"]),
    "-r", "30",
    "-c:v", "libx264",
    "-preset", preset,
    "-crf", String(crf),
    "-pix_fmt", "yuv420p",
    "-c:a", "aac",
    "-b:a", "128k",
    "-ar", "44100",
    "-ac", "2",
    "-movflags", "+faststart",
    outputPath,
  ];
}

export const buildConcatArgs = (listPath: string, outputPath: string) => [
  "-y",
  "-f", "concat",
  "-safe", "0",
  "-i", listPath,
  "-c", "copy",
  "-fflags", "+genpts",
  "-avoid_negative_ts", "make_zero",
  "-movflags", "+faststart",
  outputPath,
];

export const concatListEntry = (filePath: string) =>
  `file '${filePath.replace(/'/g, "'\\''")}'`;

export class FfmpegEncoder implements Encoder {
  constructor(private readonly options: FfmpegOptions) {}

  async probe(inputPath: string): Promise<MediaInfo> {
    const { ffprobePath, timeoutMs, log } = this.options;
    const stdout = await runProcess(ffprobePath, buildProbeArgs(inputPath), {
      timeoutMs,
      log,
      label: "ffprobe",
    });
    return parseProbeOutput(stdout);
  }

  async renderClip(
    inputPath: string,
    outputPath: string,
    overlay: ClipOverlay,
    { hasAudio }: { hasAudio: boolean },
  ): Promise<void> {
    const { ffmpegPath, frame, fontFile, preset, crf, timeoutMs, log } = this.options;
    const titleFile = `${outputPath}.title.txt`;
    await fs.writeFile(titleFile, wrapTitle(overlay.title), "utf-8");

    try {
      const filter = buildClipFilter(overlay, frame, fontFile, titleFile);
      await runProcess(
        ffmpegPath,
        buildRenderArgs(inputPath, outputPath, filter, { hasAudio, preset, crf }),
        { timeoutMs, log, label: "ffmpeg:render" },
      );
    } finally {
      await fs.rm(titleFile, { force: true });
    }
  }

  async concat(inputPaths: string[], outputPath: string): Promise<void> {
    if (inputPaths.length === 0) throw new Error("concat: no clips provided");
    const { ffmpegPath, timeoutMs, log } = this.options;

    const listPath = path.join(path.dirname(inputPaths[0] ?? outputPath), "concat.txt");
    await fs.writeFile(listPath, inputPaths.map(concatListEntry).join("\n"), "utf-8");

    try {
      await runProcess(ffmpegPath, buildConcatArgs(listPath, outputPath), {
        timeoutMs,
        log,
        label: "ffmpeg:concat",
      });
    } finally {
      await fs.rm(listPath, { force: true });
    }
  }
}
