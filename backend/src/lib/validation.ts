import { z } from "zod";
import type { ClipSpec } from "../types";
import { ValidationError } from "./errors";

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "Must be an http(s) URL");

export const VideoDescriptorSchema = z.object({
  title: z.string(),
  url: httpUrl,
  author_fullname: z.string().nullish(),
  secure_media: z.object({
    reddit_video: z.object({
      hls_url: httpUrl,
    }),
  }),
});

export const mergeRequestSchema = (maxVideos: number) =>
  z.object({
    videos: z
      .array(VideoDescriptorSchema)
      .min(1, "No videos provided")
      .max(maxVideos, `Maximum ${maxVideos} videos allowed`),
  });

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

export function parseMergeRequest(body: unknown, maxVideos: number): ClipSpec[] {
  const parsed = mergeRequestSchema(maxVideos).safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return parsed.data.videos.map((video) => ({
    title: video.title,
    hlsUrl: video.secure_media.reddit_video.hls_url,
    sourceUrl: video.url,
  }));
}
