import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FfmpegEncoder } from "../src/lib/ffmpeg";
import { listFiles, makeTempDir, silentLog, writeScript } from "./helpers";

// Lists the output directory into `seen` while "running", then writes the output
const recordingFfmpeg = (seen: string) => `for last; do :; done
ls "$(dirname "$last")" > "${seen}"
printf 'encoded' > "$last"`;

describe("FfmpegEncoder", () => {
  let root: string;
  let work: string;
  let seen: string;

  beforeEach(async () => {
    root = await makeTempDir("encoder");
    work = path.join(root, "work");
    seen = path.join(root, "seen.txt");
    await fs.mkdir(work);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const encoderWith = async ({ ffmpeg = "exit 0", ffprobe = "exit 0" }) =>
    new FfmpegEncoder({
      ffmpegPath: await writeScript(root, "ffmpeg", ffmpeg),
      ffprobePath: await writeScript(root, "ffprobe", ffprobe),
      frame: { width: 1080, height: 1920 },
      fontFile: "/fonts/test.ttf",
      preset: "ultrafast",
      crf: 23,
      timeoutMs: 5000,
      log: silentLog,
    });

  it("probes through ffprobe's JSON output", async () => {
    const encoder = await encoderWith({
      ffprobe: `printf '%s' '{"streams":[{"codec_type":"video"}],"format":{"duration":"3.5"}}'`,
    });

    await expect(encoder.probe(path.join(work, "video_1.mp4"))).resolves.toEqual({
      durationSeconds: 3.5,
      hasAudio: false,
    });
  });

  it("writes the wrapped title beside the clip and removes it afterwards", async () => {
    const encoder = await encoderWith({
      ffmpeg: `${recordingFfmpeg(seen)}\ncat "$last.title.txt" > "${seen}.title"`,
    });
    const input = path.join(work, "video_1.mp4");
    await fs.writeFile(input, "source");

    await encoder.renderClip(
      input,
      path.join(work, "clip_1.mp4"),
      { index: 1, total: 2, title: "Hello there" },
      { hasAudio: true },
    );

    expect(await fs.readFile(seen, "utf-8")).toBe("clip_1.mp4.title.txt\nvideo_1.mp4\n");
    expect(await fs.readFile(`${seen}.title`, "utf-8")).toBe("Hello there");
    expect(await listFiles(work)).toEqual(["clip_1.mp4", "video_1.mp4"]);
  });

  it("removes the title file when rendering fails", async () => {
    const encoder = await encoderWith({ ffmpeg: "echo 'Invalid data' >&2\nexit 1" });
    const input = path.join(work, "video_1.mp4");
    await fs.writeFile(input, "source");

    const overlay = { index: 1, total: 1, title: "x" };

    await expect(
      encoder.renderClip(input, path.join(work, "clip_1.mp4"), overlay, { hasAudio: false }),
    ).rejects.toThrow(/ffmpeg exited with code 1: Invalid data$/);
    expect(await listFiles(work)).toEqual(["video_1.mp4"]);
  });

  it("writes the concat list beside the clips and removes it afterwards", async () => {
    const encoder = await encoderWith({ ffmpeg: recordingFfmpeg(seen) });
    const clips = [path.join(work, "clip_1.mp4"), path.join(work, "clip_2.mp4")];
    await Promise.all(clips.map((clip) => fs.writeFile(clip, "clip")));

    await encoder.concat(clips, path.join(work, "merged.mp4"));

    expect(await fs.readFile(seen, "utf-8")).toBe("clip_1.mp4\nclip_2.mp4\nconcat.txt\n");
    expect(await listFiles(work)).toEqual(["clip_1.mp4", "clip_2.mp4", "merged.mp4"]);
  });

  it("removes the concat list when concatenation fails", async () => {
    const encoder = await encoderWith({ ffmpeg: "exit 1" });
    const clips = [path.join(work, "clip_1.mp4"), path.join(work, "clip_2.mp4")];
    await Promise.all(clips.map((clip) => fs.writeFile(clip, "clip")));

    await expect(encoder.concat(clips, path.join(work, "merged.mp4"))).rejects.toThrow(
      /ffmpeg exited with code 1$/,
    );
    expect(await listFiles(work)).toEqual(["clip_1.mp4", "clip_2.mp4"]);
  });
});
