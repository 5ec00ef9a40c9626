import dotenv from "dotenv";
dotenv.config();

export interface AppConfig {
  port: number;
  host: string;
  tempDir: string;
  outputDir: string;
  maxWorkers: number;
  maxQueueSize: number;
  maxVideos: number;
  reels: { width: number; height: number };
  tools: { ytDlp: string; ffmpeg: string; ffprobe: string };
  encode: { preset: string; crf: number; fontFile: string };
  downloadTimeoutMs: number;
  encodeTimeoutMs: number;
  outputMaxAgeMs: number;
  sweepIntervalMs: number;
  redisUrl?: string;
  runWorker: boolean;
  corsOrigin: string;
  bodyLimit: number;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

const readString = (env: Env, key: string, fallback: string) => {
  const value = env[key]?.trim();
  return value ? value : fallback;
};

const readNumber = (
  env: Env,
  key: string,
  fallback: number,
  { min = 0, integer = true }: { min?: number; integer?: boolean } = {},
) => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
    throw new Error(`Invalid environment variable: ${key}=${raw}`);
  }
  return value;
};

const readBoolean = (env: Env, key: string, fallback: boolean) => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  return /^(1|true|yes)$/i.test(raw);
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const redisUrl = env.REDIS_URL?.trim();

  return {
    port: readNumber(env, "PORT", 8000, { min: 1 }),
    host: readString(env, "HOST", "0.0.0.0"),
    tempDir: readString(env, "TEMP_DIR", "/tmp/video_processing"),
    outputDir: readString(env, "OUTPUT_DIR", "/tmp/video_output"),
    maxWorkers: readNumber(env, "MAX_WORKERS", 3, { min: 1 }),
    maxQueueSize: readNumber(env, "MAX_QUEUE_SIZE", 10),
    maxVideos: readNumber(env, "MAX_VIDEOS", 15, { min: 1 }),
    reels: { width: 1080, height: 1920 },
    tools: {
      ytDlp: readString(env, "YTDLP_PATH", "yt-dlp"),
      ffmpeg: readString(env, "FFMPEG_PATH", "ffmpeg"),
      ffprobe: readString(env, "FFPROBE_PATH", "ffprobe"),
    },
    encode: {
      preset: readString(env, "ENCODE_PRESET", "medium"),
      crf: readNumber(env, "ENCODE_CRF", 23),
      fontFile: readString(
        env,
        "FONT_FILE",
        "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf",
      ),
    },
    downloadTimeoutMs: readNumber(env, "DOWNLOAD_TIMEOUT_MS", 300_000, { min: 1 }),
    encodeTimeoutMs: readNumber(env, "ENCODE_TIMEOUT_MS", 900_000, { min: 1 }),
    outputMaxAgeMs:
      readNumber(env, "OUTPUT_MAX_AGE_HOURS", 24, { integer: false }) * 3_600_000,
    sweepIntervalMs:
      readNumber(env, "OUTPUT_SWEEP_INTERVAL_MINUTES", 0, { integer: false }) * 60_000,
    redisUrl: redisUrl ? redisUrl : undefined,
    runWorker: readBoolean(env, "RUN_WORKER", true),
    corsOrigin: readString(env, "CORS_ORIGIN", "*"),
    bodyLimit: readNumber(env, "BODY_LIMIT_BYTES", 1048576 * 10, { min: 1 }),
    logLevel: readString(env, "LOG_LEVEL", "info"),
  };
};
