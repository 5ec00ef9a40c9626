// Data handed from the HTTP layer to a merge worker
export interface ClipSpec {
  title: string;
  hlsUrl: string;
  sourceUrl: string;
}

export interface MergeJobData {
  videos: ClipSpec[];
}

export interface MergeResult {
  outputFile: string;
  videoCount: number;
}

export interface ClipOverlay {
  index: number;
  total: number;
  title: string;
}

export interface MediaInfo {
  durationSeconds: number;
  hasAudio: boolean;
}

// Adapters around the external tools
export interface Downloader {
  download(url: string, outputPath: string): Promise<void>;
}

export interface Encoder {
  probe(inputPath: string): Promise<MediaInfo>;
  renderClip(
    inputPath: string,
    outputPath: string,
    overlay: ClipOverlay,
    options: { hasAudio: boolean },
  ): Promise<void>;
  concat(inputPaths: string[], outputPath: string): Promise<void>;
}

// API shapes
export interface MergeResponseBody {
  status: "success" | "error";
  message: string;
  output_file?: string;
  video_count?: number;
}

export interface QueueStats {
  active: number;
  waiting: number;
  concurrency: number;
  maxWaiting: number;
}
