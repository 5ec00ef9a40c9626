export class HttpError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class QueueFullError extends HttpError {
  constructor(limit: number) {
    super(`Server is busy: ${limit} merge jobs already waiting, try again later`, 503);
  }
}

export class ProcessError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    reason?: string,
  ) {
    super(
      reason ??
        `${command} exited with code ${exitCode}${stderr ? `: ${lastLine(stderr)}` : ""}`,
    );
    this.name = "ProcessError";
  }
}

export class DownloadError extends HttpError {
  constructor(
    readonly videoIndex: number,
    title: string,
    cause: unknown,
  ) {
    super(`Failed to download video ${videoIndex} ("${title}"): ${errorMessage(cause)}`, 500);
  }
}

export class EncodeError extends HttpError {
  constructor(step: string, cause: unknown) {
    super(`Failed to ${step}: ${errorMessage(cause)}`, 500);
  }
}

const lastLine = (text: string) => {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1] ?? "";
};

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
