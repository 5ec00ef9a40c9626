import pino from "pino";

export const createLogger = (level: string) =>
  pino({
    level,
    base: { service: "reels-merger" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
