import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({
    level,
    base: { service: "media-transcript-service" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

// Sink for tests and callers that do not care about log output
export const silentLogger: Logger = pino({ level: "silent" });
