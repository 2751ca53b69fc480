import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(level: string, fd: 1 | 2 = 1): Logger {
  return pino(
    { level, base: { service: "song-transcript-service" } },
    pino.destination(fd)
  );
}
