import pino from "pino";
import type { BoardrunnerConfig } from "./config.js";

export type Logger = pino.Logger;

export function createLogger(config: Pick<BoardrunnerConfig, "logLevel"> & { logFile?: string | null }): Logger {
  const toFile = config.logFile != null;
  return pino({
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: !toFile,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        ...(toFile ? { destination: config.logFile, mkdir: true } : {}),
      },
    },
  });
}

export function createSilentLogger(): Logger {
  return pino({ enabled: false });
}
