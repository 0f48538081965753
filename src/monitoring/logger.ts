/**
 * Structured Logger (Pino)
 *
 * Every record goes to two pino-pretty streams through pino.multistream:
 * - the log file, appended to as plain single-line text
 *   ("[2024-01-01 12:00:00.000] INFO: message {fields}")
 * - stdout, coloured outside production
 *
 * Components take a logger parameter that defaults to the shared instance
 * below. Under test (NODE_ENV=test) the shared instance writes no file.
 */
import pino, { type Level, type Logger } from "pino";
import pretty from "pino-pretty";
import config from "../config";

export interface LoggerOptions {
  level?: Level;
  /** Append-mode log file; no file stream when null */
  file?: string | null;
  /** Mirror records to stdout */
  console?: boolean;
  colorize?: boolean;
}

const LINE_FORMAT = {
  translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
  ignore: "pid,hostname",
  singleLine: true,
} as const;

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const streams: pino.StreamEntry[] = [];

  if (options.file) {
    streams.push({
      level,
      stream: pretty({
        ...LINE_FORMAT,
        colorize: false,
        destination: options.file,
        append: true,
        mkdir: true,
        sync: true,
      }),
    });
  }

  if (options.console ?? true) {
    streams.push({
      level,
      stream: pretty({
        ...LINE_FORMAT,
        colorize: options.colorize ?? true,
        destination: 1,
        sync: true,
      }),
    });
  }

  return pino({ level }, pino.multistream(streams));
}

export const logger: Logger = createLogger({
  level: config.logLevel,
  file: config.env === "test" ? null : config.logFile,
  colorize: config.env !== "production",
});
