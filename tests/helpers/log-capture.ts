import pino, { type Logger } from "pino";

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export const LEVELS = { debug: 20, info: 30, warn: 40, error: 50, fatal: 60 } as const;

function toRecord(value: unknown): LogRecord | null {
  if (typeof value !== "object" || value === null) return null;
  const level = "level" in value ? value.level : undefined;
  const msg = "msg" in value ? value.msg : undefined;
  if (typeof level !== "number" || typeof msg !== "string") return null;
  return { ...value, level, msg };
}

/** A pino logger that keeps every record in memory. */
export function captureLogs(level: pino.Level = "debug") {
  const records: LogRecord[] = [];
  const logger: Logger = pino(
    { level, base: null },
    {
      write(line: string) {
        const record = toRecord(JSON.parse(line));
        if (record) records.push(record);
      },
    }
  );

  return {
    logger,
    records,
    messages: () => records.map((record) => record.msg),
    withMessage: (msg: string) => records.filter((record) => record.msg === msg),
  };
}
