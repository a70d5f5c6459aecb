import { createLogger } from "../../src/logger";
import type { Logger, LogLevel } from "../../src/logger";

export interface LogRecord {
  level: number;
  msg?: string;
  component?: string;
  [key: string]: unknown;
}

export interface CapturedLog {
  log: Logger;
  records: LogRecord[];
  messages(): string[];
}

/** Logger whose JSON lines are parsed into `records` as they are written. */
export function captureLogs(level: LogLevel = "debug"): CapturedLog {
  const records: LogRecord[] = [];
  const log = createLogger({
    level,
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null && "level" in parsed) {
          const { level: lineLevel } = parsed;
          records.push({
            ...parsed,
            level: typeof lineLevel === "number" ? lineLevel : 0,
          });
        }
      },
    },
  });
  return {
    log,
    records,
    messages: () => records.flatMap(record => (record.msg ? [record.msg] : [])),
  };
}
