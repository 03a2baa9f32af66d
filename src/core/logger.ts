import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  message?: string;
  payload?: JsonObject;
};

export type LogEvent = LogEventInput & {
  ts: string;
  level: LogLevel;
};

export type LogFormat = "text" | "jsonl";

export interface EventLogger {
  log(event: LogEventInput): void;
}

type WritableLike = { write(chunk: string): unknown };

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  constructor(
    private readonly filePath: string,
    private readonly base: JsonObject = {},
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEventInput): void {
    fs.appendFileSync(this.filePath, JSON.stringify({ ...this.base, ...stamp(event) }) + "\n", "utf8");
  }
}

export function createStreamLogger(
  stream: WritableLike = process.stderr,
  opts: { format?: LogFormat; minLevel?: LogLevel } = {},
): EventLogger {
  const format = opts.format ?? "text";
  const minLevel = opts.minLevel ?? "info";

  return {
    log(event: LogEventInput): void {
      const stamped = stamp(event);
      if (LEVEL_ORDER[stamped.level] < LEVEL_ORDER[minLevel]) return;

      stream.write(format === "jsonl" ? JSON.stringify(stamped) + "\n" : formatTextLine(stamped));
    },
  };
}

export function combineLoggers(...loggers: EventLogger[]): EventLogger {
  return {
    log(event: LogEventInput): void {
      for (const logger of loggers) {
        logger.log(event);
      }
    },
  };
}

export const silentLogger: EventLogger = { log: () => undefined };

export function logWarning(
  logger: EventLogger,
  type: string,
  message: string,
  payload?: JsonObject,
): void {
  logger.log({ type, level: "warn", message, payload });
}

// =============================================================================
// INTERNALS
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const TEXT_PREFIX: Record<LogLevel, string> = {
  debug: "debug",
  info: "info",
  warn: "warning",
  error: "error",
};

function stamp(event: LogEventInput): LogEvent {
  return { ts: new Date().toISOString(), ...event, level: event.level ?? "info" };
}

function formatTextLine(event: LogEvent): string {
  return `${TEXT_PREFIX[event.level]}: ${event.message ?? event.type}\n`;
}
