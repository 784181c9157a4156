// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEventInput = {
  type: string;
  requestId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type LogRecord = {
  ts: string;
  level: LogLevel;
  type: string;
  function?: string;
  request_id?: string;
  payload?: JsonObject;
};

export type LogDefaults = {
  functionName?: string;
  requestId?: string;
};

export interface Logger {
  readonly level: LogLevel;
  debug(event: LogEventInput): void;
  info(event: LogEventInput): void;
  warn(event: LogEventInput): void;
  error(event: LogEventInput): void;
  log(level: LogLevel, event: LogEventInput): void;
  withDefaults(defaults: LogDefaults): Logger;
}

type LogSink = (record: LogRecord) => void;

export type LogStream = {
  write(chunk: string): unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// =============================================================================
// LOGGERS
// =============================================================================

export function createStdoutLogger(
  options: { level?: LogLevel; defaults?: LogDefaults; stream?: LogStream } = {},
): Logger {
  const stream = options.stream ?? process.stdout;
  return createLogger(options.level ?? "info", options.defaults ?? {}, (record) => {
    stream.write(JSON.stringify(record) + "\n");
  });
}

export type MemoryLogger = Logger & {
  records: LogRecord[];
};

// Keeps every record at or above `level` in memory instead of writing it.
export function createMemoryLogger(level: LogLevel = "debug"): MemoryLogger {
  const records: LogRecord[] = [];
  const logger = createLogger(level, {}, (record) => records.push(record));
  return Object.assign(logger, { records });
}

function createLogger(level: LogLevel, defaults: LogDefaults, sink: LogSink): Logger {
  const log = (eventLevel: LogLevel, event: LogEventInput): void => {
    if (LEVEL_ORDER[eventLevel] < LEVEL_ORDER[level]) return;
    sink(normalizeEvent(eventLevel, event, defaults));
  };

  return {
    level,
    log,
    debug: (event) => log("debug", event),
    info: (event) => log("info", event),
    warn: (event) => log("warn", event),
    error: (event) => log("error", event),
    withDefaults: (extra) => createLogger(level, { ...defaults, ...extra }, sink),
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export function normalizeEvent(
  level: LogLevel,
  event: LogEventInput,
  defaults: LogDefaults = {},
): LogRecord {
  const ts =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : isoNow();

  const record: LogRecord = { ts, level, type: event.type };

  if (defaults.functionName) {
    record.function = defaults.functionName;
  }
  const requestId = event.requestId ?? defaults.requestId;
  if (requestId) {
    record.request_id = requestId;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    record.payload = event.payload;
  }

  return record;
}

export function isoNow(): string {
  return new Date().toISOString();
}
