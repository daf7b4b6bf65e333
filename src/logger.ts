export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerConfig = {
  level: LogLevel;
  includeTimings: boolean;
  format: "json" | "pretty";
  color: boolean;
  timeZone?: string;
};

type LogData = Record<string, unknown>;

export type ContextLogger = {
  debug: (msg: string, data?: LogData) => void;
  info: (msg: string, data?: LogData) => void;
  warn: (msg: string, data?: LogData) => void;
  error: (msg: string, data?: LogData) => void;
  withContext: (extra: LogData) => ContextLogger;
};

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const levelColor: Record<LogLevel, string> = {
  debug: "\u001b[35m",
  info: "\u001b[32m",
  warn: "\u001b[33m",
  error: "\u001b[31m"
};

let config: LoggerConfig = {
  level: "info",
  includeTimings: false,
  format: "json",
  color: false
};

export function setLoggerConfig(next: Partial<LoggerConfig>) {
  config = { ...config, ...next };
}

export function getLoggerConfig(): LoggerConfig {
  return config;
}

function write(level: LogLevel, msg: string, data?: LogData) {
  if (levelWeight[level] < levelWeight[config.level]) return;

  const ts = formatTimestamp(new Date(), config.timeZone);
  const line =
    config.format === "json"
      ? JSON.stringify({ level, msg, ts, data })
      : formatPretty(level, msg, ts, data);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

// Pretty lines stay single-line so a run can be followed with grep.
function formatPretty(level: LogLevel, msg: string, ts: string, data?: LogData) {
  const label = config.color ? `${levelColor[level]}${level}\u001b[0m` : level;
  const header = `[${ts}] ${label} ${msg}`;
  if (!data || Object.keys(data).length === 0) return header;
  return `${header} ${JSON.stringify(data)}`;
}

function bind(context?: LogData): ContextLogger {
  const merge = (data?: LogData) => (context ? { ...context, ...data } : data);
  return {
    debug: (msg, data) => write("debug", msg, merge(data)),
    info: (msg, data) => write("info", msg, merge(data)),
    warn: (msg, data) => write("warn", msg, merge(data)),
    error: (msg, data) => write("error", msg, merge(data)),
    withContext: (extra) => bind({ ...context, ...extra })
  };
}

export const logger = bind();

/**
 * Elapsed-time field for a log payload. Empty unless timings are enabled,
 * so it can always be spread into the data object.
 */
export function withDuration(start: number): { durationMs?: number } {
  if (!config.includeTimings) return {};
  return { durationMs: Date.now() - start };
}

/** ISO string in UTC, or local wall-clock time with the zone name appended. */
export function formatTimestamp(date: Date, timeZone?: string) {
  if (!timeZone) {
    return date.toISOString();
  }
  const parts = new Intl.DateTimeFormat("sv-SE", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false
  }).formatToParts(date);
  const map = Object.fromEntries(parts.map((part) => [part.type, part.value]));
  const ms = String(date.getMilliseconds()).padStart(3, "0");
  return `${map.year}-${map.month}-${map.day}T${map.hour}:${map.minute}:${map.second}.${ms} ${timeZone}`;
}
