/**
 * Logger contract handed to plugins and analyzers, plus the console-backed
 * implementation the CLI uses.
 *
 * Output goes to stderr so stdout stays free for `--json` reports.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "text" | "json";

export type LogFields = Record<string, unknown>;

export type Logger = {
  debug?: (msg: string, fields?: LogFields) => void;
  info: (msg: string, fields?: LogFields) => void;
  warn: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
};

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  /** Defaults to `console.error`. */
  write?: (line: string) => void;
  now?: () => Date;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const parts = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const format = options.format ?? "text";
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, msg: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) return;
    if (format === "json") {
      write(JSON.stringify({ level, msg, time: now().toISOString(), ...fields }));
      return;
    }
    write(`[${level}] ${msg}${formatFields(fields)}`);
  };

  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
