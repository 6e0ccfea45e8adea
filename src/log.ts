export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Sink = {
  log(line: string): void;
  error(line: string): void;
};

export type LoggerOptions = {
  level?: LogLevel;
  // send every line to stderr (keeps stdout clean for --json)
  stderrOnly?: boolean;
  sink?: Sink;
  now?: () => Date;
};

export function formatLine(at: Date, level: LogLevel, message: string) {
  return `${at.toISOString()} - ${level.toUpperCase()} - ${message}`;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const min = LOG_LEVELS.indexOf(opts.level ?? "info");
  const sink = opts.sink ?? console;
  const now = opts.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(level) < min) return;
    const line = formatLine(now(), level, message);
    if (opts.stderrOnly || level === "warn" || level === "error") sink.error(line);
    else sink.log(line);
  };

  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
  };
}
