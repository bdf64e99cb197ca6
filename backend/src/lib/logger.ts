type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const resolveThreshold = (): LogLevel => {
  const configured = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(configured) ? configured : "info";
};

const timestamp = () => new Date().toISOString();

const formatMeta = (meta: unknown): unknown => {
  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message };
  }
  return meta ?? "";
};

const write = (level: LogLevel, message: string, meta?: unknown): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold()]) {
    return;
  }

  const line = `[${timestamp()}] ${level.toUpperCase()}: ${message}`;
  const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  sink(line, formatMeta(meta));
};

export const logger = {
  debug(message: string, meta?: unknown) {
    write("debug", message, meta);
  },
  info(message: string, meta?: unknown) {
    write("info", message, meta);
  },
  warn(message: string, meta?: unknown) {
    write("warn", message, meta);
  },
  error(message: string, error?: unknown) {
    write("error", message, error);
  },
};
