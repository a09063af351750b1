export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel =
  process.env.NODE_ENV === "production" ? "info" : "debug";

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

const serializeError = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
      ...(error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { value: String(error) };
};

const serializeMeta = (meta?: Record<string, unknown>): string => {
  if (!meta) return "";

  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (key === "error" && value !== null && typeof value === "object") {
      serialized[key] = serializeError(value);
    } else {
      serialized[key] = value;
    }
  }

  return ` ${JSON.stringify(serialized)}`;
};

const log = (
  level: LogLevel,
  context: string,
  message: string,
  meta?: Record<string, unknown>,
) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] [${context}] ${message}${serializeMeta(meta)}`;

  switch (level) {
    case "error":
      console.error(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    default:
      console.log(logMessage);
  }
};

export const logger = {
  debug: (context: string, message: string, meta?: Record<string, unknown>) =>
    log("debug", context, message, meta),
  info: (context: string, message: string, meta?: Record<string, unknown>) =>
    log("info", context, message, meta),
  warn: (context: string, message: string, meta?: Record<string, unknown>) =>
    log("warn", context, message, meta),
  error: (context: string, message: string, meta?: Record<string, unknown>) =>
    log("error", context, message, meta),
};
