export type LogMeta = Record<string, unknown>;

export type LogLevel = "info" | "warn" | "error";

export type Logger = {
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
};

const SENSITIVE_KEY =
  /secret|private|signature|password|token|authorization|bearer|api[_-]?key|client[_-]?secret/i;
const JWT_PATTERN = /eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g;

const redactString = (value: string) => {
  if (value.toLowerCase().startsWith("bearer ")) {
    return "Bearer [redacted]";
  }
  return value.replace(JWT_PATTERN, "[redacted]");
};

export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 4) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? "[redacted]" : redact(entry, depth + 1);
    }
    return result;
  }
  return value;
};

/** JSON-lines logger: one `{ level, service, event, ...meta }` object per line. */
export const createLogger = (service: string): Logger => {
  const write = (level: LogLevel, event: string, meta?: LogMeta) => {
    const safeMeta = meta ? redact(meta) : undefined;
    const line = JSON.stringify({
      level,
      service,
      event,
      ...(safeMeta && typeof safeMeta === "object" ? safeMeta : {})
    });
    if (level === "error") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  };
  return {
    info: (event, meta) => write("info", event, meta),
    warn: (event, meta) => write("warn", event, meta),
    error: (event, meta) => write("error", event, meta)
  };
};
