export type LogMeta = Record<string, unknown>;
export type LogLevel = "info" | "warn" | "error";

export type Logger = {
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
};

export type LogSink = (level: LogLevel, line: string) => void;

const SENSITIVE_KEY =
  /secret|private|signature|password|authorization|bearer|access[_-]?token|refresh[_-]?token|api[_-]?key|client[_-]?secret|^d$|^jwt$|^token$/i;
// Compact JWS: entity configurations and subordinate statements are never logged verbatim.
const JWS_PATTERN = /eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g;

const redactString = (value: string) => {
  if (value.toLowerCase().startsWith("bearer ")) {
    return "Bearer [redacted]";
  }
  return value.replace(JWS_PATTERN, "[redacted]");
};

export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 4) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    const code = "code" in value && typeof value.code === "string" ? value.code : undefined;
    return code
      ? { name: value.name, code, message: redactString(value.message) }
      : { name: value.name, message: redactString(value.message) };
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

const consoleSink: LogSink = (level, line) => {
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

export const createLogger = (service: string, sink: LogSink = consoleSink): Logger => {
  const write = (level: LogLevel, event: string, meta?: LogMeta) => {
    const safeMeta = meta ? redact(meta) : undefined;
    const payload = {
      level,
      service,
      event,
      ...(safeMeta && typeof safeMeta === "object" ? safeMeta : {})
    };
    sink(level, JSON.stringify(payload));
  };
  return {
    info: (event, meta) => write("info", event, meta),
    warn: (event, meta) => write("warn", event, meta),
    error: (event, meta) => write("error", event, meta)
  };
};
