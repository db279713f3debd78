/* eslint-disable no-console -- this IS the logger module */

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";
export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEYS = [
  "password",
  "passwordhash",
  "token",
  "jwt",
  "secret",
  "authorization",
  "cookie",
  "email",
];

const MASK = "***";

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function serializeError(error: Error): LogContext {
  return { name: error.name, message: error.message, stack: error.stack };
}

function redact(context: LogContext): LogContext {
  const result: LogContext = {};

  for (const [key, value] of Object.entries(context)) {
    if (value === undefined || value === null) continue;

    if (isSensitiveKey(key)) {
      result[key] = Array.isArray(value) ? value.map(() => MASK) : MASK;
      continue;
    }

    if (value instanceof Error) {
      result[key] = serializeError(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isPlainObject(item) ? redact(item) : item));
    } else if (isPlainObject(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "fatal"];

function parseLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

class Logger {
  constructor(
    private bindings: LogContext,
    private minLevel: LogLevel
  ) {}

  /** Applied once at startup from the loaded config; existing children keep their settings. */
  configure(options: { level?: LogLevel; bindings?: LogContext }): void {
    if (options.level) this.minLevel = options.level;
    if (options.bindings) this.bindings = { ...this.bindings, ...options.bindings };
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.write("fatal", message, context);
  }

  child(bindings: LogContext): Logger {
    return new Logger({ ...this.bindings, ...bindings }, this.minLevel);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const sanitized = redact({ ...this.bindings, ...context });
    const serialized = Object.keys(sanitized).length > 0 ? ` ${JSON.stringify(sanitized)}` : "";
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}${serialized}`;

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  }
}

export type { Logger };

const nodeEnv = process.env.NODE_ENV ?? "development";

const logger = new Logger(
  { service: process.env.APP_NAME ?? "gambit-server", env: nodeEnv },
  parseLevel(process.env.LOG_LEVEL) ?? (nodeEnv === "production" ? "info" : "debug")
);

export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export default logger;
