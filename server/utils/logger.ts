export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.debug(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

let threshold: LogLevel = "info";

/** Process-wide; set once at startup from LOG_LEVEL. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function describeFailure(failure: unknown): LogContext {
  if (failure instanceof Error) {
    return { error: failure.message, errorType: failure.name, stack: failure.stack };
  }
  return { error: String(failure) };
}

/**
 * Console logger. Lines read `[Prefix] message {"key":"value"}`; the bound
 * context comes first, per-call context overrides it.
 */
export class Logger {
  constructor(
    private prefix: string,
    private bound: LogContext = {},
  ) {}

  child(context: LogContext): Logger {
    return new Logger(this.prefix, { ...this.bound, ...context });
  }

  debug(message: string, context?: LogContext) {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.write("warn", message, context);
  }

  error(message: string, failure?: unknown, context?: LogContext) {
    this.write(
      "error",
      message,
      failure === undefined ? context : { ...describeFailure(failure), ...context },
    );
  }

  private write(level: LogLevel, message: string, context?: LogContext) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const merged = { ...this.bound, ...context };
    const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    SINKS[level](`[${this.prefix}] ${message}${suffix}`);
  }
}

export function createLogger(prefix: string, context?: LogContext): Logger {
  return new Logger(prefix, context);
}
