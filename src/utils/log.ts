export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

export type LogFields = Record<string, unknown>;

export type Logger = {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  critical(event: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
};

function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  switch (configured) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "critical":
      return configured;
    default:
      return "info";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One JSON line per event, e.g.
 *   {"level":"info","scope":"detector","event":"new_deal_detected","deal_id":"42",...}
 */
export function createLogger(scope: string, bound: LogFields = {}): Logger {
  const write = (level: LogLevel, event: string, fields: LogFields = {}) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) {
      return;
    }

    const line = JSON.stringify({
      level,
      scope,
      event,
      ...bound,
      ...fields,
      at: new Date().toISOString(),
    });

    if (level === "error" || level === "critical") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (event, fields) => write("debug", event, fields),
    info: (event, fields) => write("info", event, fields),
    warn: (event, fields) => write("warn", event, fields),
    error: (event, fields) => write("error", event, fields),
    critical: (event, fields) => write("critical", event, fields),
    child: (fields) => createLogger(scope, { ...bound, ...fields }),
  };
}
