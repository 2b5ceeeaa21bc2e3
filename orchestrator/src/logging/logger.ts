export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface LogRecord {
  time: string;
  level: LogLevel;
  scope: string;
  message: string;
  fields?: LogFields;
}

export type LogSink = (record: LogRecord) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function formatLogLine(record: LogRecord): string {
  const scope = record.scope ? `[${record.scope}] ` : "";
  const fields =
    record.fields && Object.keys(record.fields).length > 0
      ? ` ${JSON.stringify(record.fields)}`
      : "";
  return `${scope}${record.message}${fields}`;
}

export const consoleSink: LogSink = (record) => {
  const line = formatLogLine(record);
  if (record.level === "error") {
    console.error(line);
  } else if (record.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

interface LoggerState {
  level: LogLevel;
  sinks: Set<LogSink>;
}

/**
 * Scoped logger. Children share the root's level and sinks, so a sink added
 * anywhere sees every scope.
 */
export class Logger {
  private constructor(
    private readonly state: LoggerState,
    readonly scope: string,
  ) {}

  static create(options: { level?: LogLevel; sinks?: LogSink[]; scope?: string } = {}): Logger {
    return new Logger(
      {
        level: options.level ?? "info",
        sinks: new Set(options.sinks ?? [consoleSink]),
      },
      options.scope ?? "",
    );
  }

  /** Logger that drops everything; used where no logger is injected. */
  static silent(): Logger {
    return Logger.create({ sinks: [] });
  }

  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  get level(): LogLevel {
    return this.state.level;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  addSink(sink: LogSink): () => void {
    this.state.sinks.add(sink);
    return () => {
      this.state.sinks.delete(sink);
    };
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) {
      return;
    }
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
    };
    if (fields) {
      record.fields = fields;
    }
    for (const sink of this.state.sinks) {
      sink(record);
    }
  }
}
