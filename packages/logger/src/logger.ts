export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

/**
 * Destination for log entries. `flush` must drain anything buffered synchronously.
 */
export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const levelRank: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

/**
 * Make a context object JSON-safe.
 * Errors become { name, message, stack }, bigints become decimal strings,
 * and any object reached a second time is replaced by '[Circular]'
 * (shared references included, not only true cycles).
 */
export function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const json = JSON.stringify(obj, replacer);
    const parsed: unknown = JSON.parse(json);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return { error: '[unserializable]' };
  }
}

let activeConfig: { level: LogLevel; sinks: Sink[] } = {
  level: 'info',
  sinks: [],
};

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('trace', msgOrObj, msg);
  }

  debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('debug', msgOrObj, msg);
  }

  info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('info', msgOrObj, msg);
  }

  warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('warn', msgOrObj, msg);
  }

  error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
    this.emit('error', msgOrObj, msg);
  }

  private emit(level: LogLevel, msgOrObj: string | Record<string, unknown>, msg?: string): void {
    if (activeConfig.sinks.length === 0) return;
    if (levelRank[level] < levelRank[activeConfig.level]) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: msg ?? '',
            context: serializeContext(msgOrObj),
          };

    for (const sink of activeConfig.sinks) {
      sink.write(entry);
    }
  }
}

const loggers = new Map<string, Logger>();

/**
 * Configure level and sinks for every logger, including ones already handed out.
 * Loggers are silent until this is called with at least one sink.
 */
export function initLogger(config: LoggerConfig): void {
  activeConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  const cached = loggers.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  loggers.set(category, logger);
  return logger;
}

/**
 * Drain all sinks. Call before process exit.
 */
export function flushLoggers(): void {
  for (const sink of activeConfig.sinks) {
    sink.flush();
  }
}
