/**
 * Structured Logging
 *
 * Leveled log entries with merged context, written to a pluggable sink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: SerializedError;
}

/** Receives every entry that passes the level filter */
export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in SEVERITY;
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Describe a thrown value; anything that is not an Error becomes NonError
 */
export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

/**
 * Single-line colored rendering for terminals, stack on the following lines
 */
export function formatPretty(entry: LogEntry): string {
  const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
  let line = `${DIM}${entry.timestamp}${RESET} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
  }
  if (entry.error) {
    line += `\n${DIM}${entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`}${RESET}`;
  }
  return line;
}

/**
 * Sink writing to the console: warnings and errors to stderr
 */
export function consoleSink(format: LogFormat): LogSink {
  return (entry) => {
    const line = format === 'json' ? JSON.stringify(entry) : formatPretty(entry);
    if (SEVERITY[entry.level] >= SEVERITY.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private context: Record<string, unknown>;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.context = options.context ?? {};
    this.sink = options.output ?? consoleSink(options.format ?? 'json');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * Logger sharing this one's sink and level, with extra context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      output: this.sink,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown,
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };
    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    this.sink(entry);
  }
}

let defaultLogger: Logger | null = null;

/**
 * Default logger: info/json in production, debug/pretty otherwise;
 * LOG_LEVEL overrides the level
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = process.env.NODE_ENV === 'production';
    const level = process.env.LOG_LEVEL;
    defaultLogger = new Logger({
      level: isLogLevel(level) ? level : production ? 'info' : 'debug',
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
