/**
 * Logger Service
 * One line per entry: `[time] [LEVEL] [Context] message {data}`. The level
 * threshold comes from LOG_LEVEL unless a logger is given its own; children
 * inherit both the threshold and the sink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  colors?: boolean;
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',  // Cyan
  info: '\x1b[32m',   // Green
  warn: '\x1b[33m',   // Yellow
  error: '\x1b[31m',  // Red
};
const RESET = '\x1b[0m';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export class Logger {
  readonly context: string;
  readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly colors: boolean;

  constructor(context: string = 'App', options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? envLevel();
    this.sink = options.sink ?? consoleSink;
    this.colors = options.colors ?? true;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  format(level: LogLevel, message: string, data?: unknown, now: Date = new Date()): string {
    const tag = `[${now.toISOString()}] [${level.toUpperCase().padEnd(5)}] [${this.context}]`;
    const prefix = this.colors ? `${LOG_COLORS[level]}${tag}${RESET}` : tag;
    return data === undefined ? `${prefix} ${message}` : `${prefix} ${message} ${JSON.stringify(data)}`;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.isEnabled(level)) this.sink(level, this.format(level, message, data));
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, {
      level: this.level,
      sink: this.sink,
      colors: this.colors,
    });
  }
}

export const logger = new Logger();

export function createLogger(context: string): Logger {
  return new Logger(context);
}
