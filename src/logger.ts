export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  [key: string]: unknown;
}

export type LogSink = (entry: LogEntry, formatted: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  sink?: LogSink;
}

const defaultSink: LogSink = (entry, formatted) => {
  const stream = entry.level === 'error' ? process.stderr : process.stdout;
  stream.write(formatted + '\n');
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private readonly minLevel: number;
  private readonly pretty: boolean;
  private readonly sink: LogSink;

  constructor(
    private readonly module: string,
    private readonly level: LogLevel = 'info',
    private readonly context: Record<string, unknown> = {},
    options: Omit<LoggerOptions, 'level'> = {},
  ) {
    this.minLevel = LOG_LEVEL_PRIORITY[level];
    this.pretty = options.pretty ?? false;
    this.sink = options.sink ?? defaultSink;
  }

  child(module: string, additionalContext: Record<string, unknown> = {}): Logger {
    return new Logger(
      `${this.module}:${module}`,
      this.level,
      { ...this.context, ...additionalContext },
      { pretty: this.pretty, sink: this.sink },
    );
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  errorObj(message: string, err: unknown, meta?: Record<string, unknown>): void {
    const error =
      err instanceof Error ? { name: err.name, message: err.message, stack: err.stack } : { message: String(err) };
    this.log('error', message, { ...meta, error });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < this.minLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
      ...this.context,
      ...meta,
    };
    this.sink(entry, this.pretty ? formatPretty(entry) : JSON.stringify(entry));
  }
}

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, module, message, ...rest } = entry;
  const fields = Object.keys(rest).length > 0 ? ' ' + JSON.stringify(rest) : '';
  const time = timestamp.slice(11, 23);
  return `${time} ${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} [${module}] ${message}${fields}`;
}

export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  return new Logger(module, level, {}, {
    pretty: options.pretty ?? Boolean(process.stdout.isTTY),
    sink: options.sink,
  });
}
