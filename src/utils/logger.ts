/**
 * Logger
 *
 * Leveled logger configured through LOG_LEVEL and LOG_FORMAT.
 * Output goes to stderr so that stdout stays available for converted data.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  scope?: string;
  sink?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  const normalized = value?.toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return fallback;
}

export function parseLogFormat(value: string | undefined): LogFormat {
  return value?.toLowerCase() === 'json' ? 'json' : 'text';
}

interface SharedState {
  level: LogLevel;
}

export class Logger {
  private readonly state: SharedState;
  private readonly format: LogFormat;
  private readonly scope?: string;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions = {}, state?: SharedState) {
    this.state = state ?? { level: options.level ?? parseLogLevel(process.env.LOG_LEVEL) };
    this.format = options.format ?? parseLogFormat(process.env.LOG_FORMAT);
    this.scope = options.scope;
    this.sink = options.sink ?? ((line) => process.stderr.write(line + '\n'));
  }

  /** Applies to this logger and every child derived from the same root. */
  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.state.level];
  }

  /**
   * Derive a logger that prefixes every entry with `scope`.
   */
  child(scope: string): Logger {
    return new Logger(
      {
        format: this.format,
        scope: this.scope ? `${this.scope}:${scope}` : scope,
        sink: this.sink,
      },
      this.state
    );
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      this.sink(
        JSON.stringify({ timestamp, level, scope: this.scope, message, ...context })
      );
      return;
    }

    const prefix = this.scope ? `[${this.scope}] ` : '';
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    this.sink(`${timestamp} ${level.toUpperCase().padEnd(5)} ${prefix}${message}${suffix}`);
  }
}

export const logger = new Logger();
