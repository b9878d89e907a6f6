/**
 * Structured logging for the search engine
 *
 * Module loggers come from `createLogger({ module })` and share one
 * process-wide setting, so the CLI can raise verbosity or switch to JSON
 * lines after the modules have loaded. Everything goes to stderr; stdout
 * belongs to command output.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggingOptions {
  readonly level: LogLevel;
  /** JSON lines instead of `[time] LEVEL module: message` */
  readonly json: boolean;
  readonly write: (line: string) => void;
}

const SERVICE_NAME = 'alpr-scout';

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

let settings: LoggingOptions = {
  level: parseLogLevel(process.env.ALPR_SCOUT_LOG_LEVEL ?? process.env.LOG_LEVEL) ?? 'warn',
  json: process.env.NODE_ENV === 'production',
  write: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Change the shared level, format or sink for every module logger
 */
export function configureLogging(options: Partial<LoggingOptions>): void {
  settings = { ...settings, ...options };
}

export function getLoggingOptions(): LoggingOptions {
  return settings;
}

export class Logger {
  constructor(private readonly source: string) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.emit('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.emit('error', message, metadata);
  }

  private emit(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (RANK[level] < RANK[settings.level]) return;

    const timestamp = new Date().toISOString();
    const extra = metadata !== undefined && Object.keys(metadata).length > 0 ? metadata : undefined;

    settings.write(
      settings.json
        ? JSON.stringify({ timestamp, level, service: this.source, message, ...extra })
        : `[${timestamp}] ${level.toUpperCase()} ${this.source}: ${message}${
            extra !== undefined ? ` ${JSON.stringify(extra)}` : ''
          }`
    );
  }
}

export const logger = new Logger(SERVICE_NAME);

/**
 * Create a module-scoped logger
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger(`${SERVICE_NAME}:${context.module}`);
}
