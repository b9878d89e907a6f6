/**
 * CLI Structured Logging
 *
 * `--json` switches every entry to one JSON object per line. Otherwise
 * entries are colored single lines. Unit progress goes to stderr so that
 * stdout carries only command output.
 *
 * @module cli/lib/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  readonly level: LogLevel;
  readonly json: boolean;
  /** Stream for the progress bar; stderr when omitted */
  readonly progressStream?: NodeJS.WritableStream;
  readonly now?: () => number;
}

/**
 * Unit accounting shown on the progress line
 */
export interface SearchProgress {
  readonly total: number;
  readonly finished: number;
  readonly failed: number;
  readonly label?: string;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
} as const;

const LEVEL_STYLE: Record<LogLevel, { readonly color: string; readonly tag: string }> = {
  debug: { color: ANSI.dim, tag: 'debug' },
  info: { color: ANSI.green, tag: 'info ' },
  warn: { color: ANSI.yellow, tag: 'warn ' },
  error: { color: ANSI.red, tag: 'error' },
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const BAR_WIDTH = 24;

function renderValue(value: unknown): string {
  return value !== null && typeof value === 'object' ? JSON.stringify(value) : String(value);
}

export class CLILogger {
  private readonly now: () => number;
  private command: string | null = null;
  private commandStartedAt: number;

  constructor(private readonly config: CLILoggerConfig) {
    this.now = config.now ?? Date.now;
    this.commandStartedAt = this.now();
  }

  get json(): boolean {
    return this.config.json;
  }

  /**
   * One JSON line: timestamp, level, message, command, then metadata keys
   */
  formatJson(level: LogLevel, message: string, metadata: LogMetadata = {}): string {
    return JSON.stringify({
      timestamp: new Date(this.now()).toISOString(),
      level,
      message,
      ...(this.command !== null ? { command: this.command } : {}),
      ...metadata,
    });
  }

  formatHuman(level: LogLevel, message: string, metadata: LogMetadata = {}): string {
    const style = LEVEL_STYLE[level];
    const pairs = Object.entries(metadata).map(
      ([key, value]) => `${ANSI.magenta}${key}${ANSI.reset}=${renderValue(value)}`
    );
    const suffix = pairs.length > 0 ? ` ${ANSI.dim}${pairs.join(' ')}${ANSI.reset}` : '';
    return `${style.color}${style.tag}${ANSI.reset} ${message}${suffix}`;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  /**
   * Name the running command and restart its clock
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.commandStartedAt = this.now();
    this.debug(`${command} started`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const durationMs = this.now() - this.commandStartedAt;
    if (success) {
      this.info(`${this.command ?? 'command'} finished`, { duration_ms: durationMs, ...metadata });
    } else {
      this.error(`${this.command ?? 'command'} failed`, { duration_ms: durationMs, ...metadata });
    }
  }

  /**
   * JSON mode logs each update at debug level; otherwise a bar is redrawn
   * in place and ended with a newline once every unit has finished.
   */
  progress(update: SearchProgress): void {
    const { total, finished, failed, label } = update;
    const ratio = total > 0 ? Math.min(1, finished / total) : 1;

    if (this.config.json) {
      this.debug('Search progress', { finished, failed, total, label });
      return;
    }

    const stream = this.config.progressStream ?? process.stderr;
    const filled = Math.round(ratio * BAR_WIDTH);
    const bar = '#'.repeat(filled) + '.'.repeat(BAR_WIDTH - filled);
    const failures = failed > 0 ? ` ${ANSI.red}${failed} failed${ANSI.reset}` : '';
    const tail = label !== undefined ? ` ${ANSI.dim}${label}${ANSI.reset}` : '';
    stream.write(`\r[${bar}] ${finished}/${total} units${failures}${tail}`);
    if (finished >= total) {
      stream.write('\n');
    }
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (SEVERITY[level] < SEVERITY[this.config.level]) return;
    const line = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);
    SINKS[level](line);
  }
}

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    progressStream: config.progressStream,
    now: config.now,
  });
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
