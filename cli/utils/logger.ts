import type { StatusReporter } from '../lib/types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  meta?: unknown;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

const WRITERS: Readonly<Record<LogLevel, (line: string) => void>> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

// Errors serialize to {} through JSON.stringify
function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return JSON.stringify({ name: meta.name, message: meta.message });
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}

export function formatEntry(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const meta = entry.meta !== undefined ? ` ${formatMeta(entry.meta)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}]${scope} ${entry.message}${meta}`;
}

/**
 * Shared by a logger and all of its children, so `setLevel` applies everywhere
 */
interface LoggerState {
  minLevel: LogLevel;
}

class Logger {
  constructor(
    private readonly state: LoggerState,
    private readonly scope?: string
  ) {}

  setLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.state.minLevel;
  }

  /**
   * Logger whose lines are tagged `[parent:scope]`
   */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  /**
   * Status reporter that writes through this logger
   */
  reporter(level: LogLevel = 'info'): StatusReporter {
    return (message) => this.log(level, message);
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.state.minLevel)) return;

    WRITERS[level](
      formatEntry({
        level,
        message,
        timestamp: new Date().toISOString(),
        scope: this.scope,
        meta,
      })
    );
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger({ minLevel: isLogLevel(envLevel) ? envLevel : 'info' });
