/**
 * Simple Logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogSink = (line: string, level: LogLevel) => void;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(l => l === value);
}

/**
 * LOG_LEVEL from the environment, or 'info'
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(value) ? value : 'info';
}

// Shared by a logger and all of its children
interface LoggerSettings {
  level: LogLevel;
  sinks: LogSink[];
}

export class Logger {
  private readonly settings: LoggerSettings;

  constructor(
    private readonly scope: string | null = null,
    level?: LogLevel,
    sinks: LogSink[] | LoggerSettings = [],
  ) {
    this.settings = Array.isArray(sinks)
      ? { level: level ?? levelFromEnv(), sinks }
      : sinks;
  }

  /**
   * Logger sharing this one's level and sinks, with `scope` prefixed to every message
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(nested, undefined, this.settings);
  }

  /** Applies to this logger, its parent and every child */
  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  addSink(sink: LogSink): void {
    this.settings.sinks.push(sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.settings.level);
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const scope = this.scope ? `[${this.scope}] ` : '';
    const dataStr = data ? ` ${JSON.stringify(data)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${scope}${message}${dataStr}`;
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const line = this.format(level, message, data);
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
    for (const sink of this.settings.sinks) {
      sink(line, level);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit('error', message, data);
  }
}

export const logger = new Logger();
