/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 10,
  INFO = 20,
  WARNING = 30,
  ERROR = 40,
  CRITICAL = 50,
}

export type LogLevelName = 'debug' | 'info' | 'warning' | 'error' | 'critical';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warning: LogLevel.WARNING,
  error: LogLevel.ERROR,
  critical: LogLevel.CRITICAL,
};

/**
 * Map a configured level name onto a LogLevel.
 */
export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

/**
 * Named, levelled console logger used across the agents and the server.
 */
export class Logger {
  private name: string;
  private level: LogLevel = LogLevel.INFO;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Set the log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Check if a message at the given level would be logged
   */
  private isEnabledFor(level: LogLevel): boolean {
    return level >= this.level;
  }

  private format(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `${timestamp} [${level}] ${this.name}: ${message}`;
  }

  debug(message: string): void {
    if (this.isEnabledFor(LogLevel.DEBUG)) {
      console.debug(this.format('DEBUG', message));
    }
  }

  info(message: string): void {
    if (this.isEnabledFor(LogLevel.INFO)) {
      console.info(this.format('INFO', message));
    }
  }

  warning(message: string): void {
    if (this.isEnabledFor(LogLevel.WARNING)) {
      console.warn(this.format('WARNING', message));
    }
  }

  error(message: string): void {
    if (this.isEnabledFor(LogLevel.ERROR)) {
      console.error(this.format('ERROR', message));
    }
  }

  critical(message: string): void {
    if (this.isEnabledFor(LogLevel.CRITICAL)) {
      console.error(this.format('CRITICAL', message));
    }
  }
}

/**
 * Get a logger with the given name
 */
export function getLogger(name: string): Logger {
  return new Logger(name);
}

/**
 * Default logger instance shared by the agents, the pipeline and the server
 */
export const logger = getLogger('content.agents');
