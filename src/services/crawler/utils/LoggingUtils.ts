import logger from '../../../utils/logger';

/**
 * Log levels enum
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  NONE = 'none'
}

export interface TaggedLogger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string | Error, context?: object): void;
}

/**
 * Utilities for logging in the crawler service
 */
export class LoggingUtils {
  private static currentLevel: LogLevel = LogLevel.DEBUG;
  private static enabledTags: Set<string> = new Set(['crawler', 'fetcher', 'store', 'gate']);

  /**
   * Sets the current log level
   * @param level The log level to set
   */
  static setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  static isTagEnabled(tag: string): boolean {
    return this.enabledTags.has(tag.toLowerCase());
  }

  static debug(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.DEBUG, message, tag, context);
  }

  static info(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.INFO, message, tag, context);
  }

  static warn(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.WARN, message, tag, context);
  }

  /**
   * Log an error message
   * @param message The message or error to log
   * @param tag Optional tag for filtering
   * @param context Optional context object
   */
  static error(message: string | Error, tag?: string, context?: object): void {
    if (message instanceof Error) {
      this.log(LogLevel.ERROR, message.message, tag, {
        ...context,
        stack: message.stack,
        name: message.name
      });
    } else {
      this.log(LogLevel.ERROR, message, tag, context);
    }
  }

  /**
   * Format and log a message based on level, tag, and context.
   * Errors are never filtered out by tag.
   */
  private static log(level: LogLevel, message: string, tag?: string, context?: object): void {
    if (this.isLevelDisabled(level)) {
      return;
    }
    if (tag && level !== LogLevel.ERROR && !this.isTagEnabled(tag)) {
      return;
    }

    const formattedMessage = tag ? `[${tag}] ${message}` : message;

    switch (level) {
      case LogLevel.DEBUG:
        logger.debug(formattedMessage, context);
        break;
      case LogLevel.INFO:
        logger.info(formattedMessage, context);
        break;
      case LogLevel.WARN:
        logger.warn(formattedMessage, context);
        break;
      case LogLevel.ERROR:
        logger.error(formattedMessage, context);
        break;
    }
  }

  private static isLevelDisabled(level: LogLevel): boolean {
    if (this.currentLevel === LogLevel.NONE) {
      return true;
    }

    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    return levels.indexOf(level) < levels.indexOf(this.currentLevel);
  }

  /**
   * Create a scoped logger with a fixed tag
   * @param tag The tag to scope the logger with
   */
  static createTaggedLogger(tag: string): TaggedLogger {
    return {
      debug: (message: string, context?: object) => this.debug(message, tag, context),
      info: (message: string, context?: object) => this.info(message, tag, context),
      warn: (message: string, context?: object) => this.warn(message, tag, context),
      error: (message: string | Error, context?: object) => this.error(message, tag, context)
    };
  }
}
