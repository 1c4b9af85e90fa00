export type LogLevel = 'debug' | 'warn' | 'error';

export class Logger {
  private static readonly DEBUG = 'debug' as const;
  private static readonly WARN = 'warn' as const;
  private static readonly ERROR = 'error' as const;

  private static level: LogLevel = Logger.DEBUG;
  private static sessionId: string | null = null;

  private static readonly LEVELS: Record<LogLevel, number> = {
    debug: 0,
    warn: 1,
    error: 2,
  };

  static isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(Logger.LEVELS, value);
  }

  static setLevel(level: LogLevel): void {
    Logger.level = level;
  }

  // Forces every level through for one session, whatever the threshold.
  static setSessionFilter(sessionId: string | null): void {
    Logger.sessionId = sessionId;
  }

  private static shouldLog(level: LogLevel, sessionId: string | null): boolean {
    if (Logger.sessionId !== null && Logger.sessionId === sessionId) {
      return true;
    }
    return Logger.LEVELS[level] >= Logger.LEVELS[Logger.level];
  }

  static debug(className: string, sessionId: string | null, message: string, ...args: unknown[]): void {
    if (Logger.shouldLog(Logger.DEBUG, sessionId)) {
      console.log(`[${className}] ${Logger.formatMessage(message, args)}`);
    }
  }

  static warn(className: string, sessionId: string | null, message: string, ...args: unknown[]): void {
    if (Logger.shouldLog(Logger.WARN, sessionId)) {
      console.warn(`[${className}] ${Logger.formatMessage(message, args)}`);
    }
  }

  static error(className: string, sessionId: string | null, message: string, error: Error, ...args: unknown[]): void {
    if (Logger.shouldLog(Logger.ERROR, sessionId)) {
      console.error(`[${className}] ${Logger.formatMessage(message, args)}`);
      if (error.stack) {
        console.error(error.stack);
      }
    }
  }

  private static formatMessage(message: string, args: unknown[]): string {
    return args.length ? `${message} - {${args.map(String).join(', ')}}` : message;
  }

  static getLevel(): LogLevel {
    return Logger.level;
  }
}
