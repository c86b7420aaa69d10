import fs from 'fs';

export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3
};

export type LogContext = Record<string, unknown>;

export type ConsoleSink = Pick<Console, 'log' | 'warn' | 'error'>;

export interface LoggerOptions {
  level?: LogLevel;
  /** Truncated when the logger is created. */
  filePath?: string;
  console?: ConsoleSink;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly filePath: string | undefined;
  private readonly console: ConsoleSink;

  constructor({ level = LogLevel.INFO, filePath, console: sink = console }: LoggerOptions = {}) {
    this.level = level;
    this.filePath = filePath;
    this.console = sink;

    if (this.filePath) {
      this.writeToFile('', 'w');
    }
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, error, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, undefined, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, undefined, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, undefined, context);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private log(level: LogLevel, message: string, error?: Error, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = Logger.formatMessage(level, message, error, context);

    if (this.filePath) {
      this.writeToFile(`${line}\n`, 'a');
    }

    switch (level) {
      case LogLevel.ERROR:
        this.console.error(line);
        break;
      case LogLevel.WARN:
        this.console.warn(line);
        break;
      default:
        this.console.log(line);
    }
  }

  static formatMessage(level: LogLevel, message: string, error?: Error, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';
    const errorStr = error ? ` | Error: ${error.message}` : '';

    return `[${timestamp}] ${level}: ${message}${contextStr}${errorStr}`;
  }

  private writeToFile(data: string, flag: 'w' | 'a'): void {
    if (!this.filePath) {
      return;
    }

    try {
      fs.writeFileSync(this.filePath, data, { flag });
    } catch (err) {
      this.console.error('Failed to write to log file:', err);
    }
  }
}
