export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

type StepMark = '▶' | '✓' | '✗' | '⏸';

class Logger {
  private static instance: Logger;
  private level: LogLevel = LogLevel.NORMAL;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.level) return;

    const formattedMessage = context ? `[${context}] ${message}` : message;

    // In quiet mode, only show essential completion messages
    if (this.level === LogLevel.QUIET) {
      if (level === LogLevel.QUIET) {
        console.log(formattedMessage);
      }
      return;
    }

    console.log(formattedMessage);
    if (data !== undefined) {
      console.log(data);
    }
  }

  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  error(message: string, context?: string, data?: unknown): void {
    // Errors always show unless in quiet mode
    if (this.level > LogLevel.QUIET) {
      console.error(context ? `[${context}] ${message}` : message);
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  // One line per stage or recipient, aligned on the label
  step(mark: StepMark, label: string, message: string): void {
    if (this.level >= LogLevel.NORMAL) {
      console.log(`${mark} ${label.padEnd(20)} ${message}`);
    }
  }

  started(label: string, message: string): void {
    this.step('▶', label, message);
  }

  success(label: string, message: string): void {
    this.step('✓', label, message);
  }

  failure(label: string, message: string): void {
    this.step('✗', label, message);
  }

  skip(label: string, message: string): void {
    this.step('⏸', label, message);
  }
}

// Contextual logger for component-specific logging
export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }
}

export const logger = Logger.getInstance();

export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (level.toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

/** Percentage rounded to two decimals; 0 when `total` is 0 */
export const formatPercent = (part: number, total: number): number => {
  if (total === 0) return 0;
  return Math.round((part / total) * 10000) / 100;
};
