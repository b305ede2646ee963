/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
}

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.SUCCESS]: 2,
  [LogLevel.WARNING]: 3,
  [LogLevel.ERROR]: 4,
};

const LEVEL_MARKS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🔍',
  [LogLevel.INFO]: 'ℹ️',
  [LogLevel.SUCCESS]: '✅',
  [LogLevel.WARNING]: '⚠️',
  [LogLevel.ERROR]: '❌',
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.dim,
  [LogLevel.INFO]: colors.blue,
  [LogLevel.SUCCESS]: colors.green,
  [LogLevel.WARNING]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

/**
 * Logger class with colored console output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? process.stdout.isTTY === true,
    };
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.write(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.write(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.level]) {
      return;
    }

    const line = `${formatTime(new Date())} ${LEVEL_MARKS[level]} ${this.colorize(message, LEVEL_COLORS[level])}`;

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }
}

/**
 * Format time as HH:mm:ss
 */
function formatTime(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

// Default logger instance
export const logger: Logger = new Logger();
