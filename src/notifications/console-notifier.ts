import { logger } from '../utils/logger.js';
import { isLevelEnabled, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Stream the progress line is drawn on
 */
export type ProgressStream = {
  write(chunk: string): boolean;
  isTTY?: boolean;
};

const LOG_METHODS = {
  debug: (message) => logger.debug(message),
  info: (message) => logger.info(message),
  success: (message) => logger.success(message),
  warning: (message) => logger.warning(message),
  error: (message) => logger.error(message),
} satisfies Record<NotificationLevel, (message: string) => void>;

/**
 * Terminal notifier: messages go through the logger, progress redraws a single line
 */
export class ConsoleNotifier implements Notifier {
  private progressWidth = 0;

  constructor(
    private minLevel: NotificationLevel = NotificationLevel.INFO,
    private readonly stream: ProgressStream = process.stdout,
  ) {}

  setMinLevel(level: NotificationLevel): void {
    this.minLevel = level;
  }

  notify(level: NotificationLevel, message: string): void {
    if (!isLevelEnabled(level, this.minLevel)) {
      return;
    }

    this.clearProgress();
    LOG_METHODS[level](message);
  }

  progress(message: string): void {
    // Redrawing needs a terminal; piped output would fill up with partial lines
    if (!this.stream.isTTY) {
      return;
    }

    this.stream.write(`\r${message.padEnd(this.progressWidth)}`);
    this.progressWidth = message.length;
  }

  endProgress(): void {
    if (this.progressWidth > 0) {
      this.stream.write('\n');
      this.progressWidth = 0;
    }
  }

  private clearProgress(): void {
    if (this.progressWidth > 0) {
      this.stream.write(`\r${' '.repeat(this.progressWidth)}\r`);
      this.progressWidth = 0;
    }
  }
}
