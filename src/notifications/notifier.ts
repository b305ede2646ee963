import type { NotificationLevel } from './notification-level.js';

/**
 * Destination for user-facing messages
 */
export type Notifier = {
  /**
   * Print a message when its level is at or above the notifier's minimum
   */
  notify(level: NotificationLevel, message: string): void;

  /**
   * Replace the current progress line
   */
  progress(message: string): void;

  /**
   * Keep the last progress line and move to a new one
   */
  endProgress(): void;
};
