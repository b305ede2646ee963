import { createEnum } from '../utils/create-enum.js';

// Ordered from least to most severe
const notificationLevel = createEnum(['debug', 'info', 'success', 'warning', 'error'] as const);

export const NotificationLevel = notificationLevel.object;

export type NotificationLevel = typeof notificationLevel.type;

export const NotificationLevelSchema = notificationLevel.schema;

/**
 * Whether a message at `level` passes a `minLevel` filter
 */
export function isLevelEnabled(level: NotificationLevel, minLevel: NotificationLevel): boolean {
  return notificationLevel.values.indexOf(level) >= notificationLevel.values.indexOf(minLevel);
}
