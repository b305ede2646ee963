export { ConsoleNotifier, type ProgressStream } from './console-notifier.js';
export { NotificationLevel } from './notification-level.js';
export type { Notifier } from './notifier.js';
export { ProgressRenderer } from './progress-renderer.js';
