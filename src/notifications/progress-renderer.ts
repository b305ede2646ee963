import { ProgressKind } from '../types/progress-kind.js';
import type { OverallProgressEvent } from '../types/session.types.js';
import { formatEta, formatSize } from '../utils/format-utils.js';
import { NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Turns session events into notifier output
 */
export class ProgressRenderer {
  constructor(private readonly notifier: Notifier) {}

  /**
   * Bound listener, ready for `SessionController.subscribe`
   */
  readonly render = (update: OverallProgressEvent): void => {
    const { event } = update;
    const tag = `[${update.itemIndex}/${update.itemCount}]`;

    switch (event.kind) {
      case ProgressKind.STARTED:
        if (event.filename) {
          this.notifier.notify(NotificationLevel.DEBUG, `${tag} Destination: ${event.filename}`);
        } else {
          this.notifier.endProgress();
          this.notifier.notify(NotificationLevel.INFO, `${tag} ${event.message ?? 'Starting'}`);
        }
        break;

      case ProgressKind.DOWNLOADING:
        this.notifier.progress(`${tag} ${this.describeTransfer(update)}`);
        break;

      case ProgressKind.POSTPROCESSING:
        this.notifier.progress(`${tag} Post-processing ${event.message ?? ''}`.trimEnd());
        break;

      case ProgressKind.ITEM_COMPLETE:
        this.notifier.endProgress();
        this.notifier.notify(NotificationLevel.SUCCESS, `${tag} Done${event.filename ? `: ${event.filename}` : ''}`);
        break;

      case ProgressKind.ITEM_SKIPPED:
        this.notifier.endProgress();
        this.notifier.notify(NotificationLevel.INFO, `${tag} Skipped: ${event.message ?? 'already downloaded'}`);
        break;

      case ProgressKind.ITEM_FAILED:
        this.notifier.endProgress();
        this.notifier.notify(NotificationLevel.ERROR, `${tag} Failed: ${event.message ?? 'unknown error'}`);
        break;

      case ProgressKind.CANCELLED:
        this.notifier.endProgress();
        this.notifier.notify(NotificationLevel.WARNING, `${tag} Cancelled`);
        break;

      case ProgressKind.SESSION_COMPLETE:
        this.notifier.endProgress();
        this.renderSummary(update);
        break;
    }
  };

  private describeTransfer(update: OverallProgressEvent): string {
    const { event } = update;
    const parts: string[] = [];

    if (event.percent !== null) {
      parts.push(`${event.percent.toFixed(1)}%`);
    }
    if (event.totalBytes !== null) {
      parts.push(`of ${formatSize(event.totalBytes)}`);
    }
    if (event.speed) {
      parts.push(`at ${event.speed}`);
    }
    parts.push(`ETA ${formatEta(event.etaSeconds)}`);
    parts.push(`| total ${update.overallPercent.toFixed(1)}%`);

    return parts.join(' ');
  }

  private renderSummary(update: OverallProgressEvent): void {
    const counts = `${update.completedCount} completed, ${update.skippedCount} skipped, ${update.failedCount} failed`;

    switch (update.outcome) {
      case 'completed':
        this.notifier.notify(NotificationLevel.SUCCESS, `Finished: ${counts}`);
        break;
      case 'cancelled':
        this.notifier.notify(NotificationLevel.WARNING, `Cancelled: ${counts}`);
        break;
      default:
        this.notifier.notify(NotificationLevel.ERROR, `Failed: ${update.error ?? counts}`);
        break;
    }
  }
}
