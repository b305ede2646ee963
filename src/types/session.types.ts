import { createEnum } from '../utils/create-enum.js';
import type { ProgressEvent } from './progress-event.types.js';
import type { QueueItem } from './queue-item.types.js';

const sessionStatus = createEnum(['idle', 'running', 'completed', 'cancelled', 'failed'] as const);

export const SessionStatus = sessionStatus.object;

export type SessionStatus = typeof sessionStatus.type;

export type SessionOutcome = Exclude<SessionStatus, 'idle' | 'running'>;

/**
 * Everything the controller knows about the current (or last) session
 */
export type SessionState = {
  status: SessionStatus;
  current: QueueItem | null;
  items: QueueItem[];
  completedCount: number;
  skippedCount: number;
  failedCount: number;
  bytesProcessed: number;
  /** 0-100, never decreases within a session */
  overallPercent: number;
  cancelRequested: boolean;
  outcome: SessionOutcome | null;
  error?: string;
};

/**
 * The one event type the presentation layer consumes
 */
export type OverallProgressEvent = {
  itemIndex: number;
  itemCount: number;
  overallPercent: number;
  item: QueueItem | null;
  /** Underlying event from the tool or the controller */
  event: ProgressEvent;
  completedCount: number;
  skippedCount: number;
  failedCount: number;
  /** Set on the final SESSION_COMPLETE event only */
  outcome?: SessionOutcome;
  error?: string;
};

export type SessionListener = (event: OverallProgressEvent) => void;

/**
 * Resolved value of a finished session
 */
export type SessionSummary = {
  outcome: SessionOutcome;
  itemCount: number;
  completedCount: number;
  skippedCount: number;
  failedCount: number;
  bytesProcessed: number;
  error?: string;
};
