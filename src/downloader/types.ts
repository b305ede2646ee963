import type { SiteProfile } from '../sites/site-registry.js';
import type { ProgressEvent } from '../types/progress-event.types.js';
import type { DownloadRequest, ItemStatus, QueueItem } from '../types/queue-item.types.js';

/**
 * One tool invocation: a single entry, or a whole playlist in single-invocation mode
 */
export type DownloadJob = {
  request: DownloadRequest;
  item: QueueItem;
  /** Items in the session, reported on every forwarded event */
  itemCount: number;
  profile: SiteProfile;
};

export type JobOutcome = Exclude<ItemStatus, 'queued' | 'running'>;

export type JobResult = {
  outcome: JobOutcome;
  /** Bytes written across every file of the job, as far as the tool reported */
  totalBytes: number;
  error?: string;
  /** Last file the tool announced */
  filename?: string;
};

export type ProgressListener = (event: ProgressEvent) => void;

/**
 * Runs download jobs one at a time
 */
export type ItemRunner = {
  run(job: DownloadJob, onEvent: ProgressListener, signal: AbortSignal): Promise<JobResult>;
};
