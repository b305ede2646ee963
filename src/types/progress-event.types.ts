import type { ProgressKind } from './progress-kind.js';

/**
 * Point-in-time snapshot parsed from one line of tool output
 */
export type ProgressEvent = {
  kind: ProgressKind;
  /** Percent of the current file, 0-100 */
  percent: number | null;
  /** Total size of the current file in bytes, estimated or exact */
  totalBytes: number | null;
  /** Transfer speed as the tool printed it (e.g. "563.37KiB/s") */
  speed: string | null;
  /** Estimated seconds remaining for the current file */
  etaSeconds: number | null;
  /** 1-based index of the item this event belongs to */
  itemIndex: number | null;
  /** Number of items in the session */
  itemCount: number | null;
  /** File the tool is writing, when announced */
  filename?: string;
  /** Error text or other human-readable detail */
  message?: string;
};

/**
 * Build an event with every optional measurement left unknown
 */
export function createProgressEvent(kind: ProgressKind, fields: Partial<Omit<ProgressEvent, 'kind'>> = {}): ProgressEvent {
  return {
    kind,
    percent: null,
    totalBytes: null,
    speed: null,
    etaSeconds: null,
    itemIndex: null,
    itemCount: null,
    ...fields,
  };
}
