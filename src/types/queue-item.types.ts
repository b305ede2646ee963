import type { Section } from '../paths/path-planner.js';
import type { SiteType } from '../sites/site-type.js';
import { createEnum } from '../utils/create-enum.js';

/**
 * User intent for one session; frozen once the session starts
 */
export type DownloadRequest = Readonly<{
  url: string;
  siteType: SiteType;
  destinationRoot: string;
  cookieFile?: string;
  /** Preferred subtitle languages; absent means the configured default */
  subtitleLanguages?: readonly string[];
}>;

const itemStatus = createEnum(['queued', 'running', 'completed', 'skipped', 'failed', 'cancelled'] as const);

export const ItemStatus = itemStatus.object;

export type ItemStatus = typeof itemStatus.type;

/**
 * One unit of work within a request
 */
export type QueueItem = {
  /** Ledger identifier */
  id: string;
  /** Single entry URL, or the playlist URL when the tool enumerates by itself */
  url: string;
  /** 1-based position in the course */
  index: number;
  /** Unknown until the tool reports it */
  title: string | null;
  courseTitle: string;
  section: Section | null;
  /** The tool downloads every entry of this URL in one invocation */
  isPlaylist: boolean;
  status: ItemStatus;
};

const TERMINAL_ITEM_STATUSES: ReadonlySet<ItemStatus> = new Set([
  ItemStatus.COMPLETED,
  ItemStatus.SKIPPED,
  ItemStatus.FAILED,
  ItemStatus.CANCELLED,
]);

export function isTerminalItemStatus(status: ItemStatus): boolean {
  return TERMINAL_ITEM_STATUSES.has(status);
}
