import type { NotificationLevel } from '../notifications/notification-level.js';
import type { SiteType } from '../sites/site-type.js';
import type { FailurePolicy, RunMode } from '../types/run-mode.js';

/**
 * Download settings with every default applied
 */
export type ResolvedDownloadSettings = {
  destinationRoot: string;
  mode: RunMode;
  failurePolicy: FailurePolicy;
  graceMs: number;
  retries: number;
  fragmentRetries: number;
  concurrentFragments: number;
  ledgerFile: string;
  nativeArchiveFile: string | null;
  userAgent: string | null;
  extraArgs: string[];
};

/**
 * Subtitle settings with every default applied
 */
export type ResolvedSubtitleSettings = {
  enabled: boolean;
  /** Empty means every language the site offers */
  languages: string[];
  format: string;
};

/**
 * Fully resolved configuration
 */
export type ResolvedConfig = {
  ytdlpPath: string;
  cookieFile: string | undefined;
  siteType: SiteType;
  download: ResolvedDownloadSettings;
  subtitles: ResolvedSubtitleSettings;
  notifications: {
    consoleMinLevel: NotificationLevel;
  };
};
