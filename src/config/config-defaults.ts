import { NotificationLevel } from '../notifications/notification-level.js';
import { SiteType } from '../sites/site-type.js';
import { FailurePolicy, RunMode } from '../types/run-mode.js';
import type { ResolvedConfig } from './resolved-config.types.js';

/**
 * Config file looked up in the working directory when none is given
 */
export const DEFAULT_CONFIG_PATH = './coursegrab.yaml';

export const DEFAULT_DOWNLOAD_SETTINGS: ResolvedConfig['download'] = {
  destinationRoot: './downloads',
  mode: RunMode.PER_ITEM,
  failurePolicy: FailurePolicy.CONTINUE,
  graceMs: 5000,
  retries: 100,
  fragmentRetries: 100,
  concurrentFragments: 4,
  ledgerFile: '.coursegrab-archive.txt',
  nativeArchiveFile: '.yt-dlp-archive.txt',
  userAgent: 'Mozilla/5.0',
  extraArgs: [],
};

export const DEFAULT_SUBTITLE_SETTINGS: ResolvedConfig['subtitles'] = {
  enabled: true,
  languages: [],
  format: 'srt/best',
};

export const defaults: ResolvedConfig = {
  ytdlpPath: 'yt-dlp',
  cookieFile: undefined,
  siteType: SiteType.AUTO,
  download: DEFAULT_DOWNLOAD_SETTINGS,
  subtitles: DEFAULT_SUBTITLE_SETTINGS,
  notifications: {
    consoleMinLevel: NotificationLevel.INFO,
  },
};
