import { ConfigError } from '../errors/custom-errors.js';
import { expandHome } from '../utils/env-resolver.js';
import { defaults } from './config-defaults.js';
import type { Config, DownloadSettings, SubtitleSettings } from './config-schema.js';
import type { ResolvedConfig, ResolvedDownloadSettings, ResolvedSubtitleSettings } from './resolved-config.types.js';

/**
 * Longest grace period accepted before a forced kill, in milliseconds
 */
export const MAX_GRACE_MS = 120_000;

/**
 * Merge configuration layers into a complete configuration
 *
 * Hierarchy:
 * 1. Overrides, usually command-line flags (Highest Priority)
 * 2. Config file
 * 3. Defaults (Lowest Priority)
 *
 * `null` is a real value (it switches a setting off), so only `undefined`
 * falls through to the next layer.
 */
export function resolveConfig(file: Config = {}, overrides: Config = {}): ResolvedConfig {
  const cookieFile = pick(overrides.cookieFile, file.cookieFile, defaults.cookieFile);

  const config: ResolvedConfig = {
    ytdlpPath: expandHome(pick(overrides.ytdlpPath, file.ytdlpPath, defaults.ytdlpPath)),
    cookieFile: cookieFile === undefined ? undefined : expandHome(cookieFile),
    siteType: pick(overrides.siteType, file.siteType, defaults.siteType),
    download: mergeDownloadSettings(overrides.download, file.download),
    subtitles: mergeSubtitleSettings(overrides.subtitles, file.subtitles),
    notifications: {
      consoleMinLevel: pick(
        overrides.notifications?.consoleMinLevel,
        file.notifications?.consoleMinLevel,
        defaults.notifications.consoleMinLevel,
      ),
    },
  };

  validate(config);
  return config;
}

function mergeDownloadSettings(override?: DownloadSettings, file?: DownloadSettings): ResolvedDownloadSettings {
  const base = defaults.download;

  return {
    destinationRoot: expandHome(pick(override?.destinationRoot, file?.destinationRoot, base.destinationRoot)),
    mode: pick(override?.mode, file?.mode, base.mode),
    failurePolicy: pick(override?.failurePolicy, file?.failurePolicy, base.failurePolicy),
    graceMs: pick(override?.graceMs, file?.graceMs, base.graceMs),
    retries: pick(override?.retries, file?.retries, base.retries),
    fragmentRetries: pick(override?.fragmentRetries, file?.fragmentRetries, base.fragmentRetries),
    concurrentFragments: pick(override?.concurrentFragments, file?.concurrentFragments, base.concurrentFragments),
    ledgerFile: pick(override?.ledgerFile, file?.ledgerFile, base.ledgerFile),
    nativeArchiveFile: pick(override?.nativeArchiveFile, file?.nativeArchiveFile, base.nativeArchiveFile),
    userAgent: pick(override?.userAgent, file?.userAgent, base.userAgent),
    extraArgs: pick(override?.extraArgs, file?.extraArgs, base.extraArgs),
  };
}

function mergeSubtitleSettings(override?: SubtitleSettings, file?: SubtitleSettings): ResolvedSubtitleSettings {
  const base = defaults.subtitles;

  return {
    enabled: pick(override?.enabled, file?.enabled, base.enabled),
    languages: pick(override?.languages, file?.languages, base.languages),
    format: pick(override?.format, file?.format, base.format),
  };
}

function pick<T>(override: T | undefined, file: T | undefined, fallback: T): T {
  if (override !== undefined) return override;
  if (file !== undefined) return file;
  return fallback;
}

function validate(config: ResolvedConfig): void {
  if (config.download.graceMs > MAX_GRACE_MS) {
    throw new ConfigError(`download.graceMs must be at most ${MAX_GRACE_MS}, got ${config.download.graceMs}`);
  }
  if (config.download.ledgerFile === config.download.nativeArchiveFile) {
    throw new ConfigError('download.ledgerFile and download.nativeArchiveFile must be different files');
  }
}
